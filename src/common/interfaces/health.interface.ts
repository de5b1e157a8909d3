export interface HealthResponse {
  status: 'ok' | 'error';
  timestamp: string;
  uptime: number;         // seconds since process start
  service: string;
  historyEntries: number; // audited transitions so far
  trades: number;         // trades held in the directory
}
