import { loadConfig } from './app.config';

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      PORT: 3000,
      HOST: '0.0.0.0',
      LOG_LEVELS: ['log', 'warn', 'error'],
    });
  });

  it('should coerce the port and split log levels', () => {
    const config = loadConfig({ PORT: '8080', HOST: '127.0.0.1', LOG_LEVELS: 'error, debug' });

    expect(config.PORT).toBe(8080);
    expect(config.HOST).toBe('127.0.0.1');
    expect(config.LOG_LEVELS).toEqual(['error', 'debug']);
  });

  it('should reject a non-numeric port', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow('Invalid configuration: PORT');
  });

  it('should reject a port out of range', () => {
    expect(() => loadConfig({ PORT: '70000' })).toThrow('Invalid configuration: PORT');
  });

  it('should reject unknown log levels', () => {
    expect(() => loadConfig({ LOG_LEVELS: 'log,loud' })).toThrow('Invalid configuration: LOG_LEVELS');
  });
});
