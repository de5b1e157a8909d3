// ISO 4217 currency. Two currencies are the same iff their alpha codes match.
export interface Currency {
  code: string;       // alpha code, e.g. USD
  numeric: number;    // numeric code, e.g. 840
  name: string;
}

export function sameCurrency(a: Currency, b: Currency): boolean {
  return a.code === b.code;
}

/** Frozen copy, or the currency itself when it is already frozen */
export function snapshotCurrency(currency: Currency): Currency {
  return Object.isFrozen(currency) ? currency : Object.freeze({ ...currency });
}
