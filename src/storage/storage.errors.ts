/**
 * Persisted state exists but cannot be decoded.
 * Callers decide whether to fall back to an empty state.
 */
export class CorruptStateError extends Error {
  constructor(
    message: string,
    readonly details: string[] = [],
  ) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'CorruptStateError';
  }
}
