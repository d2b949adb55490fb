export class InsiderTradingParseError extends Error {
  constructor(
    public readonly field: string,
    public readonly line: string,
    reason: string
  ) {
    super(`Invalid ${field} (${reason}) in line "${line}"`);
    this.name = 'InsiderTradingParseError';
  }
}
