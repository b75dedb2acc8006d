export class InvalidInputError extends Error {
  readonly issues: string[];

  constructor(issues: string[], context = 'Invalid input') {
    super(`${context}: ${issues.join('; ')}`);
    this.name = 'InvalidInputError';
    this.issues = issues;
  }
}

export interface PriceAttempt {
  source: string;
  message: string;
}

export class PriceRetrievalError extends Error {
  readonly symbol: string;
  readonly attempts: PriceAttempt[];

  constructor(symbol: string, attempts: PriceAttempt[]) {
    const detail = attempts.map((a) => `${a.source}: ${a.message}`).join('; ');
    super(`Price retrieval failed for ${symbol}${detail ? ` (${detail})` : ''}`);
    this.name = 'PriceRetrievalError';
    this.symbol = symbol;
    this.attempts = attempts;
  }
}

export const remediationFor = (err: unknown): string => {
  if (err instanceof InvalidInputError) return 'Check the inputs and try again.';
  if (err instanceof PriceRetrievalError) {
    return 'Check the network connection and the ticker symbol, then retry in a moment.';
  }
  return 'Unexpected failure; see the error details.';
};

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));
