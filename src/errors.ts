/** Raised when a transaction, block or wire payload is malformed. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Raised when proof-of-work search runs out of nonces without a solution. */
export class MiningExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number) {
    super(`Failed to mine block after ${attempts} attempts`);
    this.name = 'MiningExhaustedError';
    this.attempts = attempts;
  }
}
