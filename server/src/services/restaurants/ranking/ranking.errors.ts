/**
 * Selector contract errors. Both are programming errors and abort the run.
 */

export class RankingContractError extends Error {
  constructor(
    public readonly field: string,
    public readonly recordId: unknown
  ) {
    super(`Record ${String(recordId)} reached the selector without a finite "${field}"`);
    this.name = 'RankingContractError';
  }
}

export class SelectorDrainedError extends Error {
  constructor(public readonly operation: 'add' | 'drain') {
    super(`Selector already drained; ${operation}() is not permitted after drain()`);
    this.name = 'SelectorDrainedError';
  }
}

export class InvalidTopKError extends Error {
  constructor(public readonly k: number) {
    super(`Top-K size must be a positive integer, got ${k}`);
    this.name = 'InvalidTopKError';
  }
}
