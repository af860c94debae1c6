/**
 * Failures of the foundational identifier services.
 *
 * Neither has a degraded mode: callers let them propagate and end the run.
 */

export class RandomSourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RandomSourceError';
  }
}

export class ClockError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ClockError';
  }
}
