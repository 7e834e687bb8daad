/**
 * Assessment Errors
 *
 * Only EmptySessionError and SessionStateError are ever thrown.
 * The other classes describe recoverable conditions and travel as values
 * (extraction outcomes, diagnostics) so one bad input never aborts a report.
 */

import type { Category } from './types/assessment';

export class EmptySessionError extends Error {
  constructor(message = 'No frames were appended to the session') {
    super(message);
    this.name = 'EmptySessionError';
  }
}

export class SessionStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SessionStateError';
  }
}

export class InsufficientDataError extends Error {
  constructor(
    readonly category: Category,
    readonly reason: string
  ) {
    super(`${category}: ${reason}`);
    this.name = 'InsufficientDataError';
  }
}

export class MalformedFrameError extends Error {
  constructor(
    readonly frameIndex: number,
    readonly reason: string,
    readonly joint?: string
  ) {
    super(joint ? `Frame ${frameIndex} (${joint}): ${reason}` : `Frame ${frameIndex}: ${reason}`);
    this.name = 'MalformedFrameError';
  }
}
