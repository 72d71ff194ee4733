/**
 * Errors.ts — Engine error hierarchy.
 *
 * Only programmer contract violations and malformed persisted data throw.
 * In-game rule violations (fleeing as a monster, a missing target) are
 * narrative log lines, not errors.
 */

import type { ZodIssue } from 'zod';

export class GameError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class OutOfBoundsError extends GameError {
  readonly row: number;
  readonly col: number;

  constructor(row: number, col: number, rows: number, cols: number) {
    super(
      'OUT_OF_BOUNDS',
      `Position (${row}, ${col}) is outside the ${rows}x${cols} grid`,
    );
    this.row = row;
    this.col = col;
  }
}

export class SerializationError extends GameError {
  readonly issues: ZodIssue[];

  constructor(label: string, issues: ZodIssue[]) {
    const summary = issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    super('INVALID_DATA', `Invalid ${label} data: ${summary}`);
    this.issues = issues;
  }
}
