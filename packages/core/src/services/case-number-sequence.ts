import type { CaseNumber } from '../types/task.js';

export const CASE_NUMBER_PREFIX = 'TASK';
const CASE_NUMBER_DIGITS = 6;

export const CASE_NUMBER_PATTERN = /^TASK\d{6}$/;

/**
 * Monotonic counter behind generated case numbers. One instance lives for the
 * lifetime of the process's TaskService. The UNIQUE index on case_number is the
 * real guarantee; the counter only keeps collisions rare.
 */
export class CaseNumberSequence {
  private nextValue: number;

  constructor(start = 1) {
    if (!Number.isSafeInteger(start) || start < 0) {
      throw new RangeError(`Sequence start must be a non-negative integer, got ${start}`);
    }
    this.nextValue = start;
  }

  /** Returns the current value and advances the counter */
  next(): number {
    return this.nextValue++;
  }

  /** Value the next call to next() will return */
  peek(): number {
    return this.nextValue;
  }

  static format(value: number): CaseNumber {
    return CASE_NUMBER_PREFIX + String(value).padStart(CASE_NUMBER_DIGITS, '0');
  }
}
