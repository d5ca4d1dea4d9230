/**
 * Clock state passed to the engine as go-options
 */

import { z } from 'zod';

import { InvalidArgumentError } from '../errors.js';

/**
 * Remaining time and increment per side, all in milliseconds
 */
export interface TimeControl {
  /** White time */
  wtime: number;
  /** White increment */
  winc: number;
  /** Black time */
  btime: number;
  /** Black increment */
  binc: number;
}

/**
 * One minute thinking time for both sides, no increment
 */
export const DEFAULT_TIME_CONTROL: Readonly<TimeControl> = {
  wtime: 60000,
  winc: 0,
  btime: 60000,
  binc: 0,
};

const millisSchema = z.number().int().min(0);

export const timeControlSchema = z.object({
  wtime: millisSchema,
  winc: millisSchema,
  btime: millisSchema,
  binc: millisSchema,
});

/**
 * Create a time control, filling unset fields from DEFAULT_TIME_CONTROL
 * @throws InvalidArgumentError if a field is not a non-negative integer
 */
export function createTimeControl(overrides: Partial<TimeControl> = {}): TimeControl {
  const result = timeControlSchema.safeParse({ ...DEFAULT_TIME_CONTROL, ...overrides });
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new InvalidArgumentError(`Invalid time control (${details})`);
  }
  return result.data;
}
