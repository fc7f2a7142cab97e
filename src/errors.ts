/**
 * Errors raised while turning a raw reading into a workout.
 * Every reading error carries a machine-readable `code` so callers can
 * tell the failure kinds apart without matching on messages.
 */

import type { WorkoutCode } from './types';

export type WorkoutErrorCode =
  | 'INVALID_PARAMETER_COUNT'
  | 'INVALID_PARAMETER_VALUE'
  | 'UNRECOGNIZED_WORKOUT_TYPE';

export abstract class WorkoutReadingError extends Error {
  abstract readonly code: WorkoutErrorCode;

  constructor(
    message: string,
    readonly workoutType: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnrecognizedWorkoutTypeError extends WorkoutReadingError {
  readonly code = 'UNRECOGNIZED_WORKOUT_TYPE';

  constructor(workoutType: string) {
    super(`Unrecognized workout type "${workoutType}"`, workoutType);
  }
}

export class InvalidParameterCountError extends WorkoutReadingError {
  readonly code = 'INVALID_PARAMETER_COUNT';

  constructor(
    workoutType: WorkoutCode,
    readonly expected: number,
    readonly received: readonly number[],
  ) {
    super(
      `Invalid parameter count for ${workoutType}: expected ${String(expected)}, received ${String(received.length)}`,
      workoutType,
    );
  }
}

export class InvalidParameterValueError extends WorkoutReadingError {
  readonly code = 'INVALID_PARAMETER_VALUE';

  constructor(
    workoutType: WorkoutCode,
    readonly issues: readonly string[],
  ) {
    super(`Invalid parameters for ${workoutType}: ${issues.join('; ')}`, workoutType);
  }
}

/**
 * Raised when a calculation meets a workout kind it has no formula for.
 * Indicates a programming error, never bad input.
 */
export class UnhandledWorkoutKindError extends Error {
  constructor(kind: unknown) {
    super(`No calculation defined for workout kind: ${JSON.stringify(kind)}`);
    this.name = 'UnhandledWorkoutKindError';
  }
}

export function isWorkoutReadingError(error: unknown): error is WorkoutReadingError {
  return error instanceof WorkoutReadingError;
}
