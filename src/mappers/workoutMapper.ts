/**
 * Workout reading transformation utilities.
 * Transforms a raw (type code, parameter list) reading into a typed workout.
 */

import {
  InvalidParameterCountError,
  InvalidParameterValueError,
  isWorkoutReadingError,
  UnrecognizedWorkoutTypeError,
} from '../errors';
import { getDistanceKm, getMeanSpeedKmh, getSpentCalories } from '../models/Workout';
import {
  RunningFieldsSchema,
  SwimmingFieldsSchema,
  WalkingFieldsSchema,
} from '../validation/schemas';

import type { z } from 'zod';
import type { WorkoutReadingError } from '../errors';
import type { Workout, WorkoutCode } from '../types';

/**
 * Positional parameter names per type code.
 * The list length is the exact parameter count the code accepts.
 */
export const PARAMETER_NAMES = {
  RUN: ['actionCount', 'durationHours', 'weightKg'],
  SWM: ['actionCount', 'durationHours', 'weightKg', 'poolLengthMeters', 'poolLengthsCount'],
  WLK: ['actionCount', 'durationHours', 'weightKg', 'heightCm'],
} as const satisfies Record<WorkoutCode, readonly string[]>;

export type ReadPackageResult =
  | { error: WorkoutReadingError; success: false }
  | { success: true; workout: Workout };

export function isWorkoutCode(value: string): value is WorkoutCode {
  return Object.hasOwn(PARAMETER_NAMES, value);
}

/**
 * Build a workout from a sensor reading.
 *
 * @throws UnrecognizedWorkoutTypeError if the type code is unknown
 * @throws InvalidParameterCountError if the parameter list has the wrong length
 * @throws InvalidParameterValueError if a parameter is out of range or the
 * derived distance, speed or calories would not be finite
 */
export function readPackage(workoutType: string, data: readonly number[]): Workout {
  if (!isWorkoutCode(workoutType)) {
    throw new UnrecognizedWorkoutTypeError(workoutType);
  }

  const expected = PARAMETER_NAMES[workoutType].length;
  if (data.length !== expected) {
    throw new InvalidParameterCountError(workoutType, expected, [...data]);
  }

  const workout = toWorkout(workoutType, toNamedFields(workoutType, data));
  assertFiniteResults(workoutType, workout);
  return workout;
}

function toWorkout(workoutType: WorkoutCode, fields: Record<string, number>): Workout {
  switch (workoutType) {
    case 'RUN': {
      const parsed = unwrap(workoutType, RunningFieldsSchema.safeParse(fields));
      return { kind: 'running', ...parsed };
    }
    case 'SWM': {
      const parsed = unwrap(workoutType, SwimmingFieldsSchema.safeParse(fields));
      return { kind: 'swimming', ...parsed };
    }
    case 'WLK': {
      const parsed = unwrap(workoutType, WalkingFieldsSchema.safeParse(fields));
      return { kind: 'walkingWithLoad', ...parsed };
    }
  }
}

/**
 * Non-throwing variant of `readPackage` for callers that collect failures.
 * Errors other than reading errors still propagate.
 */
export function safeReadPackage(workoutType: string, data: readonly number[]): ReadPackageResult {
  try {
    return { success: true, workout: readPackage(workoutType, data) };
  } catch (error) {
    if (isWorkoutReadingError(error)) {
      return { error, success: false };
    }
    throw error;
  }
}

function toNamedFields(workoutType: WorkoutCode, data: readonly number[]): Record<string, number> {
  const names: readonly string[] = PARAMETER_NAMES[workoutType];
  return Object.fromEntries(names.map((name, index) => [name, data[index]]));
}

function unwrap<Input, Output>(
  workoutType: WorkoutCode,
  result: z.SafeParseReturnType<Input, Output>,
): Output {
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InvalidParameterValueError(workoutType, issues);
  }
  return result.data;
}

// Finite inputs can still overflow once multiplied or divided
function assertFiniteResults(workoutType: WorkoutCode, workout: Workout): void {
  const results: [string, number][] = [
    ['distanceKm', getDistanceKm(workout)],
    ['meanSpeedKmh', getMeanSpeedKmh(workout)],
    ['caloriesSpent', getSpentCalories(workout)],
  ];
  const issues = results
    .filter(([, value]) => !Number.isFinite(value))
    .map(([name]) => `${name}: Result is not finite`);

  if (issues.length > 0) {
    throw new InvalidParameterValueError(workoutType, issues);
  }
}
