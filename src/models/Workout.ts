import { UnhandledWorkoutKindError } from '../errors';
import {
  DISPLAY_NAMES,
  M_IN_KM,
  MIN_IN_HOUR,
  RUNNING_CALORIES,
  STEP_LENGTH_M,
  SWIMMING_CALORIES,
  WALKING_CALORIES,
} from './constants';

import type { SummaryReport, Swimming, WalkingWithLoad, Workout } from '../types';

function assertUnhandled(workout: never): never {
  throw new UnhandledWorkoutKindError(workout);
}

/**
 * Distance in km, derived from the action count and the variant's step length.
 */
export function getDistanceKm(workout: Workout): number {
  return (workout.actionCount * STEP_LENGTH_M[workout.kind]) / M_IN_KM;
}

export function getMeanSpeedKmh(workout: Workout): number {
  switch (workout.kind) {
    case 'running':
    case 'walkingWithLoad': {
      return getDistanceKm(workout) / workout.durationHours;
    }
    case 'swimming': {
      return getSwimmingSpeedKmh(workout);
    }
    default: {
      return assertUnhandled(workout);
    }
  }
}

export function getSpentCalories(workout: Workout): number {
  switch (workout.kind) {
    case 'running': {
      const { speedMultiplier, speedShift } = RUNNING_CALORIES;
      const durationMinutes = workout.durationHours * MIN_IN_HOUR;
      return (
        (((speedMultiplier * getMeanSpeedKmh(workout) - speedShift) * workout.weightKg) / M_IN_KM) *
        durationMinutes
      );
    }
    case 'walkingWithLoad': {
      return getWalkingCalories(workout);
    }
    case 'swimming': {
      const { speedShift, weightMultiplier } = SWIMMING_CALORIES;
      return (getMeanSpeedKmh(workout) + speedShift) * weightMultiplier * workout.weightKg;
    }
    default: {
      return assertUnhandled(workout);
    }
  }
}

/**
 * Assemble the summary for a workout.
 */
export function buildSummary(workout: Workout): SummaryReport {
  return {
    caloriesSpent: getSpentCalories(workout),
    distanceKm: getDistanceKm(workout),
    durationHours: workout.durationHours,
    meanSpeedKmh: getMeanSpeedKmh(workout),
    workoutTypeName: DISPLAY_NAMES[workout.kind],
  };
}

// Pool swims measure speed from pool lengths, not from stroke count
function getSwimmingSpeedKmh(workout: Swimming): number {
  const poolDistanceKm = (workout.poolLengthMeters * workout.poolLengthsCount) / M_IN_KM;
  return poolDistanceKm / workout.durationHours;
}

/**
 * The speed term is floor-divided by height before it is weighted.
 */
function getWalkingCalories(workout: WalkingWithLoad): number {
  const { speedHeightMultiplier, weightMultiplier } = WALKING_CALORIES;
  const durationMinutes = workout.durationHours * MIN_IN_HOUR;
  const speedTerm = Math.floor(getMeanSpeedKmh(workout) ** 2 / workout.heightCm);
  return (
    (weightMultiplier * workout.weightKg + speedTerm * speedHeightMultiplier * workout.weightKg) *
    durationMinutes
  );
}
