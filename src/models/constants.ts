/**
 * Calculation constants.
 * Unit conversions and per-variant formula coefficients.
 */

import type { WorkoutKind } from '../types';

export const M_IN_KM = 1000;

export const MIN_IN_HOUR = 60;

/** Distance covered by one step or stroke, in metres. */
export const STEP_LENGTH_M: Record<WorkoutKind, number> = {
  running: 0.65,
  swimming: 1.38,
  walkingWithLoad: 0.65,
};

export const DISPLAY_NAMES: Record<WorkoutKind, string> = {
  running: 'Running',
  swimming: 'Swimming',
  walkingWithLoad: 'WalkingWithLoad',
};

export const RUNNING_CALORIES = {
  speedMultiplier: 18,
  speedShift: 20,
} as const;

export const WALKING_CALORIES = {
  weightMultiplier: 0.035,
  speedHeightMultiplier: 0.029,
} as const;

export const SWIMMING_CALORIES = {
  speedShift: 1.1,
  weightMultiplier: 2,
} as const;
