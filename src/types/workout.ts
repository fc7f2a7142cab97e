/**
 * Workout type definitions.
 * A workout is one of a closed set of variants, discriminated by `kind`.
 */

/** Short type codes sent by the sensor unit. */
export type WorkoutCode = 'RUN' | 'SWM' | 'WLK';

export type WorkoutKind = Workout['kind'];

/** Fields every workout variant carries. */
export interface WorkoutBase {
  readonly actionCount: number; // steps or strokes
  readonly durationHours: number;
  readonly weightKg: number;
}

export interface Running extends WorkoutBase {
  readonly kind: 'running';
}

export interface WalkingWithLoad extends WorkoutBase {
  readonly heightCm: number;
  readonly kind: 'walkingWithLoad';
}

export interface Swimming extends WorkoutBase {
  readonly kind: 'swimming';
  readonly poolLengthMeters: number;
  readonly poolLengthsCount: number;
}

export type Workout = Running | Swimming | WalkingWithLoad;

/**
 * Raw reading as delivered by a sensor unit: a type code and a flat,
 * positional list of parameters.
 */
export interface WorkoutReading {
  data: number[];
  workoutType: string;
}
