import type { WorkoutReading } from './types';

/**
 * Readings printed by the CLI when no input file is given.
 */
export const SAMPLE_READINGS: WorkoutReading[] = [
  { workoutType: 'SWM', data: [720, 1, 80, 25, 40] },
  { workoutType: 'RUN', data: [15000, 1, 75] },
  { workoutType: 'WLK', data: [9000, 1, 75, 180] },
];
