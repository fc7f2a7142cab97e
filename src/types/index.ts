/**
 * Centralized type exports.
 * All type definitions are exported from this index for consistent imports.
 */

// Summary types
export type {
  SummaryReport,
  SummaryResponse,
  WorkoutSummaryFailure,
  WorkoutSummaryResult,
  WorkoutSummarySuccess,
} from './summary';

// Workout types
export type {
  Running,
  Swimming,
  WalkingWithLoad,
  Workout,
  WorkoutBase,
  WorkoutCode,
  WorkoutKind,
  WorkoutReading,
} from './workout';
