/**
 * Summary type definitions.
 * Types for computed workout summaries and batch results.
 */

import type { WorkoutErrorCode } from '../errors';

export interface SummaryReport {
  readonly caloriesSpent: number;
  readonly distanceKm: number;
  readonly durationHours: number;
  readonly meanSpeedKmh: number;
  readonly workoutTypeName: string;
}

export interface WorkoutSummarySuccess {
  message: string;
  success: true;
  summary: SummaryReport;
  workoutType: string;
}

export interface WorkoutSummaryFailure {
  error: {
    code: WorkoutErrorCode;
    message: string;
  };
  success: false;
  workoutType: string;
}

export type WorkoutSummaryResult = WorkoutSummaryFailure | WorkoutSummarySuccess;

export interface SummaryResponse {
  failed: number;
  results: WorkoutSummaryResult[];
  succeeded: number;
}
