import { formatDiagnostic, formatSummary } from '../formatters/summary';
import { safeReadPackage } from '../mappers';
import { buildSummary } from '../models/Workout';
import { Logger } from '../utils/logger';

import type { SummaryResponse, WorkoutReading, WorkoutSummaryResult } from '../types';

/**
 * Summarize one reading. Reading failures become a failed result;
 * any other error propagates.
 */
export const summarizeWorkout = (
  reading: WorkoutReading,
  log?: Logger,
): WorkoutSummaryResult => {
  const { data, workoutType } = reading;
  const result = safeReadPackage(workoutType, data);

  if (!result.success) {
    log?.warn('Workout reading rejected', {
      code: result.error.code,
      parameters: data,
      workoutType,
    });
    return {
      error: {
        code: result.error.code,
        message: formatDiagnostic(result.error),
      },
      success: false,
      workoutType,
    };
  }

  const summary = buildSummary(result.workout);
  log?.debug('Workout summarized', { summary, workoutType });

  return {
    message: formatSummary(summary),
    success: true,
    summary,
    workoutType,
  };
};

/**
 * Summarize every reading independently, in input order.
 * One rejected reading never stops the rest of the batch.
 */
export const summarizeWorkouts = (readings: WorkoutReading[], log?: Logger): SummaryResponse => {
  const timer = log?.startTimer('summarizeWorkouts');

  log?.debug('Processing workout readings', { count: readings.length });

  const results = readings.map((reading) => summarizeWorkout(reading, log));
  const succeeded = results.filter((result) => result.success).length;
  const failed = results.length - succeeded;

  timer?.end(failed > 0 ? 'warn' : 'info', 'Workout readings processed', { failed, succeeded });

  return { failed, results, succeeded };
};
