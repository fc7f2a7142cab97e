/**
 * Summary line formatter.
 * Renders summaries and reading failures as single display lines.
 */

import { ReportConfig } from '../config';
import { InvalidParameterCountError } from '../errors';

import type { WorkoutReadingError } from '../errors';
import type { SummaryReport } from '../types';

function fixed(value: number): string {
  return value.toFixed(ReportConfig.decimalPlaces);
}

export function formatSummary(report: SummaryReport): string {
  return (
    `Workout type: ${report.workoutTypeName}; ` +
    `Duration: ${fixed(report.durationHours)} h; ` +
    `Distance: ${fixed(report.distanceKm)} km; ` +
    `Mean speed: ${fixed(report.meanSpeedKmh)} km/h; ` +
    `Calories burned: ${fixed(report.caloriesSpent)}.`
  );
}

/**
 * Describe a reading failure for display in place of a summary.
 * Parameter count failures also list the received values.
 */
export function formatDiagnostic(error: WorkoutReadingError): string {
  if (error instanceof InvalidParameterCountError) {
    return `${error.message} [${error.received.join(', ')}]`;
  }
  return error.message;
}
