#!/usr/bin/env node
/**
 * Command-line driver.
 * Prints one summary line per reading, or a diagnostic line for a reading
 * that could not be summarized, then moves on to the next one.
 *
 * Usage: workout-summary [readings.json]
 * The file holds an array of { "workoutType": "RUN", "data": [15000, 1, 75] }.
 * Without a file the built-in sample readings are used.
 */

import { promises as fs } from 'node:fs';

import { summarizeWorkouts } from './controllers/workouts';
import { SAMPLE_READINGS } from './samples';
import { Logger, logger } from './utils/logger';
import { WorkoutReadingListSchema } from './validation/schemas';

import type { WorkoutReading } from './types';

export type LineWriter = (line: string) => void;

const writeStdout: LineWriter = (line) => {
  process.stdout.write(`${line}\n`);
};

export async function loadReadings(filePath?: string): Promise<WorkoutReading[]> {
  if (!filePath) return SAMPLE_READINGS;

  const raw = await fs.readFile(filePath, 'utf8');
  const parseResult = WorkoutReadingListSchema.safeParse(JSON.parse(raw));
  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new TypeError(`Invalid readings file "${filePath}": ${issues}`);
  }
  return parseResult.data;
}

/**
 * Run the driver and resolve with the process exit code:
 * 0 when every reading was summarized, 1 otherwise.
 */
export async function runCli(
  args: string[],
  write: LineWriter = writeStdout,
  log: Logger = logger,
): Promise<number> {
  const readings = await loadReadings(args[0]);
  const { failed, results } = summarizeWorkouts(readings, log);

  for (const result of results) {
    write(result.success ? result.message : result.error.message);
  }

  return failed > 0 ? 1 : 0;
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      logger.error('Failed to summarize workouts', error);
      process.exitCode = 1;
    });
}
