import { z } from 'zod';

// Fields shared by every workout variant
const WorkoutBaseSchema = z.object({
  actionCount: z.number().int().nonnegative(),
  durationHours: z.number().finite().positive(),
  weightKg: z.number().finite().positive(),
});

export const RunningFieldsSchema = WorkoutBaseSchema;

export const WalkingFieldsSchema = WorkoutBaseSchema.extend({
  heightCm: z.number().finite().positive(),
});

export const SwimmingFieldsSchema = WorkoutBaseSchema.extend({
  poolLengthMeters: z.number().finite().positive(),
  poolLengthsCount: z.number().int().nonnegative(),
});

// Raw reading as sent by a sensor unit
export const WorkoutReadingSchema = z.object({
  workoutType: z.string(),
  data: z.array(z.number()),
});

export const WorkoutReadingListSchema = z.array(WorkoutReadingSchema);

// Summary request body
export const SummaryRequestSchema = z.object({
  packages: WorkoutReadingListSchema.min(1),
});
