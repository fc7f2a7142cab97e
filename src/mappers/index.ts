/**
 * Data mapper exports.
 * Functions for transforming raw readings into typed objects.
 */

export { isWorkoutCode, PARAMETER_NAMES, readPackage, safeReadPackage } from './workoutMapper';
export type { ReadPackageResult } from './workoutMapper';
