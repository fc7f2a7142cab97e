import { readPackage } from '../src/mappers'
import {
  buildSummary,
  getDistanceKm,
  getMeanSpeedKmh,
  getSpentCalories,
} from '../src/models/Workout'
import type { Running, Swimming, WalkingWithLoad } from '../src/types'

describe('workout calculations', () => {
  describe('running', () => {
    const running: Running = { kind: 'running', actionCount: 1000, durationHours: 0.5, weightKg: 60 }

    it('derives distance from steps of 0.65 m', () => {
      expect(getDistanceKm(running)).toBeCloseTo(0.65, 10)
    })

    it('divides distance by duration for mean speed', () => {
      expect(getMeanSpeedKmh(running)).toBeCloseTo(1.3, 10)
    })

    it('applies the running calorie formula', () => {
      // (18 * 1.3 - 20) * 60 / 1000 * 30
      expect(getSpentCalories(running)).toBeCloseTo(6.12, 10)
    })
  })

  describe('walking with load', () => {
    it('floor-divides squared speed by height', () => {
      const walking: WalkingWithLoad = {
        kind: 'walkingWithLoad',
        actionCount: 9000,
        durationHours: 1,
        weightKg: 75,
        heightCm: 10,
      }
      // floor(5.85^2 / 10) = 3 -> (0.035 * 75 + 3 * 0.029 * 75) * 60
      expect(getSpentCalories(walking)).toBeCloseTo(549, 6)
    })

    it('drops the speed term when squared speed is below height', () => {
      const walking: WalkingWithLoad = {
        kind: 'walkingWithLoad',
        actionCount: 9000,
        durationHours: 1,
        weightKg: 75,
        heightCm: 180,
      }
      expect(getMeanSpeedKmh(walking)).toBeCloseTo(5.85, 10)
      expect(getSpentCalories(walking)).toBeCloseTo(157.5, 6)
    })
  })

  describe('swimming', () => {
    const swimming: Swimming = {
      kind: 'swimming',
      actionCount: 0,
      durationHours: 2,
      weightKg: 70,
      poolLengthMeters: 50,
      poolLengthsCount: 20,
    }

    it('measures distance with 1.38 m strokes', () => {
      expect(getDistanceKm({ ...swimming, actionCount: 1000 })).toBeCloseTo(1.38, 10)
    })

    it('computes mean speed from pool lengths regardless of stroke count', () => {
      expect(getMeanSpeedKmh(swimming)).toBeCloseTo(0.5, 10)
      expect(getMeanSpeedKmh({ ...swimming, actionCount: 5000 })).toBeCloseTo(0.5, 10)
    })

    it('applies the swimming calorie formula', () => {
      // (0.5 + 1.1) * 2 * 70
      expect(getSpentCalories(swimming)).toBeCloseTo(224, 10)
    })
  })

  describe('buildSummary', () => {
    it('summarizes the swimming sample reading', () => {
      const summary = buildSummary(readPackage('SWM', [720, 1, 80, 25, 40]))

      expect(summary.workoutTypeName).toBe('Swimming')
      expect(summary.durationHours).toBe(1)
      expect(summary.distanceKm).toBeCloseTo(0.9936, 10)
      expect(summary.meanSpeedKmh).toBeCloseTo(1, 10)
      expect(summary.caloriesSpent).toBeCloseTo(336, 6)
    })

    it('summarizes the running sample reading', () => {
      const summary = buildSummary(readPackage('RUN', [15000, 1, 75]))

      expect(summary.workoutTypeName).toBe('Running')
      expect(summary.distanceKm).toBeCloseTo(9.75, 10)
      expect(summary.meanSpeedKmh).toBeCloseTo(9.75, 10)
      expect(summary.caloriesSpent).toBeCloseTo(699.75, 6)
    })

    it('summarizes the walking sample reading', () => {
      const summary = buildSummary(readPackage('WLK', [9000, 1, 75, 180]))

      expect(summary.workoutTypeName).toBe('WalkingWithLoad')
      expect(summary.distanceKm).toBeCloseTo(5.85, 10)
      expect(summary.meanSpeedKmh).toBeCloseTo(5.85, 10)
      expect(summary.caloriesSpent).toBeCloseTo(157.5, 6)
    })
  })
})
