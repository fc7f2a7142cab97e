import { promises as fs } from 'node:fs'
import os from 'node:os'
import path from 'node:path'

import { loadReadings, runCli } from '../src/cli'
import { SAMPLE_READINGS } from '../src/samples'
import { Logger } from '../src/utils/logger'

describe('runCli', () => {
  let tmpDir: string
  const quietLog = new Logger(undefined, { minLevel: 'error' })

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'workout-summary-'))
  })

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true })
  })

  it('prints the built-in sample readings', async () => {
    const lines: string[] = []

    const exitCode = await runCli([], (line) => lines.push(line), quietLog)

    expect(exitCode).toBe(0)
    expect(lines).toEqual([
      'Workout type: Swimming; Duration: 1.000 h; Distance: 0.994 km; Mean speed: 1.000 km/h; Calories burned: 336.000.',
      'Workout type: Running; Duration: 1.000 h; Distance: 9.750 km; Mean speed: 9.750 km/h; Calories burned: 699.750.',
      'Workout type: WalkingWithLoad; Duration: 1.000 h; Distance: 5.850 km; Mean speed: 5.850 km/h; Calories burned: 157.500.',
    ])
  })

  it('prints a diagnostic in place of a rejected reading and continues', async () => {
    const file = path.join(tmpDir, 'mixed.json')
    await fs.writeFile(
      file,
      JSON.stringify([
        { workoutType: 'XYZ', data: [1, 2, 3] },
        { workoutType: 'RUN', data: [15000, 1, 75] },
      ]),
    )
    const lines: string[] = []

    const exitCode = await runCli([file], (line) => lines.push(line), quietLog)

    expect(exitCode).toBe(1)
    expect(lines).toEqual([
      'Unrecognized workout type "XYZ"',
      'Workout type: Running; Duration: 1.000 h; Distance: 9.750 km; Mean speed: 9.750 km/h; Calories burned: 699.750.',
    ])
  })

  it('rejects a file that is not a list of readings', async () => {
    const file = path.join(tmpDir, 'invalid.json')
    await fs.writeFile(file, JSON.stringify([{ workoutType: 'RUN', data: 'fast' }]))

    await expect(loadReadings(file)).rejects.toThrow(
      `Invalid readings file "${file}": 0.data: Expected array, received string`,
    )
  })

  it('falls back to the sample readings without a path', async () => {
    await expect(loadReadings()).resolves.toBe(SAMPLE_READINGS)
  })
})
