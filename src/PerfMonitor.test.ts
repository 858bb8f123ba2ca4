import { describe, it, expect } from 'vitest'
import { formatPerfStats, PerfMonitor } from './PerfMonitor.js'
import type { StepResult } from './ECS/World.js'

function stepResult(step: number, passTimes: Record<string, number>, collisions = 0): StepResult {
    return {
        step,
        dt: 0.1,
        collisions: Array.from({ length: collisions }, () => ({ a: 0, b: 1 })),
        degeneratePairs: 0,
        passTimes
    }
}

describe('PerfMonitor', () => {
    it('should report zeros before any step', () => {
        const stats = new PerfMonitor().getStats()

        expect(stats).toEqual({ stepsPerSecond: 0, stepTime: 0, passTimes: {}, collisionsPerStep: 0 })
    })

    it('should average step, pass and collision figures', () => {
        let now = 0
        const monitor = new PerfMonitor(60, () => now)

        monitor.record(stepResult(1, { Movement: 1, Gravity: 3 }, 2))
        now = 50
        monitor.record(stepResult(2, { Movement: 3, Gravity: 5 }, 4))
        now = 100
        monitor.record(stepResult(3, { Movement: 2, Gravity: 4 }, 0))

        const stats = monitor.getStats()
        expect(stats.stepTime).toBe(6)
        expect(stats.passTimes).toEqual({ Movement: 2, Gravity: 4 })
        expect(stats.collisionsPerStep).toBe(2)
        // 2 intervals in 100ms
        expect(stats.stepsPerSecond).toBe(20)
    })

    it('should only keep the rolling window', () => {
        let now = 0
        const monitor = new PerfMonitor(2, () => now)

        for (const ms of [100, 2, 4]) {
            monitor.record(stepResult(1, { Gravity: ms }))
            now += 10
        }

        expect(monitor.getStats().passTimes).toEqual({ Gravity: 3 })
        expect(monitor.getStats().stepsPerSecond).toBe(100)
    })

    it('should forget everything on reset', () => {
        const monitor = new PerfMonitor()
        monitor.record(stepResult(1, { Gravity: 1 }, 1))
        monitor.reset()

        expect(monitor.getStats().stepTime).toBe(0)
        expect(monitor.getStats().passTimes).toEqual({})
    })

    it('should format a one-line summary', () => {
        const line = formatPerfStats({
            stepsPerSecond: 59.94,
            stepTime: 12.3,
            passTimes: { Movement: 0.1, Gravity: 10.5 },
            collisionsPerStep: 3.2
        })

        expect(line).toBe('59.9 steps/s, step 12.30ms (Movement 0.10ms, Gravity 10.50ms), 3.2 collisions/step')
    })
})
