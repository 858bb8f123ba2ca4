/**
 * Step Performance Monitor
 *
 * Tracks rolling averages of:
 * - Steps per second (wall clock)
 * - Step time (ms, sum of all passes)
 * - Per-pass time (ms)
 * - Collisions per step
 */

import type { StepResult } from './ECS/World.js'

export interface PerfStats {
    stepsPerSecond: number
    stepTime: number
    passTimes: Record<string, number>
    collisionsPerStep: number
}

export class PerfMonitor {
    private stepTimes: number[] = []
    private collisionCounts: number[] = []
    private passTimes = new Map<string, number[]>()
    private stampTimes: number[] = []

    // Rolling window size for averaging
    private readonly windowSize: number

    constructor(windowSize = 60, private now: () => number = () => performance.now()) {
        this.windowSize = windowSize
    }

    /**
     * Call after each step with its result
     */
    record(result: StepResult): void {
        let total = 0
        for (const [name, ms] of Object.entries(result.passTimes)) {
            total += ms
            let times = this.passTimes.get(name)
            if (!times) {
                times = []
                this.passTimes.set(name, times)
            }
            this.push(times, ms)
        }
        this.push(this.stepTimes, total)
        this.push(this.collisionCounts, result.collisions.length)
        this.push(this.stampTimes, this.now())
    }

    getStats(): PerfStats {
        const passTimes: Record<string, number> = {}
        for (const [name, times] of this.passTimes) {
            passTimes[name] = average(times)
        }

        let stepsPerSecond = 0
        if (this.stampTimes.length > 1) {
            const elapsed = this.stampTimes[this.stampTimes.length - 1] - this.stampTimes[0]
            if (elapsed > 0) {
                stepsPerSecond = (this.stampTimes.length - 1) / (elapsed / 1000)
            }
        }

        return {
            stepsPerSecond,
            stepTime: average(this.stepTimes),
            passTimes,
            collisionsPerStep: average(this.collisionCounts)
        }
    }

    reset(): void {
        this.stepTimes = []
        this.collisionCounts = []
        this.passTimes.clear()
        this.stampTimes = []
    }

    private push(values: number[], value: number): void {
        values.push(value)
        if (values.length > this.windowSize) {
            values.shift()
        }
    }
}

function average(values: number[]): number {
    return values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : 0
}

/**
 * One-line summary for the log
 */
export function formatPerfStats(stats: PerfStats): string {
    const passes = Object.entries(stats.passTimes)
        .map(([name, ms]) => `${name} ${ms.toFixed(2)}ms`)
        .join(', ')
    return `${stats.stepsPerSecond.toFixed(1)} steps/s, step ${stats.stepTime.toFixed(2)}ms (${passes}), ${stats.collisionsPerStep.toFixed(1)} collisions/step`
}
