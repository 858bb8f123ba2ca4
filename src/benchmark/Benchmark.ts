/**
 * Step pipeline benchmarks
 *
 * Times each pass on its own and a full world step, over seeded
 * populations of increasing size. The pairwise passes (detection and
 * gravity) are the hot path.
 */

import { BodyRegistry } from '../ECS/BodyRegistry.js'
import { PhysicsScratch } from '../ECS/ComponentStore.js'
import { physicsSettings } from '../ECS/PhysicsConfig.js'
import { createPopulation, DEFAULT_POPULATION } from '../ECS/Population.js'
import {
    accumulateGravity,
    detectCollisions,
    integrateMotion,
    resolveCollisions
} from '../ECS/systems/index.js'
import { World } from '../ECS/World.js'
import { mulberry32 } from '../lib/random.js'

export interface BenchmarkResult {
    /** Which part of the step was timed */
    pass: string
    bodies: number
    iterations: number
    totalMs: number
    avgMs: number
    runsPerSecond: number
}

export interface BenchmarkSuite {
    name: string
    bodies: number
    results: BenchmarkResult[]
}

/** Untimed runs before measuring */
export const WARMUP_RUNS = 3

/**
 * Time `iterations` runs of one pass over a population of `bodies`
 */
export function benchmark(
    pass: string,
    bodies: number,
    iterations: number,
    run: () => void
): BenchmarkResult {
    for (let i = 0; i < WARMUP_RUNS; i++) run()

    const start = performance.now()
    for (let i = 0; i < iterations; i++) {
        run()
    }
    const totalMs = performance.now() - start

    return {
        pass,
        bodies,
        iterations,
        totalMs,
        avgMs: totalMs / iterations,
        runsPerSecond: totalMs > 0 ? (iterations / totalMs) * 1000 : Infinity
    }
}

interface Column {
    title: string
    width: number
    alignLeft?: boolean
    cell(result: BenchmarkResult): string
}

const COLUMNS: Column[] = [
    { title: 'Pass', width: 24, alignLeft: true, cell: r => r.pass },
    { title: 'Bodies', width: 7, cell: r => r.bodies.toString() },
    { title: 'Avg (ms)', width: 10, cell: r => r.avgMs.toFixed(3) },
    { title: 'Runs/s', width: 10, cell: r => r.runsPerSecond.toFixed(0) },
    { title: 'Total (ms)', width: 10, cell: r => r.totalMs.toFixed(1) }
]

function rule(left: string, middle: string, right: string): string {
    return left + COLUMNS.map(c => '─'.repeat(c.width + 2)).join(middle) + right
}

function row(cells: string[]): string {
    const padded = cells.map((text, i) => {
        const { width, alignLeft } = COLUMNS[i]
        return alignLeft ? text.padEnd(width) : text.padStart(width)
    })
    return `│ ${padded.join(' │ ')} │`
}

/**
 * Box-drawn table with one row per timed pass
 */
export function formatResults(results: readonly BenchmarkResult[]): string {
    return [
        rule('┌', '┬', '┐'),
        row(COLUMNS.map(c => c.title)),
        rule('├', '┼', '┤'),
        ...results.map(r => row(COLUMNS.map(c => c.cell(r)))),
        rule('└', '┴', '┘')
    ].join('\n')
}

/**
 * `bodyCounts` are total body counts, including the two large bodies.
 */
export function runBenchmarkSuite(bodyCounts: number[] = [100, 500, 1000, 2002], seed = 1): BenchmarkSuite[] {
    const suites: BenchmarkSuite[] = []
    const settings = physicsSettings()
    const dt = 1 / 60

    for (const count of bodyCounts) {
        const results: BenchmarkResult[] = []
        const population = createPopulation(mulberry32(seed), {
            ...DEFAULT_POPULATION,
            smallBodyCount: Math.max(0, count - 2)
        })
        const n = population.length

        // Pair passes are O(n²): fewer runs for larger populations
        const iters = Math.max(5, Math.floor(20000 / n))

        const moved = new BodyRegistry(population)
        results.push(benchmark('Movement', n, iters, () => integrateMotion(moved, dt)))

        const detected = new BodyRegistry(population)
        results.push(benchmark('Collision detection', n, iters, () => { detectCollisions(detected) }))

        const attracted = new BodyRegistry(population)
        const scratch = new PhysicsScratch(n)
        results.push(benchmark('Gravity', n, iters, () => { accumulateGravity(attracted, dt, settings, scratch) }))

        const resolved = new BodyRegistry(population)
        results.push(benchmark('Detection + resolution', n, iters, () => {
            resolveCollisions(resolved, detectCollisions(resolved), settings)
        }))

        const world = new World(new BodyRegistry(population), settings)
        results.push(benchmark('Full step', n, iters, () => { world.step(dt) }))

        suites.push({ name: `${n} bodies`, bodies: n, results })
    }

    return suites
}
