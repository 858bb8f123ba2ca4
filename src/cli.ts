/**
 * Headless driver: builds a world from settings and runs it, either for
 * a fixed number of fixed-length steps or in real time on the ticker.
 *
 * The physics core never reports anything itself; checking for
 * non-finite state and logging progress happen here.
 */

import { AppLog } from './AppLog.js'
import { BodyRegistry } from './ECS/BodyRegistry.js'
import { findNonFinite, kineticEnergy, totalMomentum } from './ECS/diagnostics.js'
import { createPopulation } from './ECS/Population.js'
import { World, type StepResult } from './ECS/World.js'
import { formatResults, runBenchmarkSuite } from './benchmark/Benchmark.js'
import { mulberry32 } from './lib/random.js'
import type { IVec3 } from './lib/Vector3.js'
import { formatPerfStats, PerfMonitor } from './PerfMonitor.js'
import { parseSettings, USAGE, type SimSettings } from './SimSettings.js'

export function createWorld(settings: SimSettings): World {
    const bodies = new BodyRegistry(createPopulation(mulberry32(settings.seed), settings))
    const world = new World(bodies, { G: settings.G, simulationFrequency: settings.frequency })

    world.on('degenerate', ({ step, pairs }) => {
        AppLog.warn(`Step ${step}: skipped ${pairs} pair(s) with coincident centres`)
    })
    return world
}

/**
 * Logs an error and returns false when any body has gone non-finite.
 */
export function checkFinite(world: World): boolean {
    const bad = findNonFinite(world.bodies)
    if (bad.length === 0) return true

    const shown = bad.slice(0, 10).join(', ')
    const more = bad.length > 10 ? ` and ${bad.length - 10} more` : ''
    AppLog.error(`Step ${world.stepCount}: non-finite state in bodies ${shown}${more}`)
    return false
}

function formatVec(v: IVec3): string {
    return `(${v.x.toExponential(3)}, ${v.y.toExponential(3)}, ${v.z.toExponential(3)})`
}

function report(world: World, result: StepResult, monitor: PerfMonitor, every: number): void {
    if (every <= 0 || result.step % every !== 0) return

    const p = totalMomentum(world.bodies)
    const e = kineticEnergy(world.bodies)
    const stats = monitor.getStats()
    AppLog.info(`Step ${result.step}: ${result.collisions.length} collisions, p=${formatVec(p)}, KE=${e.toExponential(4)}, ${stats.stepTime.toFixed(2)}ms/step`)
    AppLog.debug(formatPerfStats(stats))
}

function runFixed(world: World, settings: SimSettings): number {
    const monitor = new PerfMonitor()

    for (let i = 0; i < settings.steps; i++) {
        const result = world.step(settings.dt)
        monitor.record(result)
        if (!checkFinite(world)) return 1
        report(world, result, monitor, settings.reportEvery)
    }

    AppLog.info(`Finished ${world.stepCount} steps: ${formatPerfStats(monitor.getStats())}`)
    return 0
}

function runRealtime(world: World, settings: SimSettings): Promise<number> {
    const monitor = new PerfMonitor()

    return new Promise(resolve => {
        let exitCode = 0

        const finish = (): void => {
            clearTimeout(timer)
            world.off('step', onStep)
            world.stop()
            AppLog.info(`Finished ${world.stepCount} steps: ${formatPerfStats(monitor.getStats())}`)
            resolve(exitCode)
        }

        const onStep = (result: StepResult): void => {
            monitor.record(result)
            if (!checkFinite(world)) {
                exitCode = 1
                finish()
                return
            }
            report(world, result, monitor, settings.reportEvery)
        }

        const timer = setTimeout(finish, settings.duration * 1000)
        world.on('step', onStep)
        world.start()
    })
}

function runBenchmarks(): number {
    for (const suite of runBenchmarkSuite()) {
        console.log(`\n### ${suite.name} ###\n`)
        console.log(formatResults(suite.results))
    }
    return 0
}

/**
 * Entry point. Returns the process exit code.
 */
export async function run(argv: readonly string[]): Promise<number> {
    let settings: SimSettings
    try {
        settings = parseSettings(argv)
    } catch (err) {
        AppLog.error(err instanceof Error ? err.message : String(err))
        console.log(USAGE)
        return 1
    }

    if (settings.help) {
        console.log(USAGE)
        return 0
    }

    AppLog.level = settings.logLevel

    if (settings.bench) {
        return runBenchmarks()
    }

    const world = createWorld(settings)
    AppLog.info(`Created ${world.bodies.count} bodies (seed ${settings.seed})`)

    return settings.realtime ? runRealtime(world, settings) : runFixed(world, settings)
}
