/**
 * Simulation settings for the headless driver.
 * Parsed from command-line flags; anything not given keeps its default.
 */

import { parseArgs } from 'node:util'
import { isLogLevel, type LogLevel } from './AppLog.js'
import { PhysicsConfig } from './ECS/PhysicsConfig.js'
import { DEFAULT_POPULATION, type PopulationSettings } from './ECS/Population.js'
import { MAX_SIMULATION_FREQUENCY } from './ECS/World.js'

export interface SimSettings extends PopulationSettings {
    seed: number
    G: number
    /** Fixed step length in seconds */
    dt: number
    /** Steps to run in fixed mode */
    steps: number
    realtime: boolean
    /** Seconds to run in real-time mode */
    duration: number
    /** Ticker frequency in real-time mode */
    frequency: number
    /** Log a progress line every N steps (0 disables) */
    reportEvery: number
    logLevel: LogLevel
    bench: boolean
    help: boolean
}

export const DEFAULT_SETTINGS: SimSettings = {
    ...DEFAULT_POPULATION,
    seed: 1,
    G: PhysicsConfig.G,
    dt: 1 / 60,
    steps: 600,
    realtime: false,
    duration: 10,
    frequency: 60,
    reportEvery: 60,
    logLevel: 'info',
    bench: false,
    help: false
}

const OPTIONS = {
    seed: { type: 'string' },
    bodies: { type: 'string', short: 'n' },
    extent: { type: 'string' },
    speed: { type: 'string' },
    'radius-min': { type: 'string' },
    'radius-range': { type: 'string' },
    g: { type: 'string' },
    dt: { type: 'string' },
    steps: { type: 'string', short: 's' },
    realtime: { type: 'boolean' },
    duration: { type: 'string' },
    frequency: { type: 'string' },
    'report-every': { type: 'string' },
    'log-level': { type: 'string' },
    bench: { type: 'boolean' },
    help: { type: 'boolean', short: 'h' }
} as const

export const USAGE = `Usage: gravisphere [options]

  --seed <int>           PRNG seed (default ${DEFAULT_SETTINGS.seed})
  -n, --bodies <int>     small body count (default ${DEFAULT_SETTINGS.smallBodyCount})
  --extent <num>         spawn cube edge length (default ${DEFAULT_SETTINGS.spawnExtent})
  --speed <num>          max small body velocity component (default ${DEFAULT_SETTINGS.speed})
  --radius-min <num>     smallest small body radius (default ${DEFAULT_SETTINGS.radiusMin})
  --radius-range <num>   small body radius spread (default ${DEFAULT_SETTINGS.radiusRange})
  --g <num>              gravitational constant (default ${DEFAULT_SETTINGS.G})
  --dt <num>             fixed step in seconds (default ${DEFAULT_SETTINGS.dt})
  -s, --steps <int>      steps to run (default ${DEFAULT_SETTINGS.steps})
  --realtime             drive with the fixed-timestep ticker instead
  --duration <num>       real-time run length in seconds (default ${DEFAULT_SETTINGS.duration})
  --frequency <num>      ticker steps per second, at most ${MAX_SIMULATION_FREQUENCY} (default ${DEFAULT_SETTINGS.frequency})
  --report-every <int>   progress line interval in steps, 0 for none (default ${DEFAULT_SETTINGS.reportEvery})
  --log-level <level>    debug | info | warn | error (default ${DEFAULT_SETTINGS.logLevel})
  --bench                run the pass benchmarks and exit
  -h, --help             show this help`

interface NumberRule {
    integer?: boolean
    /** Allow zero (values must otherwise be > 0) */
    allowZero?: boolean
    /** Allow any finite value, including negatives */
    anySign?: boolean
    /** Inclusive upper bound */
    max?: number
}

function parseNumber(flag: string, raw: string | undefined, fallback: number, rule: NumberRule = {}): number {
    if (raw === undefined) return fallback

    const value = Number(raw)
    if (raw.trim() === '' || !Number.isFinite(value)) {
        throw new Error(`--${flag} expects a number, got "${raw}"`)
    }
    if (rule.integer && !Number.isInteger(value)) {
        throw new Error(`--${flag} expects an integer, got "${raw}"`)
    }
    if (!rule.anySign) {
        if (value < 0 || (value === 0 && !rule.allowZero)) {
            throw new Error(`--${flag} must be ${rule.allowZero ? 'zero or more' : 'positive'}, got "${raw}"`)
        }
    }
    if (rule.max !== undefined && value > rule.max) {
        throw new Error(`--${flag} must be at most ${rule.max}, got "${raw}"`)
    }
    return value
}

/**
 * Build settings from argv (without the node binary and script path).
 * Throws an Error naming the flag on invalid input.
 */
export function parseSettings(argv: readonly string[]): SimSettings {
    const { values } = parseArgs({ args: [...argv], options: OPTIONS, strict: true, allowPositionals: false })
    const d = DEFAULT_SETTINGS

    const logLevel = values['log-level'] ?? d.logLevel
    if (!isLogLevel(logLevel)) {
        throw new Error(`--log-level expects debug, info, warn or error, got "${logLevel}"`)
    }

    return {
        seed: parseNumber('seed', values.seed, d.seed, { integer: true, anySign: true }),
        smallBodyCount: parseNumber('bodies', values.bodies, d.smallBodyCount, { integer: true, allowZero: true }),
        spawnExtent: parseNumber('extent', values.extent, d.spawnExtent),
        speed: parseNumber('speed', values.speed, d.speed, { allowZero: true }),
        radiusMin: parseNumber('radius-min', values['radius-min'], d.radiusMin),
        radiusRange: parseNumber('radius-range', values['radius-range'], d.radiusRange, { allowZero: true }),
        G: parseNumber('g', values.g, d.G, { allowZero: true }),
        dt: parseNumber('dt', values.dt, d.dt),
        steps: parseNumber('steps', values.steps, d.steps, { integer: true, allowZero: true }),
        realtime: values.realtime ?? d.realtime,
        duration: parseNumber('duration', values.duration, d.duration),
        frequency: parseNumber('frequency', values.frequency, d.frequency, { max: MAX_SIMULATION_FREQUENCY }),
        reportEvery: parseNumber('report-every', values['report-every'], d.reportEvery, { integer: true, allowZero: true }),
        logLevel,
        bench: values.bench ?? d.bench,
        help: values.help ?? d.help
    }
}
