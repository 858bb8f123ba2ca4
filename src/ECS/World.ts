import { AppLog } from '../AppLog.js'
import type { BodyRegistry } from './BodyRegistry.js'
import type { BodyHandle, CollisionEvent } from './Components.js'
import { SimulationError } from './errors.js'
import { physicsSettings, type PhysicsSettings } from './PhysicsConfig.js'
import type { System } from './System.js'
import { createPhysicsPipeline } from './systems/index.js'

/**
 * Everything one step produced
 */
export interface StepResult {
    /** 1-based number of this step */
    step: number
    dt: number
    /** Collision events in emission order */
    collisions: CollisionEvent[]
    /** Distinct pairs skipped because their centres (nearly) coincide */
    degeneratePairs: number
    /** Wall-clock milliseconds per system, keyed by system name */
    passTimes: Record<string, number>
}

/**
 * Event types for the step lifecycle
 */
export type WorldEvent = 'step' | 'degenerate'

export interface WorldEventData {
    step: StepResult
    degenerate: { step: number; pairs: number }
}

type EventCallback<T extends WorldEvent> = (data: WorldEventData[T]) => void

type ListenerMap = { [K in WorldEvent]: Set<EventCallback<K>> }

export interface WorldOptions extends Partial<PhysicsSettings> {
    /** Step pipeline in run order. Defaults to createPhysicsPipeline() */
    systems?: System[]
    /** Ticker frequency in steps per second */
    simulationFrequency?: number
}

/**
 * Simulation world: a body registry plus the ordered passes that advance it.
 *
 * Features:
 * - Caller-driven step(dt) returning the step's collision events
 * - Fixed pass order (move, detect, gravity, resolve by default)
 * - Per-pass timing
 * - Event system for step hooks
 * - Optional fixed-timestep ticker for real-time runs
 */
export class World {
    readonly bodies: BodyRegistry
    readonly settings: PhysicsSettings

    /** State of the step in progress (or the last completed one) */
    current: StepResult = emptyStep(0, 0)

    private systems: System[] = []
    private _stepCount = 0
    private degenerate = new Set<number>()

    private eventListeners: ListenerMap = {
        step: new Set(),
        degenerate: new Set()
    }

    // Time management
    private ticker: Ticker

    constructor(bodies: BodyRegistry, options: WorldOptions = {}) {
        this.bodies = bodies
        this.settings = physicsSettings(options)
        this.ticker = new Ticker(options.simulationFrequency ?? 60, () => {
            this.step(this.ticker.getDeltaTime())
        })
        this.registerSystems(options.systems ?? createPhysicsPipeline())
    }

    // ==================== Time Factor ====================

    set timeFactor(factor: number) {
        if (!Number.isFinite(factor) || factor <= 0) {
            throw new RangeError(`Time factor must be positive, got ${factor}`)
        }
        this.ticker.timeFactor = factor
    }

    get timeFactor(): number {
        return this.ticker.timeFactor
    }

    // ==================== Simulation Control ====================

    start(): void {
        this.ticker.start()
        AppLog.info('Simulation started')
    }

    stop(): void {
        this.ticker.stop()
        AppLog.info('Simulation stopped')
    }

    get isRunning(): boolean {
        return this.ticker.isRunning
    }

    get stepCount(): number {
        return this._stepCount
    }

    /**
     * Advance the simulation by dt seconds.
     */
    step(dt: number): StepResult {
        if (!Number.isFinite(dt) || dt <= 0) {
            throw new SimulationError('InvalidTimeStep', `dt must be a positive finite number, got ${dt}`)
        }

        const result = emptyStep(this._stepCount + 1, dt)
        this.current = result
        this.degenerate.clear()

        for (const system of this.systems) {
            const start = performance.now()
            system.update(this, dt)
            result.passTimes[system.name] = performance.now() - start
        }

        this._stepCount = result.step
        this.emit('step', result)
        if (result.degeneratePairs > 0) {
            this.emit('degenerate', { step: result.step, pairs: result.degeneratePairs })
        }
        return result
    }

    /**
     * Record a pair a pass skipped this step. A pair skipped by several
     * passes counts once.
     */
    markDegenerate(a: BodyHandle, b: BodyHandle): void {
        const [lo, hi] = a < b ? [a, b] : [b, a]
        this.degenerate.add(lo * this.bodies.count + hi)
        this.current.degeneratePairs = this.degenerate.size
    }

    // ==================== System Management ====================

    registerSystem(system: System): void {
        if (this.systems.some(s => s.name === system.name)) {
            throw new Error(`System already registered: ${system.name}`)
        }
        system.init?.(this)
        this.systems.push(system)
    }

    registerSystems(systems: System[]): void {
        for (const system of systems) {
            this.registerSystem(system)
        }
    }

    unregisterSystem(name: string): boolean {
        const idx = this.systems.findIndex(s => s.name === name)
        if (idx === -1) return false
        this.systems.splice(idx, 1)
        return true
    }

    get systemNames(): string[] {
        return this.systems.map(s => s.name)
    }

    // ==================== Events ====================

    on<T extends WorldEvent>(event: T, callback: EventCallback<T>): void {
        this.listeners(event).add(callback)
    }

    off<T extends WorldEvent>(event: T, callback: EventCallback<T>): void {
        this.listeners(event).delete(callback)
    }

    private emit<T extends WorldEvent>(event: T, data: WorldEventData[T]): void {
        for (const callback of this.listeners(event)) {
            callback(data)
        }
    }

    private listeners<T extends WorldEvent>(event: T): Set<EventCallback<T>> {
        return this.eventListeners[event]
    }
}

/** Timers resolve whole milliseconds, so the ticker interval is at least 1 ms */
export const MAX_SIMULATION_FREQUENCY = 1000

function emptyStep(step: number, dt: number): StepResult {
    return { step, dt, collisions: [], degeneratePairs: 0, passTimes: {} }
}

/**
 * Fixed-timestep ticker for physics simulation.
 */
class Ticker {
    private interval: number
    private timer: ReturnType<typeof setInterval> | null = null
    timeFactor: number = 1.0

    constructor(
        frequency: number,
        private callback: () => void
    ) {
        if (!Number.isFinite(frequency) || frequency <= 0 || frequency > MAX_SIMULATION_FREQUENCY) {
            throw new RangeError(
                `Simulation frequency must be in (0, ${MAX_SIMULATION_FREQUENCY}] Hz, got ${frequency}`
            )
        }
        this.interval = Math.round(1000 / frequency)
    }

    get isRunning(): boolean {
        return this.timer !== null
    }

    start(): void {
        if (this.timer !== null) return
        this.timer = setInterval(() => this.callback(), this.interval)
    }

    stop(): void {
        if (this.timer !== null) {
            clearInterval(this.timer)
            this.timer = null
        }
    }

    getDeltaTime(): number {
        return (this.interval / 1000) * this.timeFactor
    }
}
