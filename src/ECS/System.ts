import type { World } from './World.js'

/**
 * One pass of the step pipeline.
 *
 * Systems run in registration order, once per step, with the step's dt.
 * Per-step output (collision events, degenerate pair counts) goes into
 * `world.current`.
 */
export interface System {
    /** Unique name, also the key of the pass timing in StepResult */
    name: string

    /** Called once when system is registered */
    init?(world: World): void

    /** Called each step with delta time */
    update(world: World, dt: number): void
}

/**
 * Create a simple system from a configuration object.
 */
export function createSystem(config: {
    name: string
    init?: (world: World) => void
    update: (world: World, dt: number) => void
}): System {
    return config
}
