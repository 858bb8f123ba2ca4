import type { System } from '../System.js'
import type { World } from '../World.js'
import type { BodyRegistry } from '../BodyRegistry.js'

/**
 * Explicit Euler position update: x += v * dt.
 * Bodies are independent, so this is a single linear pass.
 */
export function integrateMotion(bodies: BodyRegistry, dt: number): void {
    const { x: posX, y: posY, z: posZ } = bodies.positions
    const { x: velX, y: velY, z: velZ } = bodies.velocities

    for (let i = 0; i < bodies.count; i++) {
        posX[i] += velX[i] * dt
        posY[i] += velY[i] * dt
        posZ[i] += velZ[i] * dt
    }
}

/**
 * Moves every body by last step's velocity. Runs first, so detection
 * and gravity both see this step's positions.
 */
export const MovementSystem: System = {
    name: 'Movement',

    update(world: World, dt: number): void {
        integrateMotion(world.bodies, dt)
    }
}
