import Vec3 from '../lib/Vector3.js'
import type { BodyRegistry } from './BodyRegistry.js'
import type { BodyHandle } from './Components.js'

/** Σ m·v over all bodies */
export function totalMomentum(bodies: BodyRegistry): Vec3 {
    const { x: velX, y: velY, z: velZ } = bodies.velocities
    const mass = bodies.masses
    const p = Vec3.zero()

    for (let i = 0; i < bodies.count; i++) {
        p.x += mass[i] * velX[i]
        p.y += mass[i] * velY[i]
        p.z += mass[i] * velZ[i]
    }
    return p
}

/** Σ ½·m·|v|² over all bodies */
export function kineticEnergy(bodies: BodyRegistry): number {
    const { x: velX, y: velY, z: velZ } = bodies.velocities
    const mass = bodies.masses
    let energy = 0

    for (let i = 0; i < bodies.count; i++) {
        energy += 0.5 * mass[i] * (velX[i] ** 2 + velY[i] ** 2 + velZ[i] ** 2)
    }
    return energy
}

/**
 * Handles whose position or velocity has a NaN or infinite component.
 * Once such a value appears it spreads to every body it interacts with,
 * so drivers should check this every step.
 */
export function findNonFinite(bodies: BodyRegistry): BodyHandle[] {
    const result: BodyHandle[] = []
    for (const i of bodies.indices()) {
        if (!bodies.positions.get(i).isFinite() || !bodies.velocities.get(i).isFinite()) {
            result.push(i)
        }
    }
    return result
}
