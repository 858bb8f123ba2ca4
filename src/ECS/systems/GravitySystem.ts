import type { System } from '../System.js'
import type { World } from '../World.js'
import type { BodyRegistry } from '../BodyRegistry.js'
import { PhysicsScratch } from '../ComponentStore.js'
import type { PhysicsSettings } from '../PhysicsConfig.js'
import type { BodyHandle } from '../Components.js'

/**
 * Direct O(n²) gravitational velocity update.
 *
 * For every unique pair (a, b), with v = pos(a) - pos(b) and r = |v|:
 *   vel(a) -= m(b) * G / r² * dt * v / r
 *   vel(b) += m(a) * G / r² * dt * v / r
 *
 * Per-pair deltas are summed into scratch arrays and applied after the
 * pair loop, so every pair sees the same positions and the result does
 * not depend on how the pairs are split up.
 *
 * Pairs closer than `minSeparation` have no usable direction and are
 * skipped and passed to `onSkip`. Returns how many were skipped.
 */
export function accumulateGravity(
    bodies: BodyRegistry,
    dt: number,
    settings: PhysicsSettings,
    scratch: PhysicsScratch = new PhysicsScratch(bodies.count),
    onSkip?: (a: BodyHandle, b: BodyHandle) => void
): number {
    const n = bodies.count
    if (n === 0) return 0

    const { G, minSeparation } = settings
    const minSepSq = minSeparation * minSeparation

    scratch.grow(n)
    scratch.clear(n)
    const { dvX, dvY, dvZ } = scratch

    const { x: posX, y: posY, z: posZ } = bodies.positions
    const { x: velX, y: velY, z: velZ } = bodies.velocities
    const mass = bodies.masses

    let degenerate = 0

    // Newton's 3rd law: one evaluation per pair
    for (let i = 0; i < n; i++) {
        const pxi = posX[i]
        const pyi = posY[i]
        const pzi = posZ[i]
        const mi = mass[i]

        for (let j = i + 1; j < n; j++) {
            const dx = pxi - posX[j]
            const dy = pyi - posY[j]
            const dz = pzi - posZ[j]
            const distSq = dx * dx + dy * dy + dz * dz

            if (!(distSq > minSepSq)) {
                degenerate++
                onSkip?.(i, j)
                continue
            }

            const dist = Math.sqrt(distSq)
            // G / r² * dt, folded with the 1/r of the direction
            const k = (G / distSq) * dt / dist
            const ux = dx * k
            const uy = dy * k
            const uz = dz * k

            const mj = mass[j]
            dvX[i] -= ux * mj
            dvY[i] -= uy * mj
            dvZ[i] -= uz * mj
            dvX[j] += ux * mi
            dvY[j] += uy * mi
            dvZ[j] += uz * mi
        }
    }

    for (let i = 0; i < n; i++) {
        velX[i] += dvX[i]
        velY[i] += dvY[i]
        velZ[i] += dvZ[i]
    }

    return degenerate
}

/**
 * Gravity pass. Each instance owns its scratch space.
 */
export function createGravitySystem(): System {
    const scratch = new PhysicsScratch(0)

    return {
        name: 'Gravity',

        update(world: World, dt: number): void {
            accumulateGravity(world.bodies, dt, world.settings, scratch, (a, b) => world.markDegenerate(a, b))
        }
    }
}
