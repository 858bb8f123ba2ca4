import type { System } from '../System.js'
import type { World } from '../World.js'
import type { BodyRegistry } from '../BodyRegistry.js'
import type { BodyHandle, CollisionEvent } from '../Components.js'
import type { PhysicsSettings } from '../PhysicsConfig.js'

/**
 * Elastic collision response for a list of overlapping pairs.
 *
 * Events are handled strictly in order, and each one re-reads positions
 * and velocities from the registry: a body in several events sees the
 * result of the earlier ones.
 *
 * Per event, with v = pos(a) - pos(b), d = r(a) + r(b) - |v|, n = v / |v|:
 * - de-penetration: a moves +n * d * m(b)/M, b moves -n * d * m(a)/M
 * - impulse: 1-D elastic exchange along v (momentum and kinetic energy
 *   along the centre line are conserved)
 *
 * Events whose centres coincide (|v| <= minSeparation) are skipped and
 * passed to `onSkip`. Returns how many were skipped.
 */
export function resolveCollisions(
    bodies: BodyRegistry,
    events: readonly CollisionEvent[],
    settings: Pick<PhysicsSettings, 'minSeparation'>,
    onSkip?: (a: BodyHandle, b: BodyHandle) => void
): number {
    const { x: posX, y: posY, z: posZ } = bodies.positions
    const { x: velX, y: velY, z: velZ } = bodies.velocities
    const radius = bodies.radii
    const mass = bodies.masses
    const minSepSq = settings.minSeparation * settings.minSeparation

    let degenerate = 0

    for (const { a, b } of events) {
        bodies.assertHandle(a)
        bodies.assertHandle(b)

        const vx = posX[a] - posX[b]
        const vy = posY[a] - posY[b]
        const vz = posZ[a] - posZ[b]
        const distSq = vx * vx + vy * vy + vz * vz

        if (!(distSq > minSepSq)) {
            degenerate++
            onSkip?.(a, b)
            continue
        }

        const dist = Math.sqrt(distSq)
        const depth = radius[a] + radius[b] - dist
        const nx = vx / dist
        const ny = vy / dist
        const nz = vz / dist

        const ma = mass[a]
        const mb = mass[b]
        const totalMass = ma + mb
        const massRatio = mb / totalMass

        // Positional correction, split by the other body's mass share
        const shiftA = depth * massRatio
        const shiftB = depth * (1 - massRatio)
        posX[a] += nx * shiftA
        posY[a] += ny * shiftA
        posZ[a] += nz * shiftA
        posX[b] -= nx * shiftB
        posY[b] -= ny * shiftB
        posZ[b] -= nz * shiftB

        // Relative velocity projected on the centre line
        const dvx = velX[a] - velX[b]
        const dvy = velY[a] - velY[b]
        const dvz = velZ[a] - velZ[b]
        const proj = (dvx * vx + dvy * vy + dvz * vz) / distSq

        // b's update uses (vel(b) - vel(a))·(-v) * (-v), which is +proj * v
        const impulseA = (2 * mb / totalMass) * proj
        const impulseB = (2 * ma / totalMass) * proj
        velX[a] -= impulseA * vx
        velY[a] -= impulseA * vy
        velZ[a] -= impulseA * vz
        velX[b] += impulseB * vx
        velY[b] += impulseB * vy
        velZ[b] += impulseB * vz
    }

    return degenerate
}

/**
 * Drains this step's collision events. Runs last, after gravity.
 */
export const CollisionResolutionSystem: System = {
    name: 'CollisionResolution',

    update(world: World): void {
        resolveCollisions(world.bodies, world.current.collisions, world.settings, (a, b) => world.markDegenerate(a, b))
    }
}
