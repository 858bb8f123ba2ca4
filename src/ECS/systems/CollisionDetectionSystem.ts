import type { System } from '../System.js'
import type { World } from '../World.js'
import type { BodyRegistry } from '../BodyRegistry.js'
import type { CollisionEvent } from '../Components.js'

/**
 * Exhaustive pairwise overlap test.
 *
 * A pair collides when its penetration depth
 * d = r(a) + r(b) - |pos(a) - pos(b)| is strictly positive; touching
 * spheres (d = 0) do not. Events come out in pair order (a ascending,
 * then b ascending), which is the order the resolver must drain them in.
 */
export function detectCollisions(bodies: BodyRegistry): CollisionEvent[] {
    const events: CollisionEvent[] = []

    const { x: posX, y: posY, z: posZ } = bodies.positions
    const radius = bodies.radii

    for (const [a, b] of bodies.pairs()) {
        const dx = posX[a] - posX[b]
        const dy = posY[a] - posY[b]
        const dz = posZ[a] - posZ[b]
        const depth = radius[a] + radius[b] - Math.sqrt(dx * dx + dy * dy + dz * dz)

        if (depth > 0) {
            events.push({ a, b })
        }
    }

    return events
}

export const CollisionDetectionSystem: System = {
    name: 'CollisionDetection',

    update(world: World): void {
        const { collisions } = world.current
        for (const event of detectCollisions(world.bodies)) {
            collisions.push(event)
        }
    }
}
