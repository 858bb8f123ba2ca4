import type { System } from '../System.js'
import { MovementSystem } from './MovementSystem.js'
import { CollisionDetectionSystem } from './CollisionDetectionSystem.js'
import { createGravitySystem } from './GravitySystem.js'
import { CollisionResolutionSystem } from './CollisionResolutionSystem.js'

export { MovementSystem, integrateMotion } from './MovementSystem.js'
export { CollisionDetectionSystem, detectCollisions } from './CollisionDetectionSystem.js'
export { createGravitySystem, accumulateGravity } from './GravitySystem.js'
export { CollisionResolutionSystem, resolveCollisions } from './CollisionResolutionSystem.js'

/**
 * The step pipeline in its fixed order.
 *
 * Detection and gravity both read post-movement positions and neither
 * reads the other's output. Resolution comes after gravity so the
 * impulse works on gravity-updated velocities.
 */
export function createPhysicsPipeline(): System[] {
    return [
        MovementSystem,
        CollisionDetectionSystem,
        createGravitySystem(),
        CollisionResolutionSystem
    ]
}
