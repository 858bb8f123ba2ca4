// Core exports
export { World, MAX_SIMULATION_FREQUENCY } from './World.js'
export type { StepResult, WorldEvent, WorldEventData, WorldOptions } from './World.js'
export { createSystem } from './System.js'
export type { System } from './System.js'

// Bodies
export { BodyRegistry, uniquePairs } from './BodyRegistry.js'
export type { Body, BodyHandle, BodyInit, CollisionEvent, ReadonlyColumn } from './Components.js'
export { createPopulation, largeBodies, DEFAULT_POPULATION } from './Population.js'
export type { PopulationSettings } from './Population.js'

// Configuration and errors
export { PhysicsConfig, physicsSettings } from './PhysicsConfig.js'
export type { PhysicsSettings } from './PhysicsConfig.js'
export { SimulationError } from './errors.js'
export type { SimulationErrorKind } from './errors.js'

// Systems
export {
    MovementSystem,
    CollisionDetectionSystem,
    CollisionResolutionSystem,
    createGravitySystem,
    createPhysicsPipeline,
    integrateMotion,
    detectCollisions,
    accumulateGravity,
    resolveCollisions
} from './systems/index.js'

// Diagnostics
export { totalMomentum, kineticEnergy, findNonFinite } from './diagnostics.js'

// High-performance storage
export { ScalarStore, Vec3Store, PhysicsScratch } from './ComponentStore.js'

// Vectors
export { default as Vec3, vec3 } from '../lib/Vector3.js'
export type { IVec3 } from '../lib/Vector3.js'
