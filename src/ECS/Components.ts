import type Vec3 from '../lib/Vector3.js'
import type { IVec3 } from '../lib/Vector3.js'

/** Dense index of a body in its registry (0..N-1) */
export type BodyHandle = number

/** Read-only view of one per-body column, indexed by handle */
export interface ReadonlyColumn {
    readonly length: number
    readonly [handle: number]: number
}

/** Construction input for one body. Mass is derived from radius. */
export interface BodyInit {
    position: IVec3
    velocity: IVec3
    radius: number
}

/** Copied state of one body */
export interface Body {
    position: Vec3
    velocity: Vec3
    radius: number
    mass: number
}

/**
 * Two bodies overlapping this step. Always `a < b`.
 * Lives only until the resolver drains the step's event list.
 */
export interface CollisionEvent {
    a: BodyHandle
    b: BodyHandle
}
