import type Vec3 from '../lib/Vector3.js'
import type { IVec3 } from '../lib/Vector3.js'
import { ScalarStore, Vec3Store } from './ComponentStore.js'
import type { Body, BodyHandle, BodyInit, ReadonlyColumn } from './Components.js'
import { SimulationError } from './errors.js'
import { PhysicsConfig } from './PhysicsConfig.js'

/**
 * Every unique unordered index pair of a population of `count`,
 * `i` from 0..count and `j` from i+1..count.
 */
export function* uniquePairs(count: number): Generator<[BodyHandle, BodyHandle]> {
    for (let i = 0; i < count; i++) {
        for (let j = i + 1; j < count; j++) {
            yield [i, j]
        }
    }
}

/**
 * Closed population of bodies in SOA storage.
 *
 * The body list is validated as a whole before any of it is stored, and
 * the population never grows or shrinks afterwards. Handles are dense
 * indices, so a handle stays valid for the life of the registry.
 *
 * Radius and mass columns are written once here; the rest of the
 * simulation only sees them through `radii` and `masses`.
 */
export class BodyRegistry {
    readonly count: number

    readonly positions: Vec3Store
    readonly velocities: Vec3Store
    private readonly radiusStore: ScalarStore
    private readonly massStore: ScalarStore

    constructor(bodies: readonly BodyInit[]) {
        const masses = bodies.map((body, i) => validateBody(body, i))

        this.count = bodies.length
        this.positions = new Vec3Store(this.count)
        this.velocities = new Vec3Store(this.count)
        this.radiusStore = new ScalarStore(this.count)
        this.massStore = new ScalarStore(this.count)

        bodies.forEach((body, i) => {
            this.positions.set(i, body.position.x, body.position.y, body.position.z)
            this.velocities.set(i, body.velocity.x, body.velocity.y, body.velocity.z)
            this.radiusStore.set(i, body.radius)
            this.massStore.set(i, masses[i])
        })
    }

    get radii(): ReadonlyColumn {
        return this.radiusStore.getArray()
    }

    get masses(): ReadonlyColumn {
        return this.massStore.getArray()
    }

    assertHandle(handle: BodyHandle): void {
        if (!Number.isInteger(handle) || handle < 0 || handle >= this.count) {
            throw new SimulationError('StaleHandle', `No body with handle ${handle} (population ${this.count})`)
        }
    }

    get(handle: BodyHandle): Body {
        this.assertHandle(handle)
        return {
            position: this.positions.get(handle),
            velocity: this.velocities.get(handle),
            radius: this.radiusStore.get(handle),
            mass: this.massStore.get(handle)
        }
    }

    position(handle: BodyHandle): Vec3 {
        this.assertHandle(handle)
        return this.positions.get(handle)
    }

    velocity(handle: BodyHandle): Vec3 {
        this.assertHandle(handle)
        return this.velocities.get(handle)
    }

    radius(handle: BodyHandle): number {
        this.assertHandle(handle)
        return this.radiusStore.get(handle)
    }

    mass(handle: BodyHandle): number {
        this.assertHandle(handle)
        return this.massStore.get(handle)
    }

    setPosition(handle: BodyHandle, v: IVec3): void {
        this.assertHandle(handle)
        this.positions.set(handle, v.x, v.y, v.z)
    }

    setVelocity(handle: BodyHandle, v: IVec3): void {
        this.assertHandle(handle)
        this.velocities.set(handle, v.x, v.y, v.z)
    }

    *indices(): Generator<BodyHandle> {
        for (let i = 0; i < this.count; i++) {
            yield i
        }
    }

    pairs(): Generator<[BodyHandle, BodyHandle]> {
        return uniquePairs(this.count)
    }

    snapshot(): Body[] {
        const result: Body[] = []
        for (const i of this.indices()) {
            result.push(this.get(i))
        }
        return result
    }

    /** Independent registry with identical state */
    clone(): BodyRegistry {
        // Mass is re-derived from the same radius, so it comes out identical
        return new BodyRegistry(this.snapshot())
    }
}

function validateBody(body: BodyInit, index: number): number {
    const { radius } = body
    if (!Number.isFinite(radius) || radius <= 0) {
        throw new SimulationError('InvalidRadius', `Body ${index}: radius must be a positive finite number, got ${radius}`)
    }
    const mass = PhysicsConfig.bodyMass(radius)
    if (!Number.isFinite(mass) || mass <= 0) {
        throw new SimulationError('InvalidMass', `Body ${index}: radius ${radius} gives unusable mass ${mass}`)
    }
    return mass
}
