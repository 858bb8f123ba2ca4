/**
 * Body component storage, one Float64Array per scalar (SOA layout).
 * Index i in every store belongs to body handle i.
 */

import Vec3 from '../lib/Vector3.js'

/**
 * Numeric component store using Float64Array
 * Stores scalar values (radius, mass)
 */
export class ScalarStore {
    private data: Float64Array

    constructor(capacity: number) {
        this.data = new Float64Array(capacity)
    }

    get(index: number): number {
        return this.data[index]
    }

    set(index: number, value: number): void {
        this.data[index] = value
    }

    getArray(): Float64Array {
        return this.data
    }
}

/**
 * Vector3 component store using parallel Float64Arrays (SOA)
 * Stores x, y and z components separately for cache efficiency
 */
export class Vec3Store {
    private _x: Float64Array
    private _y: Float64Array
    private _z: Float64Array

    constructor(capacity: number) {
        this._x = new Float64Array(capacity)
        this._y = new Float64Array(capacity)
        this._z = new Float64Array(capacity)
    }

    get(index: number): Vec3 {
        return new Vec3(this._x[index], this._y[index], this._z[index])
    }

    set(index: number, x: number, y: number, z: number): void {
        this._x[index] = x
        this._y[index] = y
        this._z[index] = z
    }

    get x(): Float64Array {
        return this._x
    }

    get y(): Float64Array {
        return this._y
    }

    get z(): Float64Array {
        return this._z
    }
}

/**
 * Pre-allocated scratch arrays for pairwise velocity deltas
 * Avoids allocations in hot loops
 */
export class PhysicsScratch {
    dvX: Float64Array
    dvY: Float64Array
    dvZ: Float64Array
    capacity: number

    constructor(capacity: number) {
        this.capacity = capacity
        this.dvX = new Float64Array(capacity)
        this.dvY = new Float64Array(capacity)
        this.dvZ = new Float64Array(capacity)
    }

    clear(count: number): void {
        // Faster than creating new arrays
        this.dvX.fill(0, 0, count)
        this.dvY.fill(0, 0, count)
        this.dvZ.fill(0, 0, count)
    }

    grow(newCapacity: number): void {
        if (newCapacity <= this.capacity) return
        this.dvX = new Float64Array(newCapacity)
        this.dvY = new Float64Array(newCapacity)
        this.dvZ = new Float64Array(newCapacity)
        this.capacity = newCapacity
    }
}
