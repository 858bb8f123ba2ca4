// 3D Vector class for body state and diagnostics

export function vec3(x: number, y: number, z: number): Vec3 {
    return new Vec3(x, y, z)
}

export interface IVec3 {
    x: number
    y: number
    z: number
}

export default class Vec3 implements IVec3 {
    constructor(
        public x: number,
        public y: number,
        public z: number
    ) {}

    /** this += v * s */
    addScaled(v: IVec3, s: number): Vec3 {
        this.x += v.x * s
        this.y += v.y * s
        this.z += v.z * s
        return this
    }

    lenSq(): number {
        return this.x * this.x + this.y * this.y + this.z * this.z
    }

    distanceTo(v: IVec3): number {
        const dx = this.x - v.x
        const dy = this.y - v.y
        const dz = this.z - v.z
        return Math.sqrt(dx * dx + dy * dy + dz * dz)
    }

    isFinite(): boolean {
        return Number.isFinite(this.x) && Number.isFinite(this.y) && Number.isFinite(this.z)
    }

    equal(v: IVec3): boolean {
        return this.x === v.x && this.y === v.y && this.z === v.z
    }

    static zero(): Vec3 {
        return new Vec3(0, 0, 0)
    }
}
