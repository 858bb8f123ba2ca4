import { describe, it, expect } from 'vitest'
import { accumulateGravity, createGravitySystem } from './GravitySystem.js'
import { BodyRegistry } from '../BodyRegistry.js'
import type { BodyInit } from '../Components.js'
import { PhysicsScratch } from '../ComponentStore.js'
import { totalMomentum } from '../diagnostics.js'
import { physicsSettings } from '../PhysicsConfig.js'
import { World } from '../World.js'
import { vec3 } from '../../lib/Vector3.js'
import { mulberry32 } from '../../lib/random.js'

describe('GravitySystem', () => {
    const settings = physicsSettings({ G: 1 })

    function createBody(
        x: number, y: number, z: number,
        vx: number, vy: number, vz: number,
        radius = 1
    ): BodyInit {
        return { position: vec3(x, y, z), velocity: vec3(vx, vy, vz), radius }
    }

    describe('Gravitational Attraction', () => {
        it('should match the two-planet reference step', () => {
            const bodies = new BodyRegistry([
                createBody(0, 5, 0, -0.75, 0, 0),
                createBody(0, -5, 0, 0.75, 0, 0)
            ])

            const skipped = accumulateGravity(bodies, 1, settings)

            const va = bodies.velocity(0)
            const vb = bodies.velocity(1)
            expect(skipped).toBe(0)
            expect(va.x).toBe(-0.75)
            expect(va.y).toBeCloseTo(-0.041888, 6)
            expect(va.z).toBe(0)
            expect(vb.x).toBe(0.75)
            expect(vb.y).toBeCloseTo(0.041888, 6)
            expect(vb.z).toBe(0)
        })

        it('should use the other body\'s mass for each velocity change', () => {
            // radius 2 has 8x the mass of radius 1
            const bodies = new BodyRegistry([
                createBody(0, 0, 0, 0, 0, 0, 1),
                createBody(10, 0, 0, 0, 0, 0, 2)
            ])

            accumulateGravity(bodies, 1, settings)

            const dvSmall = bodies.velocity(0).x
            const dvLarge = bodies.velocity(1).x
            expect(dvSmall).toBeGreaterThan(0)
            expect(dvLarge).toBeLessThan(0)
            expect(dvSmall / -dvLarge).toBeCloseTo(8, 10)
        })

        it('should leave positions untouched', () => {
            const bodies = new BodyRegistry([
                createBody(0, 0, 0, 1, 1, 1),
                createBody(4, 0, 0, 0, 0, 0)
            ])

            accumulateGravity(bodies, 0.5, settings)

            expect(bodies.position(0).equal(vec3(0, 0, 0))).toBe(true)
            expect(bodies.position(1).equal(vec3(4, 0, 0))).toBe(true)
        })

        it('should fall off with the inverse square of distance', () => {
            const near = new BodyRegistry([createBody(0, 0, 0, 0, 0, 0), createBody(5, 0, 0, 0, 0, 0)])
            const far = new BodyRegistry([createBody(0, 0, 0, 0, 0, 0), createBody(50, 0, 0, 0, 0, 0)])

            accumulateGravity(near, 1, settings)
            accumulateGravity(far, 1, settings)

            expect(near.velocity(0).x / far.velocity(0).x).toBeCloseTo(100, 8)
        })

        it('should scale with G and dt', () => {
            const base = new BodyRegistry([createBody(0, 0, 0, 0, 0, 0), createBody(3, 4, 0, 0, 0, 0)])
            const scaled = base.clone()

            accumulateGravity(base, 1, settings)
            accumulateGravity(scaled, 0.5, physicsSettings({ G: 4 }))

            expect(scaled.velocity(0).x).toBeCloseTo(base.velocity(0).x * 2, 12)
            expect(scaled.velocity(0).y).toBeCloseTo(base.velocity(0).y * 2, 12)
        })
    })

    describe('Conservation', () => {
        it('should conserve momentum for a random cluster', () => {
            const rng = mulberry32(7)
            const inits: BodyInit[] = []
            for (let i = 0; i < 30; i++) {
                inits.push(createBody(
                    rng() * 100 - 50, rng() * 100 - 50, rng() * 100 - 50,
                    rng() - 0.5, rng() - 0.5, rng() - 0.5,
                    0.5 + rng()
                ))
            }
            const bodies = new BodyRegistry(inits)
            const before = totalMomentum(bodies)

            for (let i = 0; i < 10; i++) {
                accumulateGravity(bodies, 0.1, settings)
            }

            const after = totalMomentum(bodies)
            expect(after.x).toBeCloseTo(before.x, 9)
            expect(after.y).toBeCloseTo(before.y, 9)
            expect(after.z).toBeCloseTo(before.z, 9)
        })
    })

    describe('Edge Cases', () => {
        it('should leave a lone body alone', () => {
            const bodies = new BodyRegistry([createBody(1, 2, 3, 4, 5, 6)])

            accumulateGravity(bodies, 1, settings)

            expect(bodies.velocity(0).equal(vec3(4, 5, 6))).toBe(true)
        })

        it('should handle an empty registry', () => {
            expect(accumulateGravity(new BodyRegistry([]), 1, settings)).toBe(0)
        })

        it('should skip coincident bodies instead of producing NaN', () => {
            const bodies = new BodyRegistry([
                createBody(1, 1, 1, 0, 0, 0),
                createBody(1, 1, 1, 0, 0, 0),
                createBody(11, 1, 1, 0, 0, 0)
            ])

            const skipped = accumulateGravity(bodies, 1, settings)

            expect(skipped).toBe(1)
            for (let i = 0; i < 3; i++) {
                expect(bodies.velocity(i).isFinite()).toBe(true)
            }
            // Both coincident bodies are still pulled by the third
            expect(bodies.velocity(0).x).toBeGreaterThan(0)
            expect(bodies.velocity(0).x).toBe(bodies.velocity(1).x)
        })

        it('should honour a larger minimum separation', () => {
            const bodies = new BodyRegistry([
                createBody(0, 0, 0, 0, 0, 0),
                createBody(0.5, 0, 0, 0, 0, 0)
            ])

            const seen: Array<[number, number]> = []
            const skipped = accumulateGravity(bodies, 1, physicsSettings({ minSeparation: 1 }), undefined, (a, b) => {
                seen.push([a, b])
            })

            expect(skipped).toBe(1)
            expect(seen).toEqual([[0, 1]])
            expect(bodies.velocity(0).x).toBe(0)
        })

        it('should grow a scratch buffer that is too small', () => {
            const bodies = new BodyRegistry([
                createBody(0, 0, 0, 0, 0, 0),
                createBody(10, 0, 0, 0, 0, 0),
                createBody(20, 0, 0, 0, 0, 0)
            ])
            const scratch = new PhysicsScratch(1)

            accumulateGravity(bodies, 1, settings, scratch)

            expect(scratch.capacity).toBe(3)
            // Middle body is pulled equally both ways
            expect(bodies.velocity(1).x).toBeCloseTo(0, 15)
        })
    })

    describe('System', () => {
        it('should add skipped pairs to the step result', () => {
            const bodies = new BodyRegistry([
                createBody(0, 0, 0, 0, 0, 0),
                createBody(0, 0, 0, 0, 0, 0)
            ])
            const world = new World(bodies, { systems: [createGravitySystem()] })

            const result = world.step(1)

            expect(result.degeneratePairs).toBe(1)
            expect(Object.keys(result.passTimes)).toEqual(['Gravity'])
        })

        it('should give every instance its own scratch space', () => {
            const a = createGravitySystem()
            const b = createGravitySystem()
            expect(a).not.toBe(b)

            const small = new World(new BodyRegistry([createBody(0, 0, 0, 0, 0, 0), createBody(10, 0, 0, 0, 0, 0)]), { systems: [a] })
            const large = new World(new BodyRegistry([
                createBody(0, 0, 0, 0, 0, 0),
                createBody(10, 0, 0, 0, 0, 0),
                createBody(20, 0, 0, 0, 0, 0)
            ]), { systems: [b] })

            small.step(1)
            large.step(1)
            small.step(1)

            expect(small.bodies.velocity(0).x).toBeCloseTo(2 * 4.18879 / 100, 5)
        })
    })
})
