import { describe, it, expect } from 'vitest'
import { integrateMotion, MovementSystem } from './MovementSystem.js'
import { BodyRegistry } from '../BodyRegistry.js'
import { World } from '../World.js'
import { vec3 } from '../../lib/Vector3.js'

describe('MovementSystem', () => {
    it('should move each body by velocity * dt', () => {
        const bodies = new BodyRegistry([
            { position: vec3(1, 2, 3), velocity: vec3(2, -4, 0.5), radius: 1 },
            { position: vec3(0, 0, 0), velocity: vec3(0, 0, 0), radius: 1 }
        ])

        integrateMotion(bodies, 0.5)

        expect(bodies.position(0).equal(vec3(2, 0, 3.25))).toBe(true)
        expect(bodies.position(1).equal(vec3(0, 0, 0))).toBe(true)
    })

    it('should not change velocities, even when bodies overlap', () => {
        const bodies = new BodyRegistry([
            { position: vec3(0, 0, 0), velocity: vec3(1, 0, 0), radius: 1 },
            { position: vec3(0.5, 0, 0), velocity: vec3(-1, 0, 0), radius: 1 }
        ])

        integrateMotion(bodies, 1)

        expect(bodies.velocity(0).equal(vec3(1, 0, 0))).toBe(true)
        expect(bodies.velocity(1).equal(vec3(-1, 0, 0))).toBe(true)
    })

    it('should run as a pipeline system', () => {
        const bodies = new BodyRegistry([
            { position: vec3(0, 0, 0), velocity: vec3(3, 0, 0), radius: 1 }
        ])
        const world = new World(bodies, { systems: [MovementSystem] })

        world.step(0.25)
        world.step(0.25)

        expect(bodies.position(0).x).toBe(1.5)
    })
})
