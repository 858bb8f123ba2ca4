import { vec3 } from '../lib/Vector3.js'
import { randomRange, type Random } from '../lib/random.js'
import type { BodyInit } from './Components.js'

export interface PopulationSettings {
    /** Number of small bodies added after the two large ones */
    smallBodyCount: number
    /** Small bodies spawn in a cube of this edge length centred on the origin */
    spawnExtent: number
    /** Upper bound of each small body velocity component */
    speed: number
    radiusMin: number
    /** Small body radius is radiusMin + radiusRange * u */
    radiusRange: number
}

export const DEFAULT_POPULATION: PopulationSettings = {
    smallBodyCount: 2000,
    spawnExtent: 5,
    speed: 1,
    radiusMin: 0.01,
    radiusRange: 0.1
}

/**
 * Two unit-radius "planets" on opposite sides of the origin, moving in
 * opposite directions along x.
 */
export function largeBodies(): BodyInit[] {
    return [
        { position: vec3(0, 5, 0), velocity: vec3(-0.75, 0, 0), radius: 1 },
        { position: vec3(0, -5, 0), velocity: vec3(0.75, 0, 0), radius: 1 }
    ]
}

/**
 * Initial bodies: the two large ones, then `smallBodyCount` small ones.
 *
 * Each small body draws radius, then position x/y/z, then velocity x/y/z
 * from `rng`, so a seeded source always yields the same population.
 */
export function createPopulation(
    rng: Random,
    settings: PopulationSettings = DEFAULT_POPULATION
): BodyInit[] {
    const { smallBodyCount, spawnExtent, speed, radiusMin, radiusRange } = settings
    const half = spawnExtent / 2
    const bodies = largeBodies()

    for (let i = 0; i < smallBodyCount; i++) {
        const radius = radiusMin + radiusRange * rng()
        const position = vec3(
            randomRange(rng, -half, half),
            randomRange(rng, -half, half),
            randomRange(rng, -half, half)
        )
        const velocity = vec3(rng() * speed, rng() * speed, rng() * speed)
        bodies.push({ position, velocity, radius })
    }

    return bodies
}
