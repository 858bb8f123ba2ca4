/**
 * Physics constants and per-world settings.
 */
export const PhysicsConfig = {
    /** Gravitational constant (simulation units) */
    G: 1,

    /** Body material density; unit density makes mass equal to volume */
    density: 1,

    /**
     * Centre distances at or below this are treated as coincident.
     * Such pairs are skipped by gravity and by collision response.
     */
    minSeparation: 1e-9,

    /** Calculate mass from radius using density */
    bodyMass(radius: number): number {
        // V = (4/3)πr³
        // m = V * density
        const volume = (4 / 3) * Math.PI * Math.pow(radius, 3)
        return volume * this.density
    }
} as const

/**
 * Per-world tunables. Defaults come from PhysicsConfig.
 */
export interface PhysicsSettings {
    G: number
    minSeparation: number
}

export function physicsSettings(overrides: Partial<PhysicsSettings> = {}): PhysicsSettings {
    return {
        G: overrides.G ?? PhysicsConfig.G,
        minSeparation: overrides.minSeparation ?? PhysicsConfig.minSeparation
    }
}
