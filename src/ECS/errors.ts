export type SimulationErrorKind =
    | 'InvalidRadius'
    | 'InvalidMass'
    | 'StaleHandle'
    | 'InvalidTimeStep'

/**
 * Raised for input the simulation refuses to accept: bad bodies at
 * construction, unknown handles, or a bad time step.
 *
 * Numerical trouble inside a step (coincident bodies) is never thrown;
 * the passes skip the pair and count it instead.
 */
export class SimulationError extends Error {
    constructor(
        readonly kind: SimulationErrorKind,
        message: string
    ) {
        super(message)
        this.name = 'SimulationError'
    }
}
