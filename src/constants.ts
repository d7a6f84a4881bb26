// Equality tolerance for coordinates, parameters and angles.
export const DEFAULT_EPSILON = 1e-10

// Maximum deviation allowed when curves are replaced by polylines.
export const DEFAULT_TOLERANCE = 0.01

// Miter limit used by the Miter and Arcs joiners when none is given.
export const DEFAULT_MITER_LIMIT = 4.0

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export interface KernelConfig {
  epsilon: number
  tolerance: number
}

export const DEFAULT_CONFIG: Readonly<KernelConfig> = Object.freeze({
  epsilon: DEFAULT_EPSILON,
  tolerance: DEFAULT_TOLERANCE
})

export function resolveConfig(config: Partial<KernelConfig> = {}): KernelConfig {
  const resolved: KernelConfig = {
    epsilon: config.epsilon ?? DEFAULT_CONFIG.epsilon,
    tolerance: config.tolerance ?? DEFAULT_CONFIG.tolerance
  }

  if (!Number.isFinite(resolved.epsilon) || resolved.epsilon <= 0) {
    throw new ConfigError(`Invalid epsilon: ${resolved.epsilon}`)
  }
  if (!Number.isFinite(resolved.tolerance) || resolved.tolerance <= 0) {
    throw new ConfigError(`Invalid tolerance: ${resolved.tolerance}`)
  }
  return resolved
}
