export class GeometryError extends Error {
  readonly satelliteId: string;

  constructor(satelliteId: string, message?: string) {
    super(message ?? `Malformed position for satellite '${satelliteId}'`);
    this.name = 'GeometryError';
    this.satelliteId = satelliteId;
  }
}

export class ConfigurationError extends Error {
  readonly parameter: string;

  constructor(parameter: string, message: string) {
    super(`Invalid configuration '${parameter}': ${message}`);
    this.name = 'ConfigurationError';
    this.parameter = parameter;
  }
}

export class SeedReuseError extends Error {
  readonly seed: number;

  constructor(seed: number) {
    super(`Random seed ${seed} is already bound to another trial`);
    this.name = 'SeedReuseError';
    this.seed = seed;
  }
}
