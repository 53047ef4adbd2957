// Malformed maze: bad dimensions, start/goal outside the grid or on an obstacle.
export class InvalidEnvironmentError extends Error {
  constructor(message: string) {
    super("Invalid environment: " + message);
    this.name = "InvalidEnvironmentError";
  }
}

// Rejected before the search loop starts, e.g. A* without a heuristic.
export class InvalidConfigurationError extends Error {
  constructor(message: string) {
    super("Invalid configuration: " + message);
    this.name = "InvalidConfigurationError";
  }
}
