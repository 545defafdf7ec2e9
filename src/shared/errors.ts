/**
 * Thrown when the simulation is misused structurally: out-of-bounds tile
 * access, dual access to one entity, oversized menus. Gameplay never throws.
 */
export class SimInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SimInvariantError";
  }
}

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new SimInvariantError(message);
  }
}
