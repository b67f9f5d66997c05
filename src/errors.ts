/**
 * Thrown when a splitting threshold is not a positive integer.
 *
 * Raised before any construction begins.
 */
export class InvalidConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidConfigurationError";
  }
}

/**
 * Thrown when a FlatRecord list (or a saved state) does not describe exactly
 * one well-formed tree: duplicate ids, several roots, a missing sibling, etc.
 *
 * The message names the offending ids.
 */
export class StructuralIntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StructuralIntegrityError";
  }
}
