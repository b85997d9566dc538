/**
 * Base class for every error raised by the resolution engine.
 *
 * `code` is stable and meant for programmatic checks; `message` is what
 * ends up in the report next to the repository identifier.
 */
export class ModreqError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
