/**
 * Raised when composition code breaks an invariant the layer can't repair:
 * unbalanced style stacks, a state entry of the wrong type, an unknown
 * alignment. The current frame is unusable once this is thrown.
 */
export class UIInvariantError extends Error {
  /** Component and method that detected the fault, e.g. "StateStore.getAs" */
  readonly scope: string;

  constructor(scope: string, message: string) {
    super(`${scope}: ${message}`);
    this.name = "UIInvariantError";
    this.scope = scope;
  }
}

