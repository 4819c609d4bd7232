/**
 * Raised when discovery yields a target set the elector cannot work with.
 */
export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryError";
  }
}

/**
 * Raised when the selected backend payload is not valid JSON.
 */
export class PayloadDecodeError extends Error {
  constructor(
    message: string,
    public readonly backend: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "PayloadDecodeError";
  }
}
