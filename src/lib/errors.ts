/**
 * Raised when render configuration is rejected before any pixel is computed.
 * The message names the offending field and the value it held.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
