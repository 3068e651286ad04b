/**
 * Errors raised by the engine.
 * @module core/errors
 */

/**
 * Invalid configuration detected before any tree is built
 * (e.g. an unknown scoring scheme).
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
