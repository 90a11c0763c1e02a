/**
 * Raised when marker or ordering configuration is missing or contradictory.
 * Data values never raise; unmatched markers resolve to id 0.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
