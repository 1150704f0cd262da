import { EndpointError } from '../endpoint/errors';

/**
 * Error thrown when configuration cannot be read or fails validation
 */
export class ConfigError extends EndpointError {
  public readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.details = details;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
