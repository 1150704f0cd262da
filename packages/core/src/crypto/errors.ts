import { EndpointError } from "../endpoint/errors";

/**
 * Error thrown when a public key cannot be used to encrypt a value
 */
export class EncryptionError extends EndpointError {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "EncryptionError";
    this.cause = cause;
    Object.setPrototypeOf(this, EncryptionError.prototype);
  }
}
