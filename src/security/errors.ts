/**
 * Error classes for PDF security operations.
 */

import { PdfError, type PdfErrorKind } from "#src/errors";

/**
 * Base class for security-related errors.
 */
export class SecurityError extends PdfError {
  constructor(message: string, kind: PdfErrorKind = "SecurityError") {
    super(message, kind);
    this.name = "SecurityError";
  }
}

/**
 * Error parsing the encryption dictionary.
 *
 * Thrown when the /Encrypt dictionary is malformed or contains
 * unsupported values.
 */
export class EncryptionDictError extends SecurityError {
  constructor(message: string) {
    super(message);
    this.name = "EncryptionDictError";
  }
}

export type AuthenticationErrorCode = "NEED_CREDENTIALS" | "INVALID_CREDENTIALS";

/**
 * Password authentication failed.
 *
 * `NEED_CREDENTIALS` when no password was given and the empty user password
 * does not open the document, `INVALID_CREDENTIALS` when the given one is
 * wrong.
 */
export class AuthenticationError extends SecurityError {
  readonly code: AuthenticationErrorCode;

  constructor(message: string, code: AuthenticationErrorCode) {
    super(message, "AuthenticationError");
    this.name = "AuthenticationError";
    this.code = code;
  }
}

/**
 * Error for encryption the standard handler cannot process: other security
 * handlers, revisions 5 and 6 (AES-256), unknown crypt filter methods.
 */
export class UnsupportedEncryptionError extends SecurityError {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedEncryptionError";
  }
}
