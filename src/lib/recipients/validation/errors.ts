/**
 * Recipient validation errors and the result type the checkers return.
 */

export class RecipientValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RecipientValidationError";
  }
}

export class InvalidEmailError extends RecipientValidationError {
  constructor(message = "Not a valid email address") {
    super(message);
    this.name = "InvalidEmailError";
  }
}

export class InvalidPhoneError extends RecipientValidationError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidPhoneError";
  }
}

export class InvalidAddressError extends RecipientValidationError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidAddressError";
  }
}

export class SmsMessageTooLongError extends RecipientValidationError {
  constructor(message: string) {
    super(message);
    this.name = "SmsMessageTooLongError";
  }
}

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RecipientValidationError };

export function ok<T>(value: T): ValidationResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: RecipientValidationError): ValidationResult<T> {
  return { ok: false, error };
}

/** Value of a successful result; the error of a failed one is thrown. */
export function unwrap<T>(result: ValidationResult<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
