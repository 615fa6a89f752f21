export {
  RecipientValidationError,
  InvalidEmailError,
  InvalidPhoneError,
  InvalidAddressError,
  SmsMessageTooLongError,
  ok,
  fail,
  unwrap,
} from "./errors";
export type { ValidationResult } from "./errors";
export {
  checkPhoneNumber,
  validatePhoneNumber,
  validateAndFormatPhoneNumber,
  normalisePhoneNumber,
  isLocalPhoneNumber,
  getInternationalPhoneInfo,
  tryValidateAndFormatPhoneNumber,
  formatPhoneNumberHumanReadable,
} from "./phone";
export type { InternationalPhoneInfo, PhoneCheckOptions, TryPhoneOptions } from "./phone";
export {
  checkEmailAddress,
  validateEmailAddress,
  formatEmailAddress,
  validateAndFormatEmailAddress,
} from "./email";
export { checkAddress, validateAddress } from "./address";
export {
  checkRecipient,
  validateRecipient,
  formatRecipient,
  allowedToSendTo,
  weightedSmsLength,
  checkSmsMessageLength,
  validateSmsMessageLength,
} from "./recipient";
export type { RecipientCheckOptions } from "./recipient";
