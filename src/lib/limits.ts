/**
 * Platform limits shared by templates and recipient uploads.
 */

export const SMS_CHAR_COUNT_LIMIT = 612;

export const EMAIL_CHAR_COUNT_LIMIT = 2_000_000;

export const TEMPLATE_NAME_CHAR_COUNT_LIMIT = 255;

export const DEFAULT_MAX_ROWS = 50_000;

export const SMS_CUSTOM_CONTENT_TOO_LONG_SUFFIX =
  "Some messages may be too long due to custom content.";

export const SMS_CUSTOM_CONTENT_TOO_LONG_ERROR = `Maximum ${SMS_CHAR_COUNT_LIMIT} characters. ${SMS_CUSTOM_CONTENT_TOO_LONG_SUFFIX}`;
