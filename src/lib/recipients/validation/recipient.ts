/**
 * Dispatch by template type, recipient formatting for safelists, and the
 * per-value SMS length check.
 */

import { SMS_CHAR_COUNT_LIMIT, SMS_CUSTOM_CONTENT_TOO_LONG_ERROR } from "../../limits";
import { SanitiseSMS } from "../../sanitise";
import type { TemplateType } from "../../templates/types";
import { checkAddress } from "./address";
import { checkEmailAddress, validateAndFormatEmailAddress } from "./email";
import { SmsMessageTooLongError, fail, ok, unwrap, type ValidationResult } from "./errors";
import { checkPhoneNumber } from "./phone";

export type RecipientCheckOptions = {
  /** Required for letters: the address column the value came from. */
  column?: string | null;
  internationalSms?: boolean;
};

export function checkRecipient(
  recipient: string | null | undefined,
  templateType: TemplateType,
  { column = null, internationalSms = false }: RecipientCheckOptions = {},
): ValidationResult<string | null> {
  switch (templateType) {
    case "email":
      return checkEmailAddress(recipient ?? "");
    case "sms":
      return checkPhoneNumber(recipient, { international: internationalSms });
    case "letter":
      if (column === null) throw new TypeError("An address column is needed to validate a letter recipient");
      return checkAddress(recipient, column);
  }
}

export function validateRecipient(
  recipient: string | null | undefined,
  templateType: TemplateType,
  options: RecipientCheckOptions = {},
): string | null {
  return unwrap(checkRecipient(recipient, templateType, options));
}

// ---------------------------------------------------------------------------
// Safelist matching
// ---------------------------------------------------------------------------

const FORMAT_CACHE_SIZE = 32;
const formatCache = new Map<string, string>();

function formatRecipientUncached(recipient: string): string {
  const phone = checkPhoneNumber(recipient);
  if (phone.ok) return phone.value;
  if (checkEmailAddress(recipient).ok) return validateAndFormatEmailAddress(recipient);
  return recipient;
}

/**
 * Canonical form used to compare recipients: E.164 for local phone numbers,
 * lower case for email addresses, the input otherwise. Non-strings give "".
 */
export function formatRecipient(recipient: unknown): string {
  if (typeof recipient !== "string") return "";

  const hit = formatCache.get(recipient);
  if (hit !== undefined) return hit;

  const formatted = formatRecipientUncached(recipient);
  if (formatCache.size >= FORMAT_CACHE_SIZE) {
    const oldest = formatCache.keys().next();
    if (!oldest.done) formatCache.delete(oldest.value);
  }
  formatCache.set(recipient, formatted);
  return formatted;
}

export function allowedToSendTo(recipient: unknown, safelist: Iterable<unknown>): boolean {
  const target = formatRecipient(recipient);
  for (const allowed of safelist) {
    if (formatRecipient(allowed) === target) return true;
  }
  return false;
}

// ---------------------------------------------------------------------------
// SMS length
// ---------------------------------------------------------------------------

/** Characters outside the SMS alphabet count double. */
export function weightedSmsLength(content: string): number {
  let length = 0;
  for (const c of content) length += SanitiseSMS.allowedCharacters.has(c) ? 1 : 2;
  return length;
}

export function checkSmsMessageLength(variableContent: string, templateContent: string): ValidationResult<string> {
  if (weightedSmsLength(variableContent) + templateContent.length > SMS_CHAR_COUNT_LIMIT) {
    return fail(new SmsMessageTooLongError(SMS_CUSTOM_CONTENT_TOO_LONG_ERROR));
  }
  return ok(variableContent);
}

export function validateSmsMessageLength(variableContent: string, templateContent: string): void {
  unwrap(checkSmsMessageLength(variableContent, templateContent));
}
