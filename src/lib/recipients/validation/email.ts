/**
 * Email addresses: a narrow local part and a hostname that
 * must survive IDNA encoding.
 */

import { domainToASCII } from "node:url";

import { stripAndRemoveObscureWhitespace } from "../../formatters/whitespace";
import { InvalidEmailError, fail, ok, unwrap, type ValidationResult } from "./errors";

// no quotes or semicolons in the local part
const EMAIL_PATTERN = /^[a-zA-Z0-9.!#$%&'*+/=?^_`{|}~-]+@([^.@][^@\s]+)$/;
const HOSTNAME_PART = /^(xn|[a-z0-9]+)(-?-[a-z0-9]+)*$/i;
const TLD_PART = /^([a-z]{2,63}|xn--([a-z0-9]+-)*[a-z0-9]+)$/i;

const MAX_EMAIL_LENGTH = 320;
const MAX_HOSTNAME_LENGTH = 253;
const MAX_LABEL_LENGTH = 63;

export function checkEmailAddress(value: string): ValidationResult<string> {
  const email = stripAndRemoveObscureWhitespace(value);
  const invalid = () => fail<string>(new InvalidEmailError());

  const match = EMAIL_PATTERN.exec(email);
  if (!match) return invalid();
  if (email.length > MAX_EMAIL_LENGTH) return invalid();
  if (email.includes("..")) return invalid();

  const hostname = domainToASCII(match[1]);
  if (!hostname) return invalid();

  const parts = hostname.split(".");
  if (hostname.length > MAX_HOSTNAME_LENGTH || parts.length < 2) return invalid();

  for (const part of parts) {
    if (!part || part.length > MAX_LABEL_LENGTH || !HOSTNAME_PART.test(part)) return invalid();
  }
  if (!TLD_PART.test(parts[parts.length - 1])) return invalid();

  return ok(email);
}

export function validateEmailAddress(value: string): string {
  return unwrap(checkEmailAddress(value));
}

export function formatEmailAddress(value: string): string {
  return stripAndRemoveObscureWhitespace(value.toLowerCase());
}

export function validateAndFormatEmailAddress(value: string): string {
  return formatEmailAddress(validateEmailAddress(value));
}
