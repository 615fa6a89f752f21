/**
 * Phone numbers: parsing and formatting through libphonenumber-js with full
 * metadata, so validity checks know every number range.
 *
 * A number written without a "+" is read in PHONE_REGION_CODE and is only
 * local when its calling code is PHONE_COUNTRY_CODE.
 */

import {
  findPhoneNumbersInText,
  isSupportedCountry,
  type CountryCode,
  type PhoneNumber,
} from "libphonenumber-js/max";

import { serverEnv } from "../../env/server";
import { InvalidPhoneError, fail, ok, unwrap, type ValidationResult } from "./errors";

export type InternationalPhoneInfo = {
  international: boolean;
  countryPrefix: string;
};

export type PhoneCheckOptions = {
  international?: boolean;
};

const MIN_E164_LENGTH = 8;

function isCountryCode(value: string): value is CountryCode {
  return isSupportedCountry(value);
}

function regionCode(): CountryCode {
  const region = serverEnv().PHONE_REGION_CODE;
  if (!isCountryCode(region)) {
    throw new TypeError(`PHONE_REGION_CODE ${region} is not a supported region`);
  }
  return region;
}

/**
 * First valid number in the text. With a region, numbers from any other
 * calling code than the local one are rejected.
 */
function parseNumber(text: string, region?: CountryCode): PhoneNumber | null {
  const [found] = region ? findPhoneNumbersInText(text, region) : findPhoneNumbersInText(text);
  if (!found) return null;
  if (region && found.number.countryCallingCode !== serverEnv().PHONE_COUNTRY_CODE) return null;
  return found.number;
}

function parseAnywhere(text: string): PhoneNumber | null {
  return parseNumber(text, regionCode()) ?? parseNumber(text);
}

/** E.164 form of a local or international number, or null. */
export function normalisePhoneNumber(number: string): string | null {
  return parseAnywhere(number)?.number ?? null;
}

export function isLocalPhoneNumber(number: string): boolean {
  return parseNumber(number, regionCode()) !== null;
}

function checkLocalPhoneNumber(number: string): ValidationResult<string> {
  const match = parseNumber(number, regionCode());
  if (!match) return fail(new InvalidPhoneError("Not a valid local number"));
  return ok(match.number);
}

export function checkPhoneNumber(
  number: string | null | undefined,
  { international = false }: PhoneCheckOptions = {},
): ValidationResult<string> {
  if (number === null || number === undefined) return fail(new InvalidPhoneError("Number is None"));
  if (number.includes(";")) return fail(new InvalidPhoneError("Not a valid number"));

  if (!international || isLocalPhoneNumber(number)) return checkLocalPhoneNumber(number);

  const normalised = normalisePhoneNumber(number);
  if (normalised === null) return fail(new InvalidPhoneError("Not a valid international number"));
  if (normalised.length < MIN_E164_LENGTH) return fail(new InvalidPhoneError("Not enough digits"));
  if (getInternationalPrefix(normalised) === null) {
    return fail(new InvalidPhoneError("Not a valid country prefix"));
  }
  return ok(normalised);
}

/** E.164 form of a valid number; throws InvalidPhoneError otherwise. */
export function validatePhoneNumber(
  number: string | null | undefined,
  options: PhoneCheckOptions = {},
): string {
  return unwrap(checkPhoneNumber(number, options));
}

export const validateAndFormatPhoneNumber = validatePhoneNumber;

function getInternationalPrefix(e164: string): string | null {
  return parseNumber(e164)?.countryCallingCode ?? null;
}

export function getInternationalPhoneInfo(number: string): InternationalPhoneInfo {
  const e164 = validatePhoneNumber(number, { international: true });
  const countryPrefix = getInternationalPrefix(e164);
  if (countryPrefix === null) throw new InvalidPhoneError("Not a valid country prefix");

  return {
    international: countryPrefix !== serverEnv().PHONE_COUNTRY_CODE,
    countryPrefix,
  };
}

export type TryPhoneOptions = PhoneCheckOptions & {
  /** When set, an invalid number is logged with this message. */
  logMessage?: string;
};

/** Formatted number when valid; the input unchanged otherwise. Never throws. */
export function tryValidateAndFormatPhoneNumber(
  number: string,
  { logMessage, ...options }: TryPhoneOptions = {},
): string {
  const result = checkPhoneNumber(number, options);
  if (result.ok) return result.value;

  if (logMessage) {
    console.warn(`[recipients] ${logMessage}`, { error: result.error.message });
  }
  return number;
}

/** "+1 202 555 0123" style, or the input when it does not parse. */
export function formatPhoneNumberHumanReadable(number: string): string {
  return parseAnywhere(number)?.format("INTERNATIONAL") ?? number;
}
