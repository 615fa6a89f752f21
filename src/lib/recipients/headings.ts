/**
 * Recipient column headings per template type and language.
 */

import { makeKey } from "../columns";
import type { TemplateType, UserLanguage } from "../templates/types";

export const ADDRESS_COLUMNS = [
  "address line 1",
  "address line 2",
  "address line 3",
  "address line 4",
  "address line 5",
  "address line 6",
  "postcode",
] as const;

export const OPTIONAL_ADDRESS_COLUMNS = [
  "address line 3",
  "address line 4",
  "address line 5",
  "address line 6",
] as const;

export const firstColumnHeadings: Record<UserLanguage, Record<TemplateType, readonly string[]>> = {
  en: { email: ["email address"], sms: ["phone number"], letter: ADDRESS_COLUMNS },
  fr: { email: ["adresse courriel"], sms: ["numéro de téléphone"], letter: ADDRESS_COLUMNS },
};

/** Recipient headings accepted in either language. */
export const recipientHeadingsInAnyLanguage: Record<TemplateType, readonly string[]> = {
  email: ["email address", "adresse courriel"],
  sms: ["phone number", "numéro de téléphone"],
  letter: ADDRESS_COLUMNS,
};

const OPTIONAL_ADDRESS_KEYS = new Set(OPTIONAL_ADDRESS_COLUMNS.map((column) => makeKey(column)));
const ADDRESS_KEYS = new Set(ADDRESS_COLUMNS.map((column) => makeKey(column)));

export function isOptionalAddressColumn(column: string): boolean {
  return OPTIONAL_ADDRESS_KEYS.has(makeKey(column));
}

export function isAddressColumn(column: string): boolean {
  return ADDRESS_KEYS.has(makeKey(column));
}
