/**
 * Whitespace helpers shared by templates, CSV parsing and validation.
 */

/** Invisible characters that users paste into spreadsheets and templates. */
export const OBSCURE_WHITESPACE = [
  "\u180e", // mongolian vowel separator
  "\u200b", // zero width space
  "\u200c", // zero width non-joiner
  "\u200d", // zero width joiner
  "\u2060", // word joiner
  "\ufeff", // zero width no-break space
].join("");

// space, tab, newline, carriage return, vertical tab, form feed
const ASCII_WHITESPACE = " \t\n\r\u000b\u000c";

function escapeForCharClass(chars: string): string {
  return chars.replace(/[\\\]\[^-]/g, "\\$&");
}

/** Trim any of `chars` from both ends. */
export function stripChars(value: string, chars: string): string {
  if (!chars) return value;
  const cls = `[${escapeForCharClass(chars)}]`;
  return value.replace(new RegExp(`^${cls}+|${cls}+$`, "gu"), "");
}

export function stripWhitespace(value: string, extraCharacters = ""): string {
  return stripChars(value, ASCII_WHITESPACE + OBSCURE_WHITESPACE + extraCharacters);
}

export function stripAndRemoveObscureWhitespace(value: string): string {
  let cleaned = value;
  for (const c of OBSCURE_WHITESPACE) cleaned = cleaned.split(c).join("");
  return stripChars(cleaned, ASCII_WHITESPACE);
}

/** Trim, then collapse every run of whitespace to a single space. */
export function normaliseWhitespace(value: string): string {
  return stripAndRemoveObscureWhitespace(value)
    .split(/\s+/u)
    .filter(Boolean)
    .join(" ");
}

export function normaliseNewlines(value: string): string {
  return value
    .split(/\r\n|[\n\r\u000b\u000c\u001c\u001d\u001e\u0085\u2028\u2029]/)
    .join("\n");
}

export function removeWhitespaceBeforePunctuation(value: string): string {
  return value.replace(/[ \t]+([,.])/g, "$1");
}

export function stripLeadingWhitespace(value: string): string {
  return value.replace(/^\s+/u, "");
}

export function addTrailingNewline(value: string): string {
  return `${value}\n`;
}

// line separator breaks some mail clients
export function stripUnsupportedCharacters(value: string): string {
  return value.replace(/\u2028/g, "");
}
