/**
 * Typographic clean-up applied to rendered email subjects and bodies.
 */

import { removeWhitespaceBeforePunctuation } from "./whitespace";

// Text inside these elements keeps its straight quotes.
const SKIPPED_TAGS = new Set(["a", "pre", "code", "kbd", "samp", "tt", "script", "style", "math"]);

const TAG = /<!--[\s\S]*?-->|<\/?[A-Za-z][^<>]*>/g;

const EMAIL_LOCAL_CHAR = "[\\p{L}\\p{N}.!#$%&*+/=?^_`{|}~-]";
const EMAIL_WITH_SMART_QUOTES = new RegExp(
  `${EMAIL_LOCAL_CHAR}+(?:[‘’]${EMAIL_LOCAL_CHAR}+)*@[\\p{L}\\p{N}-]+(?:\\.[\\p{L}\\p{N}-]+)+`,
  "gu",
);

const HYPHENS_SURROUNDED_BY_SPACES = /\s+[-–—]{1,3}\s+/g;

/**
 * Curl straight quotes in a run of text. `before` is the character preceding
 * the run, so a quote at the start of the run is judged in context.
 */
function educateQuotes(text: string, before: string): string {
  let s = before + text;

  s = s.replace(/"'(?=\w)/g, "“‘");
  s = s.replace(/'"(?=\w)/g, "‘“");
  // decade abbreviations: '80s
  s = s.replace(/'(?=\d{2}s)/g, "’");

  s = s.replace(/(\s|--|–|—)'(?=\w)/g, "$1‘");
  s = s.replace(/(?<=[^\s[{(-])'/g, "’");
  s = s.replace(/'(?=\s|s\b)/g, "’");
  s = s.replace(/'/g, "‘");

  s = s.replace(/(\s|--|–|—)"(?=\w)/g, "$1“");
  s = s.replace(/(?<=[^\s[{(-])"/g, "”");
  s = s.replace(/"(?=\s)/g, "”");
  s = s.replace(/"/g, "“");

  return s.slice(before.length);
}

/**
 * Replace straight quotes with curly ones in text, leaving tags, their
 * attributes and the contents of links and code untouched.
 */
export function makeQuotesSmart(value: string): string {
  let out = "";
  let last = 0;
  let previous = " ";
  const skipping: string[] = [];

  const emitText = (text: string) => {
    if (!text) return;
    out += skipping.length ? text : educateQuotes(text, previous);
    previous = text[text.length - 1];
  };

  for (const match of value.matchAll(TAG)) {
    const index = match.index ?? 0;
    emitText(value.slice(last, index));

    const tag = match[0];
    out += tag;
    last = index + tag.length;

    const name = /^<(\/?)([A-Za-z][A-Za-z0-9]*)/.exec(tag);
    if (!name) continue;
    const tagName = name[2].toLowerCase();
    if (!SKIPPED_TAGS.has(tagName) || tag.endsWith("/>")) continue;
    if (name[1] === "/") {
      const at = skipping.lastIndexOf(tagName);
      if (at !== -1) skipping.splice(at, 1);
    } else {
      skipping.push(tagName);
    }
  }
  emitText(value.slice(last));

  return out;
}

export function removeSmartQuotesFromEmailAddresses(value: string): string {
  return value.replace(EMAIL_WITH_SMART_QUOTES, (email) => email.replace(/[‘’]/g, "'"));
}

export function replaceHyphensWithEnDashes(value: string): string {
  return value.replace(HYPHENS_SURROUNDED_BY_SPACES, " – ");
}

export function doNiceTypography(value: string): string {
  return replaceHyphensWithEnDashes(
    removeSmartQuotesFromEmailAddresses(makeQuotesSmart(removeWhitespaceBeforePunctuation(value))),
  );
}
