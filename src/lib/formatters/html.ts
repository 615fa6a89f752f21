/**
 * HTML handling for user content: the Field sanitiser modes plus the small
 * HTML transforms used by SMS previews.
 */

const ENTITY = /^&(?:#\d+|#x[0-9a-f]+|[a-z][a-z0-9]*);/i;

const LINK_STYLE = "word-wrap: break-word; color: #004795;";

const DVLA_MARKUP_TAGS = /<(?:cr|h1|h2|p|normal|op|np|bul|tab)>/gi;

const HTML_TAG = /<!--[\s\S]*?-->|<\/?[A-Za-z][^<>]*>/g;

const URL_IN_TEXT = /(https?:\/\/[^\s<]+[^<.,:"')\]\s])/g;

function escapeText(value: string): string {
  let out = "";
  for (let i = 0; i < value.length; i++) {
    const c = value[i];
    if (c === "&") {
      out += ENTITY.test(value.slice(i)) ? "&" : "&amp;";
    } else if (c === "<") {
      out += "&lt;";
    } else if (c === ">") {
      out += "&gt;";
    } else {
      out += c;
    }
  }
  return out;
}

/**
 * Escape `&`, `<` and `>`. Quotes and existing entities are left as they are.
 */
export function escapeHtml(value: string): string {
  if (!value) return value;
  return escapeText(value);
}

/** Remove tags and escape whatever markup characters remain. */
export function stripHtml(value: string): string {
  return escapeText(value.replace(HTML_TAG, ""));
}

export function stripDvlaMarkup(value: string): string {
  return value.replace(DVLA_MARKUP_TAGS, "");
}

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: "\u00a0",
  ndash: "–",
  mdash: "—",
  lsquo: "‘",
  rsquo: "’",
  ldquo: "“",
  rdquo: "”",
  hellip: "…",
  pound: "£",
  euro: "€",
  copy: "©",
};

export function unescapeHtml(value: string): string {
  return value.replace(/&(#\d+|#x[0-9a-f]+|[a-z][a-z0-9]*);/gi, (entity, body: string) => {
    if (body.startsWith("#")) {
      const hex = body[1] === "x" || body[1] === "X";
      const code = parseInt(body.slice(hex ? 2 : 1), hex ? 16 : 10);
      return Number.isFinite(code) && code <= 0x10ffff ? String.fromCodePoint(code) : entity;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

export function nl2br(value: string): string {
  return value.trim().replace(/\n|\r/g, "<br>");
}

export function nl2li(value: string): string {
  return `<ul><li>${value.trim().split("\n").join("</li><li>")}</li></ul>`;
}

/** Escape for use inside a double-quoted attribute. */
export function escapeAttribute(value: string): string {
  return escapeHtml(value).replace(/"/g, "&quot;");
}

/** Link bare URLs in SMS preview HTML. */
export function autolinkSms(body: string): string {
  return body.replace(
    URL_IN_TEXT,
    (url: string) => `<a style="${LINK_STYLE}" target="_blank" href="${escapeAttribute(url)}">${url}</a>`,
  );
}
