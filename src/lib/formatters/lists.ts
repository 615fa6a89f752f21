import { escapeHtml } from "./html";

export type FormattedListOptions = {
  conjunction?: string;
  beforeEach?: string;
  afterEach?: string;
  separator?: string;
  prefix?: string;
  prefixPlural?: string;
};

/**
 * Join items into prose: "‘a’, ‘b’ and ‘c’". An empty list gives "".
 */
export function unescapedFormattedList(
  items: readonly string[],
  {
    conjunction = "and",
    beforeEach = "‘",
    afterEach = "’",
    separator = ", ",
    prefix = "",
    prefixPlural = "",
  }: FormattedListOptions = {},
): string {
  const single = prefix ? `${prefix} ` : "";
  const plural = prefixPlural ? `${prefixPlural} ` : "";

  if (items.length === 0) return "";
  if (items.length === 1) return `${single}${beforeEach}${items[0]}${afterEach}`;

  const formatted = items.map((item) => `${beforeEach}${item}${afterEach}`);
  const last = formatted[formatted.length - 1];
  return `${plural}${formatted.slice(0, -1).join(separator)} ${conjunction} ${last}`;
}

/** As `unescapedFormattedList`, with each item HTML-escaped first. */
export function formattedList(items: readonly string[], options: FormattedListOptions = {}): string {
  return unescapedFormattedList(items.map(escapeHtml), options);
}
