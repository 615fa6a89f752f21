/**
 * Field: placeholder substitution over a block of template text.
 *
 * With no values the text renders with placeholders highlighted as HTML
 * spans. With values each placeholder is replaced by its value, passed
 * through the active HTML mode.
 */

import { Columns, type ColumnsSource } from "../columns";
import { escapeHtml, stripDvlaMarkup, stripHtml } from "../formatters/html";
import { unescapedFormattedList } from "../formatters/lists";
import { NullValueForNonConditionalPlaceholderError } from "./errors";
import { Placeholder, placeholderPattern } from "./placeholder";

export type HtmlMode = "strip" | "escape" | "passthrough" | "strip_dvla_markup";

export type FieldValues = ColumnsSource<unknown> | null | undefined;

export type FieldOptions = {
  /** Show `((name))` brackets around unfilled placeholders. */
  withBrackets?: boolean;
  html?: HtmlMode;
  /** Render list values as Markdown bullets instead of "a, b and c". */
  markdownLists?: boolean;
  redactMissingPersonalisation?: boolean;
  /** Highlight placeholders and never raise for missing values. */
  previewMode?: boolean;
};

export type PlaceholderMeta = { isConditional: boolean };

const SANITIZERS: Record<HtmlMode, (value: string) => string> = {
  strip: stripHtml,
  escape: escapeHtml,
  passthrough: (value) => value,
  strip_dvla_markup: stripDvlaMarkup,
};

const placeholderTag = (name: string) => `<span class='placeholder'>((${name}))</span>`;
const placeholderTagWithHighlight = (name: string) =>
  `<span class='placeholder'><mark>((${name}))</mark></span>`;
const placeholderTagNoBrackets = (name: string) =>
  `<span class='placeholder-no-brackets'>${name}</span>`;
const conditionalPlaceholderTag = (name: string, text: string) =>
  `<span class='placeholder-conditional'>((${name}??</span>${text}))`;
const PLACEHOLDER_TAG_REDACTED = "<span class='placeholder-redacted'>hidden</span>";

const BLOCK_QUOTE_LINE = /^\s*\^/;

export function stringifyValue(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (Array.isArray(value)) return `[${value.map(stringifyValue).join(", ")}]`;
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function isPresent(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  return value !== null && value !== undefined && value !== "" && value !== false && value !== 0;
}

export class Field {
  readonly content: string;
  readonly values: Columns<unknown>;
  readonly markdownLists: boolean;
  readonly previewMode: boolean;
  readonly redactMissingPersonalisation: boolean;

  private readonly sanitize: (value: string) => string;
  private readonly tag: (name: string) => string;

  constructor(content: string, values?: FieldValues, options: FieldOptions = {}) {
    const {
      withBrackets = true,
      html = "strip",
      markdownLists = false,
      redactMissingPersonalisation = false,
      previewMode = false,
    } = options;

    this.content = content;
    this.values = new Columns(values);
    this.markdownLists = markdownLists;
    this.previewMode = previewMode;
    this.redactMissingPersonalisation = redactMissingPersonalisation;
    this.sanitize = SANITIZERS[html];

    if (previewMode) this.tag = placeholderTagWithHighlight;
    else if (!withBrackets) this.tag = placeholderTagNoBrackets;
    else this.tag = placeholderTag;
  }

  toString(): string {
    return this.values.size > 0 ? this.replaced : this.formatted;
  }

  /** Distinct placeholders in order of first appearance. */
  get placeholders(): Placeholder[] {
    const seen = new Map<string, Placeholder>();
    for (const match of this.content.matchAll(placeholderPattern())) {
      if (!seen.has(match[1])) seen.set(match[1], new Placeholder(match[1]));
    }
    return [...seen.values()];
  }

  get placeholderNames(): Set<string> {
    return new Set(this.placeholders.map((placeholder) => placeholder.name));
  }

  get placeholdersMeta(): Map<string, PlaceholderMeta> {
    const meta = new Map<string, PlaceholderMeta>();
    for (const placeholder of this.placeholders) {
      const isConditional = (meta.get(placeholder.name)?.isConditional ?? false) || placeholder.isConditional();
      meta.set(placeholder.name, { isConditional });
    }
    return meta;
  }

  get formatted(): string {
    return this.sanitize(this.content).replace(placeholderPattern(), (_match: string, body: string) =>
      this.formatMatch(new Placeholder(body)),
    );
  }

  /**
   * Substitute values line by line. Inside a `^` block quote every newline a
   * value introduces continues the quote.
   */
  get replaced(): string {
    return this.sanitize(this.content)
      .split("\n")
      .map((line) => this.replaceLine(line))
      .join("\n");
  }

  private replaceLine(line: string): string {
    if (!line.includes("((")) return line;

    const inBlockQuote = BLOCK_QUOTE_LINE.test(line);
    const replaced = line.replace(placeholderPattern(), (_match: string, body: string) => {
      const value = this.replaceMatch(new Placeholder(body));
      return inBlockQuote ? value.replace(/\n/g, "\n^ ") : value;
    });
    return inBlockQuote ? replaced.replace(/\n\^ ?$/, "") : replaced;
  }

  private formatMatch(placeholder: Placeholder): string {
    if (this.redactMissingPersonalisation) return PLACEHOLDER_TAG_REDACTED;

    if (placeholder.isConditional()) {
      return conditionalPlaceholderTag(
        this.sanitize(placeholder.name),
        this.sanitize(placeholder.conditionalText),
      );
    }
    return this.tag(this.sanitize(placeholder.name));
  }

  private replaceMatch(placeholder: Placeholder): string {
    const replacement = this.values.get(placeholder.name);

    if (placeholder.isConditional() && replacement !== null && replacement !== undefined) {
      const rendered = this.sanitize(stringifyValue(replacement));
      return placeholder.getConditionalBody(replacement).replace(/\{\}/g, () => rendered);
    }

    if (!this.previewMode) {
      const value = this.getReplacement(placeholder);
      if (value !== null) return value;
      if (!this.redactMissingPersonalisation && !placeholder.isConditional()) {
        throw new NullValueForNonConditionalPlaceholderError(placeholder.name);
      }
    }

    return this.formatMatch(placeholder);
  }

  private getReplacement(placeholder: Placeholder): string | null {
    const replacement: unknown = this.values.get(placeholder.name);
    if (replacement === null || replacement === undefined) return null;

    if (Array.isArray(replacement)) {
      const items = replacement.filter(isPresent).map(stringifyValue);
      if (items.length === 0) return null;
      return this.sanitize(this.formatList(items));
    }

    return this.sanitize(stringifyValue(replacement));
  }

  private formatList(items: string[]): string {
    if (this.markdownLists) {
      return `\n\n${items.map((item) => `* ${item}`).join("\n")}`;
    }
    return unescapedFormattedList(items, { beforeEach: "", afterEach: "" });
  }
}
