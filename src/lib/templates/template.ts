/**
 * Template: base wrapper around a stored template and its personalisation.
 *
 * Content is fixed at construction. Values can be replaced; they are kept
 * under normalized column keys and limited to the template's placeholders
 * plus any keys that match no placeholder.
 */

import { Columns, makeKey } from "../columns";
import { Field, type PlaceholderMeta } from "../field";
import { TemplateInputSchema, type PersonalisationInput, type TemplateInput, type TemplateType } from "./types";

export type TemplateOptions = {
  values?: TemplateValues;
  redactMissingPersonalisation?: boolean;
};

export type TemplateValues = PersonalisationInput | Columns<unknown> | null | undefined;

function isMapping(value: unknown): boolean {
  if (value instanceof Map || value instanceof Columns) return true;
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isEmptyMapping(value: PersonalisationInput | Columns<unknown>): boolean {
  if (value instanceof Columns || value instanceof Map) return value.size === 0;
  return Object.keys(value).length === 0;
}

function valueKeys(value: PersonalisationInput | Columns<unknown>): string[] {
  if (value instanceof Columns || value instanceof Map) {
    return [...value.keys()].filter((key): key is string => typeof key === "string");
  }
  return Object.keys(value);
}

export class Template {
  readonly id: string | null;
  readonly name: string | null;
  readonly content: string;
  readonly templateType: TemplateType | null;
  readonly raw: TemplateInput;
  redactMissingPersonalisation: boolean;

  private currentValues = new Columns<unknown>();
  private extraKeys: string[] = [];

  constructor(template: unknown, options: TemplateOptions = {}) {
    if (!isMapping(template) || template instanceof Map) {
      throw new TypeError("Template must be a mapping");
    }
    if (options.values !== undefined && options.values !== null && !isMapping(options.values)) {
      throw new TypeError("Values must be a mapping");
    }

    const parsed = TemplateInputSchema.safeParse(template);
    if (!parsed.success) {
      console.error("[templates] invalid template", parsed.error.flatten().fieldErrors);
      throw new TypeError(`Invalid template: ${parsed.error.issues.map((issue) => issue.path.join(".")).join(", ")}`);
    }

    this.raw = parsed.data;
    this.id = parsed.data.id ?? null;
    this.name = parsed.data.name ?? null;
    this.content = parsed.data.content;
    this.templateType = parsed.data.template_type ?? null;
    this.redactMissingPersonalisation = options.redactMissingPersonalisation ?? false;
    this.values = options.values;
  }

  get values(): Columns<unknown> {
    return this.currentValues;
  }

  set values(value: TemplateValues) {
    if (value && !isMapping(value)) throw new TypeError("Values must be a mapping");
    if (!value || isEmptyMapping(value)) {
      this.currentValues = new Columns();
      this.extraKeys = [];
      return;
    }

    const placeholders = this.placeholderNames;
    const placeholderKeys = new Set([...placeholders].map((name) => makeKey(name)));
    this.extraKeys = valueKeys(value).filter((key) => !placeholderKeys.has(makeKey(key)));

    const source = new Columns<unknown>(value);
    this.currentValues = new Columns(source.asRecordWithKeys([...placeholders, ...this.extraKeys]));
  }

  get placeholderNames(): Set<string> {
    return new Field(this.content).placeholderNames;
  }

  get placeholdersMeta(): Map<string, PlaceholderMeta> {
    return new Field(this.content).placeholdersMeta;
  }

  /** Placeholder names that have no value yet. */
  get missingData(): string[] {
    return [...this.placeholderNames].filter((name) => {
      const value = this.values.get(name);
      return value === null || value === undefined;
    });
  }

  /** Value keys, as supplied, that match no placeholder. */
  get additionalData(): Set<string> {
    return new Set(this.extraKeys);
  }

  getRaw(key: string): unknown {
    return this.raw[key];
  }

  isMessageTooLong(): boolean {
    return false;
  }

  isNameTooLong(): boolean {
    return false;
  }

  toString(): string {
    return new Field(this.content, this.values, {
      html: "escape",
      redactMissingPersonalisation: this.redactMissingPersonalisation,
    }).toString();
  }
}
