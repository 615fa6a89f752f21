/**
 * Placeholder grammar: `((name))` and the conditional form
 * `((name??text shown when name is truthy))`.
 */

const NAME_CHARS = "[\\p{L}\\p{N}_ \\-]";

/** Group 1 is the body between the double brackets. */
export const PLACEHOLDER_SOURCE = `\\(\\((${NAME_CHARS}+(?:\\?\\?.*?(?!\\(\\(${NAME_CHARS}+\\)\\).*?))?)\\)\\)`;

export function placeholderPattern(): RegExp {
  return new RegExp(PLACEHOLDER_SOURCE, "gu");
}

export class Placeholder {
  constructor(readonly body: string) {}

  get name(): string {
    return this.body.split("??")[0];
  }

  isConditional(): boolean {
    return this.body.includes("??");
  }

  /** Text after the first "??". Throws for plain placeholders. */
  get conditionalText(): string {
    if (!this.isConditional()) throw new TypeError(`${this.body} is not conditional`);
    return this.body.split("??").slice(1).join("??");
  }

  static shouldRenderConditional(value: unknown): boolean {
    if (value === false) return false;
    const text = String(value);
    return text !== "" && text !== "False";
  }

  getConditionalBody(value: unknown): string {
    return Placeholder.shouldRenderConditional(value) ? this.conditionalText : "";
  }
}
