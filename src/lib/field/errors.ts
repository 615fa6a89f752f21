/** A plain placeholder had no value and redaction was off. */
export class NullValueForNonConditionalPlaceholderError extends Error {
  constructor(readonly placeholder: string) {
    super(`No value for placeholder ((${placeholder}))`);
    this.name = "NullValueForNonConditionalPlaceholderError";
  }
}
