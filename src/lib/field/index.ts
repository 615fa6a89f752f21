export { Field, stringifyValue } from "./field";
export type { FieldOptions, FieldValues, HtmlMode, PlaceholderMeta } from "./field";
export { Placeholder, PLACEHOLDER_SOURCE, placeholderPattern } from "./placeholder";
export { NullValueForNonConditionalPlaceholderError } from "./errors";
