import { SMS_CUSTOM_CONTENT_TOO_LONG_SUFFIX } from "../limits";
import { makeKey } from "./columnKey";
import type { ColumnKey } from "./columns";

/** A raw CSV value: absent, a string, or several values collected under one header. */
export type CellValue = string | null | (string | null)[];

export type CellErrorFn = (key: ColumnKey, value: CellValue) => string | null;

export type CellInit = {
  key?: ColumnKey;
  value?: CellValue;
  errorFn?: CellErrorFn | null;
  /** Placeholder column keys; cells outside them are ignored. */
  placeholders?: Iterable<string> | null;
};

function sameValue(a: CellValue, b: CellValue): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => item === b[i]);
  }
  return a === b;
}

export class Cell {
  static readonly missingFieldError = "Missing";

  readonly data: CellValue;
  readonly error: string | null;
  readonly ignore: boolean;

  constructor({ key = null, value = null, errorFn = null, placeholders = null }: CellInit = {}) {
    this.data = value;
    this.error = errorFn ? errorFn(key, value) : null;

    const columnKey = makeKey(key);
    const known = new Set(placeholders ?? []);
    this.ignore = columnKey === null || !known.has(columnKey);
  }

  equals(other: Cell): boolean {
    return (
      sameValue(this.data, other.data) &&
      this.error === other.error &&
      this.ignore === other.ignore
    );
  }

  /** True when the error concerns the recipient itself rather than missing data or length. */
  get recipientError(): boolean {
    if (this.error === null || this.error === Cell.missingFieldError) return false;
    return !this.error.includes(SMS_CUSTOM_CONTENT_TOO_LONG_SUFFIX);
  }
}
