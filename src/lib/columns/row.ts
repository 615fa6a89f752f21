import type { TemplateType } from "../templates/types";
import { Cell, type CellErrorFn, type CellValue } from "./cell";
import { Columns, type ColumnKey } from "./columns";

/** Raw CSV row: header as written (or null for surplus cells) to value. */
export type RowData = ReadonlyMap<ColumnKey, CellValue>;

const EMAIL_RECIPIENT_HEADERS = ["email address", "adresse courriel", "to"] as const;
const SMS_RECIPIENT_HEADERS = ["phone number", "numéro de téléphone", "to"] as const;

export type RowInit = {
  rowData: RowData;
  index: number;
  errorFn?: CellErrorFn | null;
  recipientColumnHeaders: readonly string[];
  /** Placeholder column keys, recipient columns included. */
  placeholders: readonly string[];
  templateType?: TemplateType | null;
  /** Binds the row's values to a template and reports whether the message is too long. */
  checkMessageLength?: ((rowData: RowData) => boolean) | null;
};

export class Row {
  readonly index: number;
  readonly recipientColumnHeaders: readonly string[];
  readonly placeholders: readonly string[];
  readonly templateType: TemplateType | null;
  readonly messageTooLong: boolean;

  private readonly cells: Columns<Cell>;
  private readonly recipientLookupHeaders: readonly string[];

  constructor(init: RowInit) {
    this.index = init.index;
    this.recipientColumnHeaders = init.recipientColumnHeaders;
    this.placeholders = init.placeholders;
    this.templateType = init.templateType ?? null;
    this.recipientLookupHeaders =
      this.templateType === "email" ? EMAIL_RECIPIENT_HEADERS : SMS_RECIPIENT_HEADERS;

    this.messageTooLong = init.checkMessageLength ? init.checkMessageLength(init.rowData) : false;

    const cells: [ColumnKey, Cell][] = [];
    for (const [key, value] of init.rowData) {
      cells.push([
        key,
        new Cell({ key, value, errorFn: init.errorFn, placeholders: init.placeholders }),
      ]);
    }
    this.cells = new Columns(cells);
  }

  get size(): number {
    return this.cells.size;
  }

  /** The cell under a header; an empty cell when the row has no such column. */
  get(key: ColumnKey): Cell {
    return this.cells.get(key) ?? new Cell();
  }

  has(key: ColumnKey): boolean {
    return this.cells.has(key);
  }

  keys(): ColumnKey[] {
    return this.cells.keys();
  }

  entries(): [ColumnKey, Cell][] {
    return this.cells.entries();
  }

  get hasError(): boolean {
    return this.messageTooLong || this.cells.values().some((cell) => cell.error !== null);
  }

  get hasBadRecipient(): boolean {
    return this.recipientLookupHeaders.some((header) => this.get(header).recipientError);
  }

  get hasMissingData(): boolean {
    return this.cells.values().some((cell) => cell.error === Cell.missingFieldError);
  }

  /** First recipient value found, trying English headers, then French, then "to". */
  get recipient(): CellValue {
    for (const header of this.recipientLookupHeaders) {
      const value = this.get(header).data;
      if (value !== null) return value;
    }
    return null;
  }

  get personalisation(): Columns<CellValue> {
    const keys = new Set(this.placeholders);
    return new Columns(
      this.cells
        .entries()
        .filter(([key]) => key !== null && keys.has(key))
        .map(([key, cell]): [ColumnKey, CellValue] => [key, cell.data]),
    );
  }

  get recipientAndPersonalisation(): Columns<CellValue> {
    return new Columns(
      this.cells.entries().map(([key, cell]): [ColumnKey, CellValue] => [key, cell.data]),
    );
  }
}
