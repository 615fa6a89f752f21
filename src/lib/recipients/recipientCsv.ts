/**
 * RecipientCSV: an uploaded recipient table, parsed lazily and validated
 * cell by cell.
 *
 * Data problems never throw. They are recorded on cells and rows and
 * summarised by the structural and capacity flags, so one pass can report
 * everything wrong with a file.
 */

import { Cell, Columns, Row, makeKey, type CellValue, type ColumnKey, type RowData } from "../columns";
import { NullValueForNonConditionalPlaceholderError } from "../field";
import { stripAndRemoveObscureWhitespace, stripWhitespace } from "../formatters/whitespace";
import { DEFAULT_MAX_ROWS, SMS_CHAR_COUNT_LIMIT } from "../limits";
import { SMSMessageTemplate, type Template } from "../templates";
import type { TemplateType, UserLanguage } from "../templates/types";
import { readCsv } from "./csvReader";
import {
  firstColumnHeadings,
  isOptionalAddressColumn,
  recipientHeadingsInAnyLanguage,
} from "./headings";
import {
  allowedToSendTo,
  checkRecipient,
  checkSmsMessageLength,
  weightedSmsLength,
} from "./validation";

export type RecipientCSVOptions = {
  templateType: TemplateType;
  placeholders?: Iterable<string> | null;
  maxErrorsShown?: number;
  maxInitialRowsShown?: number;
  safelist?: Iterable<string> | null;
  template?: Template | null;
  remainingMessages?: number;
  remainingDailyMessages?: number;
  remainingAnnualMessages?: number;
  internationalSms?: boolean;
  maxRows?: number;
  userLanguage?: UserLanguage;
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** A second value under the same header turns the entry into a list. */
function insertOrAppend(data: Map<ColumnKey, CellValue>, key: ColumnKey, value: string | null): void {
  const existing = data.get(key);
  if (Array.isArray(existing)) {
    existing.push(value);
  } else if (existing) {
    data.set(key, [existing, value]);
  } else {
    data.set(key, value);
  }
}

function* take<T>(source: Iterable<T>, count: number): Generator<T> {
  if (count <= 0) return;
  let taken = 0;
  for (const item of source) {
    yield item;
    if (++taken >= count) return;
  }
}

function isBlank(value: CellValue): boolean {
  return value === null || value === "";
}

function flatten(value: CellValue): string {
  if (Array.isArray(value)) return value.filter((item): item is string => Boolean(item)).join("");
  return value ?? "";
}

// ---------------------------------------------------------------------------
// RecipientCSV
// ---------------------------------------------------------------------------

export class RecipientCSV {
  readonly fileData: string;
  readonly templateType: TemplateType;
  readonly userLanguage: UserLanguage;
  readonly maxErrorsShown: number;
  readonly maxInitialRowsShown: number;
  readonly template: Template | null;
  readonly remainingMessages: number;
  readonly remainingDailyMessages: number;
  readonly remainingAnnualMessages: number;
  readonly internationalSms: boolean;
  readonly maxRows: number;

  /** Recipient headings for the template type in the upload's language. */
  readonly recipientColumnHeaders: readonly string[];
  /** Recipient headings accepted in either language. */
  readonly recipientColumnHeadersLangCheck: readonly string[];

  private currentPlaceholders: string[] = [];
  private currentSafelist: string[] = [];
  private placeholderKeys = new Set<string>();
  private readonly recipientKeys: ReadonlySet<string>;
  private readonly langCheckKeys: ReadonlySet<string>;
  private rowsCache: (Row | null)[] | null = null;
  private headersCache: string[] | null = null;

  constructor(fileData: string, options: RecipientCSVOptions) {
    this.fileData = stripWhitespace(fileData, ",");
    this.templateType = options.templateType;
    this.userLanguage = options.userLanguage ?? "en";
    this.maxErrorsShown = options.maxErrorsShown ?? 20;
    this.maxInitialRowsShown = options.maxInitialRowsShown ?? 10;
    this.template = options.template ?? null;
    this.remainingMessages = options.remainingMessages ?? Number.POSITIVE_INFINITY;
    this.remainingDailyMessages = options.remainingDailyMessages ?? Number.POSITIVE_INFINITY;
    this.remainingAnnualMessages = options.remainingAnnualMessages ?? Number.POSITIVE_INFINITY;
    this.internationalSms = options.internationalSms ?? false;
    this.maxRows = options.maxRows ?? DEFAULT_MAX_ROWS;

    this.recipientColumnHeaders = firstColumnHeadings[this.userLanguage][this.templateType];
    this.recipientColumnHeadersLangCheck = recipientHeadingsInAnyLanguage[this.templateType];
    this.recipientKeys = new Set(this.recipientColumnHeaders.map((header) => makeKey(header)));
    this.langCheckKeys = new Set(this.recipientColumnHeadersLangCheck.map((header) => makeKey(header)));

    this.placeholders = options.placeholders;
    this.safelist = options.safelist;
  }

  // -------------------------------------------------------------------------
  // Settable inputs
  // -------------------------------------------------------------------------

  /** Template placeholders followed by the recipient headings. */
  get placeholders(): string[] {
    return this.currentPlaceholders;
  }

  set placeholders(value: Iterable<string> | null | undefined) {
    this.currentPlaceholders = [...(value ?? []), ...this.recipientColumnHeaders];
    this.placeholderKeys = new Set(this.currentPlaceholders.map((placeholder) => makeKey(placeholder)));
  }

  get placeholdersAsColumnKeys(): string[] {
    return [...this.placeholderKeys];
  }

  get safelist(): string[] {
    return this.currentSafelist;
  }

  set safelist(value: Iterable<string> | null | undefined) {
    this.currentSafelist = [...(value ?? [])];
  }

  // -------------------------------------------------------------------------
  // Rows
  // -------------------------------------------------------------------------

  /** Every data row; rows past maxRows are kept as null. Parsed once. */
  get rows(): (Row | null)[] {
    if (this.rowsCache === null) {
      this.rowsCache = [...this.getRows()];
      if (this.rowsCache.length > this.maxRows) {
        console.warn("[recipients] csv exceeds max rows", {
          rows: this.rowsCache.length,
          maxRows: this.maxRows,
        });
      }
    }
    return this.rowsCache;
  }

  get length(): number {
    return this.rows.length;
  }

  /** Row at index; negative indexes count from the end. */
  at(index: number): Row | null | undefined {
    return this.rows.at(index);
  }

  *getRows(): Generator<Row | null, void, undefined> {
    const headers = this.rawColumnHeaders;
    const records = readCsv(this.fileData);
    records.next();

    let index = 0;
    for (const record of records) {
      if (index < this.maxRows) {
        yield this.buildRow(headers, record, index);
      } else {
        yield null;
      }
      index++;
    }
  }

  private buildRow(headers: readonly string[], record: readonly string[], index: number): Row {
    const rowData = new Map<ColumnKey, CellValue>();

    const paired = Math.min(headers.length, record.length);
    for (let i = 0; i < paired; i++) {
      const header = headers[i];
      const value = stripAndRemoveObscureWhitespace(record[i]) || null;
      if (this.langCheckKeys.has(makeKey(header))) {
        rowData.set(header, value);
      } else {
        insertOrAppend(rowData, header, value);
      }
    }

    if (record.length > headers.length) {
      rowData.set(null, record.slice(headers.length));
    } else {
      for (const header of headers.slice(record.length)) insertOrAppend(rowData, header, null);
    }

    return new Row({
      rowData,
      index,
      errorFn: (key, value) => this.getErrorForField(key, value),
      recipientColumnHeaders: this.recipientColumnHeaders,
      placeholders: this.placeholdersAsColumnKeys,
      templateType: this.templateType,
      checkMessageLength: this.template ? (data) => this.isMessageTooLong(data) : null,
    });
  }

  private isMessageTooLong(rowData: RowData): boolean {
    const template = this.template;
    if (!template) return false;

    template.values = rowData;
    try {
      return template.isMessageTooLong();
    } catch (error) {
      // missing values are already reported on the row's cells
      if (error instanceof NullValueForNonConditionalPlaceholderError) return false;
      throw error;
    }
  }

  // -------------------------------------------------------------------------
  // Row views
  // -------------------------------------------------------------------------

  private *filterRows(predicate: (row: Row) => boolean): Generator<Row, void, undefined> {
    for (const row of this.rows) {
      if (row && predicate(row)) yield row;
    }
  }

  get rowsWithErrors(): Generator<Row, void, undefined> {
    return this.filterRows((row) => row.hasError);
  }

  get rowsWithBadRecipients(): Generator<Row, void, undefined> {
    return this.filterRows((row) => row.hasBadRecipient);
  }

  get rowsWithMissingData(): Generator<Row, void, undefined> {
    return this.filterRows((row) => row.hasMissingData);
  }

  get rowsWithMessageTooLong(): Generator<Row, void, undefined> {
    return this.filterRows((row) => row.messageTooLong);
  }

  /**
   * Rows whose placeholder values, weighted by SMS alphabet, plus the
   * template content exceed the SMS character limit.
   */
  get rowsWithCombinedVariableContentTooLong(): Generator<Row, void, undefined> {
    const template = this.template;
    if (!template) return this.filterRows(() => false);

    const names = [...template.placeholderNames];
    return this.filterRows((row) => {
      const personalisation = row.personalisation;
      if (personalisation.size === 0) return false;

      let variableLength = 0;
      for (const value of Object.values(personalisation.asRecordWithKeys(names))) {
        if (value) variableLength += weightedSmsLength(flatten(value));
      }
      return variableLength + template.content.length > SMS_CHAR_COUNT_LIMIT;
    });
  }

  get initialRows(): Generator<Row, void, undefined> {
    return take(this.filterRows(() => true), this.maxInitialRowsShown);
  }

  get initialRowsWithErrors(): Generator<Row, void, undefined> {
    return take(this.rowsWithErrors, this.maxErrorsShown);
  }

  /** Rows to show the user: the first errors when there are any, else the first rows. */
  get displayedRows(): Generator<Row, void, undefined> {
    if (!this.rowsWithErrors.next().done && this.missingColumnHeaders.size === 0) {
      return this.initialRowsWithErrors;
    }
    return this.initialRows;
  }

  // -------------------------------------------------------------------------
  // Structure
  // -------------------------------------------------------------------------

  private get rawColumnHeaders(): string[] {
    if (this.headersCache === null) {
      const first = readCsv(this.fileData).next();
      this.headersCache = first.done ? [] : first.value;
    }
    return this.headersCache;
  }

  /** Distinct headers as written, in file order. */
  get columnHeaders(): string[] {
    return [...new Set(this.rawColumnHeaders)];
  }

  get columnHeadersAsColumnKeys(): ColumnKey[] {
    return Columns.fromKeys(this.columnHeaders).keys();
  }

  get missingColumnHeaders(): Set<string> {
    const present = new Set(this.columnHeadersAsColumnKeys);
    const missing = new Set<string>();
    const anyRecipientPresent = [...this.langCheckKeys].some((key) => present.has(key));

    for (const placeholder of this.placeholders) {
      const key = makeKey(placeholder);
      // letters need every required address line, not just one
      if (this.templateType !== "letter" && this.langCheckKeys.has(key)) {
        if (!anyRecipientPresent) missing.add(placeholder);
      } else if (!present.has(key) && !this.isOptionalAddressColumn(placeholder)) {
        missing.add(placeholder);
      }
    }
    return missing;
  }

  /** Headers, as written, that repeat a recipient column. */
  get duplicateRecipientColumnHeaders(): Set<string> {
    const counts = new Map<string, number>();
    for (const header of this.rawColumnHeaders) {
      const key = makeKey(header);
      if (this.recipientKeys.has(key)) counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    return new Set(this.rawColumnHeaders.filter((header) => (counts.get(makeKey(header)) ?? 0) > 1));
  }

  get hasRecipientColumns(): boolean {
    return this.columnHeadersAsColumnKeys.some((key) => key !== null && this.langCheckKeys.has(key));
  }

  isOptionalAddressColumn(key: string): boolean {
    return this.templateType === "letter" && isOptionalAddressColumn(key);
  }

  // -------------------------------------------------------------------------
  // Capacity and sending
  // -------------------------------------------------------------------------

  get tooManyRows(): boolean {
    return this.length > this.maxRows;
  }

  get moreRowsThanCanSend(): boolean {
    return this.length > this.remainingMessages;
  }

  get moreRowsThanCanSendToday(): boolean {
    return this.length > this.remainingDailyMessages;
  }

  get moreRowsThanCanSendThisYear(): boolean {
    return this.length > this.remainingAnnualMessages;
  }

  get allowedToSendTo(): boolean {
    if (this.templateType === "letter" || this.safelist.length === 0) return true;
    return this.rows.every((row) => row === null || allowedToSendTo(row.recipient, this.safelist));
  }

  /** Fragments needed to send every row; rows missing data count the bare template. */
  get smsFragmentCount(): number {
    if (this.templateType !== "sms") return 0;
    if (!this.template) return this.length;

    const prefix = this.template instanceof SMSMessageTemplate ? this.template.prefix : null;
    let fragments = 0;
    for (const row of this.rows) {
      if (!row) continue;
      const sms = new SMSMessageTemplate(this.template.raw, {
        values: row.hasMissingData ? null : row.personalisation,
        prefix,
      });
      fragments += sms.fragmentCount;
    }
    return fragments;
  }

  get hasErrors(): boolean {
    return (
      this.missingColumnHeaders.size > 0 ||
      this.duplicateRecipientColumnHeaders.size > 0 ||
      this.moreRowsThanCanSend ||
      this.moreRowsThanCanSendThisYear ||
      this.moreRowsThanCanSendToday ||
      this.tooManyRows ||
      !this.allowedToSendTo ||
      !this.rowsWithErrors.next().done
    );
  }

  // -------------------------------------------------------------------------
  // Cell validation
  // -------------------------------------------------------------------------

  private getErrorForField(key: ColumnKey, value: CellValue): string | null {
    if (key === null || this.isOptionalAddressColumn(key)) return null;

    const columnKey = makeKey(key);

    if (this.recipientKeys.has(columnKey)) {
      if (isBlank(value) || Array.isArray(value)) {
        return this.duplicateRecipientColumnHeaders.size > 0 ? null : Cell.missingFieldError;
      }
      const result = checkRecipient(value, this.templateType, {
        column: key,
        internationalSms: this.internationalSms,
      });
      if (!result.ok) return result.error.message;
    }

    if (!this.placeholderKeys.has(columnKey)) return null;
    if (isBlank(value)) return Cell.missingFieldError;

    if (this.template?.templateType === "sms") {
      const result = checkSmsMessageLength(flatten(value), this.template.content);
      if (!result.ok) return result.error.message;
    }
    return null;
  }
}
