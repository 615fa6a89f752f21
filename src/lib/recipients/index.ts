export { RecipientCSV } from "./recipientCsv";
export type { RecipientCSVOptions } from "./recipientCsv";
export { readCsv } from "./csvReader";
export {
  ADDRESS_COLUMNS,
  OPTIONAL_ADDRESS_COLUMNS,
  firstColumnHeadings,
  recipientHeadingsInAnyLanguage,
  isAddressColumn,
  isOptionalAddressColumn,
} from "./headings";
export * from "./validation";
