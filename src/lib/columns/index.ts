export { makeKey } from "./columnKey";
export { Columns } from "./columns";
export type { ColumnKey, ColumnsSource } from "./columns";
export { Cell } from "./cell";
export type { CellValue, CellErrorFn, CellInit } from "./cell";
export { Row } from "./row";
export type { RowData, RowInit } from "./row";
