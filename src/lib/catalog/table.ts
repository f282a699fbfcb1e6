import { TypeTag, type CatalogDelimiter, type TypeTagValue } from "../constants.js";
import { formatNumber } from "../formatting.js";

export interface Column {
  name: string;
  tag: TypeTagValue;
}

export type Cell = string | number | undefined;

export interface TableRow {
  /** First, untagged field */
  name: string;
  cells: Cell[];
}

export function lengthColumn(name: string): Column {
  return { name, tag: TypeTag.Length };
}

export function otherColumn(name: string): Column {
  return { name, tag: TypeTag.Other };
}

/**
 * Header line: an empty name field, then each column name followed by its type tag.
 */
export function renderHeader(columns: readonly Column[], delimiter: CatalogDelimiter): string {
  return delimiter + columns.map((c) => c.name + c.tag).join(delimiter);
}

export function renderCell(cell: Cell): string {
  if (cell === undefined) {
    return "";
  }
  return typeof cell === "number" ? formatNumber(cell) : cell;
}

export function renderRow(row: TableRow, delimiter: CatalogDelimiter): string {
  return [row.name, ...row.cells.map(renderCell)].join(delimiter);
}

/**
 * Complete delimited text, one line per row, each line terminated by "\n".
 */
export function renderTable(
  columns: readonly Column[],
  rows: readonly TableRow[],
  delimiter: CatalogDelimiter
): string {
  const lines = [renderHeader(columns, delimiter), ...rows.map((r) => renderRow(r, delimiter))];
  return lines.map((line) => line + "\n").join("");
}
