import { isNumericCell } from "../number-parsing.js";
import type { CellValue } from "../types.js";
import { max, min, sum } from "./statistics.js";

export const PIVOT_AGGREGATIONS = ["sum", "avg", "min", "max", "count"] as const;

export type PivotAggregation = (typeof PIVOT_AGGREGATIONS)[number];

export type PivotRecord = Record<string, CellValue>;

export interface PivotRequest {
  rows: CellValue[][];
  /** Record key for each column offset (see `headerKeys`). */
  keys: string[];
  rowOffsets: number[];
  columnOffsets: number[];
  valueOffsets: number[];
  aggregation: PivotAggregation;
}

// Group name used when no column keys are requested.
const SINGLE_GROUP = "Value";

function aggregate(values: number[], aggregation: PivotAggregation): number {
  switch (aggregation) {
    case "sum":
      return sum(values);
    case "avg":
      return sum(values) / values.length;
    case "min":
      return min(values);
    case "max":
      return max(values);
    case "count":
      return values.length;
    default: {
      const exhaustive: never = aggregation;
      throw new Error(`Unhandled aggregation: ${exhaustive}`);
    }
  }
}

function groupName(row: CellValue[], columnOffsets: number[]): string {
  if (columnOffsets.length === 0) return SINGLE_GROUP;
  return columnOffsets
    .map((offset) => row[offset] ?? null)
    .filter((value) => value !== null)
    .map((value) => String(value))
    .join("_");
}

/**
 * Group-by over `(row key, column key)`. Row keys keep first-seen order,
 * column groups are sorted by name. Non-numeric value cells are skipped, so a
 * row key whose value cells are all non-numeric produces no record.
 *
 * With several value columns each group name is prefixed by the value
 * column's key (`Sales_East`).
 */
export function buildPivot(request: PivotRequest): PivotRecord[] {
  const { rows, keys, rowOffsets, columnOffsets, valueOffsets, aggregation } = request;
  const groups = new Map<string, { rowKey: CellValue[]; cells: Map<string, number[]> }>();
  const groupNames = new Set<string>();

  for (const row of rows) {
    const rowKey = rowOffsets.map((offset) => row[offset] ?? null);
    const baseName = groupName(row, columnOffsets);

    for (const valueOffset of valueOffsets) {
      const value = row[valueOffset] ?? null;
      if (!isNumericCell(value)) continue;

      const id = JSON.stringify(rowKey);
      let group = groups.get(id);
      if (!group) {
        group = { rowKey, cells: new Map() };
        groups.set(id, group);
      }

      const name = valueOffsets.length > 1 ? `${keys[valueOffset] ?? ""}_${baseName}` : baseName;
      groupNames.add(name);
      const bucket = group.cells.get(name);
      if (bucket) bucket.push(value);
      else group.cells.set(name, [value]);
    }
  }

  const sortedNames = [...groupNames].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  const records: PivotRecord[] = [];
  for (const { rowKey, cells } of groups.values()) {
    const record: PivotRecord = {};
    rowOffsets.forEach((offset, i) => {
      record[keys[offset] ?? String(offset)] = rowKey[i] ?? null;
    });
    for (const name of sortedNames) {
      const values = cells.get(name);
      record[name] = values ? aggregate(values, aggregation) : null;
    }
    records.push(record);
  }
  return records;
}
