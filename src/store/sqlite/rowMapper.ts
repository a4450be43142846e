import type { DatasetEntry } from '../DatasetStore.js';

export interface DatasetRow {
  key: string;
  valueJson: string | null;
  isList: number;
  broadcast: number;
  updatedAt: string;
}

export interface DatasetItemRow {
  valueJson: string;
}

function parse(json: string): unknown {
  const value: unknown = JSON.parse(json);
  return value;
}

/** List datasets take their value from the item rows, in insertion order. */
export function mapDatasetRow(row: DatasetRow, items: readonly DatasetItemRow[]): DatasetEntry {
  return {
    key: row.key,
    value: row.isList ? items.map((item) => parse(item.valueJson)) : parse(row.valueJson ?? 'null'),
    broadcast: Boolean(row.broadcast),
    updatedAt: row.updatedAt
  };
}
