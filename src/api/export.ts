import type { FieldValue, HarvestMode, Item } from "../extraction/types";

export interface CsvColumn {
  header: string;
  field: string;
}

export const DEFAULT_CSV_COLUMNS: CsvColumn[] = [
  { header: "name", field: "name" },
  { header: "email", field: "email" },
  { header: "phone", field: "phone" },
  { header: "profile_url", field: "profileUrl" },
  { header: "headline", field: "headline" },
  { header: "location", field: "location" },
];

/** Extra columns for modes that collect more fields than the list view. */
const MODE_CSV_COLUMNS: Partial<Record<HarvestMode, CsvColumn[]>> = {
  profile_contact: [
    { header: "websites", field: "websites" },
    { header: "twitter", field: "twitter" },
  ],
};

export const csvColumnsFor = (mode: HarvestMode): CsvColumn[] => [
  ...DEFAULT_CSV_COLUMNS,
  ...(MODE_CSV_COLUMNS[mode] ?? []),
];

export const csvEscape = (input: FieldValue | undefined): string => {
  if (input === null || input === undefined) return "";
  const value = Array.isArray(input) ? input.join("; ") : input;
  if (/[",\r\n]/.test(value)) return `"${value.replace(/"/g, '""')}"`;
  return value;
};

/** One header row, then one row per item; missing fields are empty cells. */
export const renderItemsCsv = (items: Item[], columns: CsvColumn[] = DEFAULT_CSV_COLUMNS): string => {
  const lines = [columns.map((column) => csvEscape(column.header)).join(",")];
  for (const item of items) {
    lines.push(columns.map((column) => csvEscape(item.fields[column.field])).join(","));
  }
  return `${lines.join("\n")}\n`;
};

/** Flat dataset row: the identity key next to every extracted field. */
export const toDatasetRecord = (item: Item, listId: string): Record<string, FieldValue> => ({
  list_id: listId,
  key: item.key,
  ...item.fields,
});
