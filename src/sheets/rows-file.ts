import fs from "node:fs/promises";

type RawRow = unknown[];

function coerceCell(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return "";
}

function toRows(entries: unknown[]): string[][] {
  return entries
    .filter((entry): entry is RawRow => Array.isArray(entry))
    .map((entry) => entry.map(coerceCell));
}

function parseNdjson(raw: string): string[][] {
  const entries = raw
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line) => JSON.parse(line) as unknown);
  return toRows(entries);
}

function parseJson(raw: string): string[][] {
  const parsed = JSON.parse(raw) as unknown;
  if (!Array.isArray(parsed)) {
    return [];
  }
  return toRows(parsed);
}

export function parseRows(raw: string): string[][] {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new Error("rows file is empty");
  }
  // A JSON document starts with "[["; NDJSON lines each start with a single "[".
  const isDocument = /^\[\s*\[/.test(trimmed) || trimmed === "[]";
  const rows = isDocument ? parseJson(trimmed) : parseNdjson(trimmed);
  if (rows.length === 0) {
    throw new Error("rows file has no rows");
  }
  return rows;
}

/**
 * Reads a worksheet export: a JSON array of row arrays, or NDJSON with one row array per line.
 * The first row is the header, as in the sheet.
 */
export async function loadRowsFile(params: { filePath: string }): Promise<string[][]> {
  const raw = await fs.readFile(params.filePath, "utf-8");
  return parseRows(raw);
}
