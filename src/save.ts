import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import Papa from "papaparse";

export async function saveJson(data: unknown, path: string) {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(data, null, 2), "utf-8");
  return path;
}

export async function saveCsv<T extends Record<string, unknown>>(rows: T[], columns: (keyof T & string)[], path: string) {
  await mkdir(dirname(path), { recursive: true });
  const csv = Papa.unparse({
    fields: columns,
    data: rows.map((r) => columns.map((c) => r[c])),
  });
  await writeFile(path, csv, "utf-8");
  return path;
}
