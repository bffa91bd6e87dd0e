import { readFile } from "node:fs/promises";
import _ from "lodash";
import { z } from "zod";
import { DataCorruptionError, describeError, PersistenceError } from "./errors";
import { log } from "./logger";
import { fromSentinel, toSentinel } from "./normalize";
import { saveCsv, saveJson } from "./save";
import type { Restaurant, RestaurantRow, RunState } from "./types";

const RunStateFile = z.object({
  start_index: z.number().int().min(1),
  scraped_urls: z.array(z.string()),
  enriched_urls: z.array(z.string()).default([]),
});

const RecordsFile = z.array(
  z.object({
    name: z.string(),
    website: z.string(),
    email: z.string(),
    phone: z.string(),
  })
);

const COLUMNS: (keyof RestaurantRow)[] = ["name", "website", "email", "phone"];

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Parsed and validated file contents, or the fallback when the file is absent or unusable. */
async function readStored<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: () => T): Promise<T> {
  const corrupt = (reason: string) => {
    log("WARN", `Ignoring '${path}', starting from defaults`, new DataCorruptionError(path, reason));
    return fallback();
  };

  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return fallback();
    return corrupt(describeError(err));
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    return corrupt(describeError(err));
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return corrupt(parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; "));
  }
  return parsed.data;
}

async function persist(path: string, write: () => Promise<string>): Promise<boolean> {
  try {
    await write();
    return true;
  } catch (err) {
    log("ERROR", `Could not save '${path}'`, new PersistenceError(path, err));
    return false;
  }
}

function toRow(r: Restaurant): RestaurantRow {
  return { name: r.name, website: r.website, email: toSentinel(r.email), phone: toSentinel(r.phone) };
}

function fromRow(row: RestaurantRow): Restaurant {
  return { name: row.name, website: row.website, email: fromSentinel(row.email), phone: fromSentinel(row.phone) };
}

export async function loadRunState(path: string): Promise<RunState> {
  const file = await readStored(path, RunStateFile, () => ({ start_index: 1, scraped_urls: [], enriched_urls: [] }));
  return {
    startIndex: file.start_index,
    scrapedUrls: new Set(file.scraped_urls),
    enrichedUrls: new Set(file.enriched_urls),
  };
}

export async function saveRunState(path: string, state: RunState): Promise<boolean> {
  return persist(path, () =>
    saveJson(
      {
        start_index: state.startIndex,
        scraped_urls: [...state.scrapedUrls],
        enriched_urls: [...state.enrichedUrls],
      },
      path
    )
  );
}

export async function loadRecords(path: string): Promise<Restaurant[]> {
  const rows = await readStored(path, RecordsFile, () => []);
  return rows.map(fromRow);
}

export async function saveRecords(path: string, records: Restaurant[]): Promise<boolean> {
  const ok = await persist(path, () => saveJson(records.map(toRow), path));
  if (ok) log("SUCCESS", `Restaurant data saved as JSON: '${path}'`);
  return ok;
}

/** CSV snapshot of the records, one row per website (first occurrence wins). */
export async function exportSnapshot(path: string, records: Restaurant[]): Promise<boolean> {
  const rows = _.uniqBy(records, (r) => r.website).map(toRow);
  const ok = await persist(path, () => saveCsv(rows, COLUMNS, path));
  if (ok) log("SUCCESS", `Tabular export saved to '${path}'`);
  return ok;
}
