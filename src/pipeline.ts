import _ from "lodash";
import type { AppConfig } from "./config";
import { extractEmails, extractPhones, hasMatches } from "./extract";
import { log } from "./logger";
import { cleanEmail, cleanName, cleanPhone, fromSentinel, toSentinel, validateUrl } from "./normalize";
import { exportSnapshot, loadRecords, loadRunState, saveRecords, saveRunState } from "./store";
import type {
  ExcerptFetcher,
  FallbackResolver,
  Restaurant,
  RunState,
  RunSummary,
  SearchClient,
  SearchItem,
  Throttle,
} from "./types";

export type PipelineDeps = {
  config: Pick<AppConfig, "query" | "pageSize" | "files">;
  search: SearchClient;
  fetchExcerpt: ExcerptFetcher;
  resolveEmails: FallbackResolver;
  throttle: Throttle;
};

export type Confirm = (question: string) => Promise<boolean>;

const joined = (values: string[]) => values.join(", ");

function buildRestaurant(item: SearchItem, emails: string[], phones: string[]): Restaurant {
  return {
    name: cleanName(item.title, item.link),
    website: item.link,
    email: fromSentinel(cleanEmail(joined(emails))),
    phone: fromSentinel(cleanPhone(joined(phones))),
  };
}

/**
 * Turns one page of search results into new records, skipping links seen in earlier runs.
 * Always moves the offset forward by a full page. Returns the number of records added.
 */
export async function scrapeNextPage(deps: PipelineDeps, records: Restaurant[], state: RunState): Promise<number> {
  const { config, search, fetchExcerpt, throttle } = deps;

  log("INFO", `Starting from result #${state.startIndex}`);
  log("INFO", `Search query: '${config.query}'`);
  const items = await search(config.query, state.startIndex);
  log("SUCCESS", `${items.length} results retrieved`);

  let added = 0;
  for (const [i, item] of items.entries()) {
    const position = state.startIndex + i;

    if (state.scrapedUrls.has(item.link)) {
      log("SKIP", `#${position} already scraped: ${item.title}`);
      continue;
    }
    if (!validateUrl(item.link)) {
      log("SKIP", `#${position} no usable link: ${item.title}`);
      continue;
    }

    let emails = extractEmails(item.snippet);
    const phones = extractPhones(item.snippet);

    if (!hasMatches(emails)) {
      log("INFO", `Scraping website for missing email: ${item.link}`);
      await throttle.wait();
      const fromSite = extractEmails(await fetchExcerpt(item.link));
      if (hasMatches(fromSite)) {
        emails = fromSite;
        log("FOUND", `Email from website: ${joined(emails)}`);
      }
    }

    const restaurant = buildRestaurant(item, emails, phones);
    records.push(restaurant);
    state.scrapedUrls.add(item.link);
    added += 1;

    log(
      "NEW",
      `#${position} ${restaurant.name} ${restaurant.website} email: ${toSentinel(restaurant.email)} phone: ${toSentinel(restaurant.phone)}`
    );
  }

  state.startIndex += config.pageSize;
  return added;
}

/**
 * Second look for records without an email: their own page first, then the fallback resolver.
 * A website counts as looked at once its page was read or the resolver answered for it;
 * anything else is retried on the next run. Returns how many records gained an email.
 */
export async function fillMissingContacts(deps: PipelineDeps, records: Restaurant[], state: RunState): Promise<number> {
  const { fetchExcerpt, resolveEmails, throttle } = deps;

  const pending = records.filter((r) => r.email === undefined && !state.enrichedUrls.has(r.website));
  if (!pending.length) {
    log("INFO", "No missing emails to look up");
    return 0;
  }

  const checked = new Set<string>();
  let updated = 0;
  for (const restaurant of pending) {
    log("INFO", `Checking ${restaurant.name}...`);
    await throttle.wait();
    const excerpt = await fetchExcerpt(restaurant.website);
    if (!excerpt) continue;
    checked.add(restaurant.website);

    const emails = extractEmails(excerpt);
    if (hasMatches(emails)) {
      restaurant.email = fromSentinel(cleanEmail(joined(emails)));
      if (restaurant.email) {
        updated += 1;
        log("FOUND", `Email: ${restaurant.email}`);
      }
    }

    const phones = extractPhones(excerpt);
    if (restaurant.phone === undefined && hasMatches(phones)) {
      restaurant.phone = fromSentinel(cleanPhone(joined(phones)));
      if (restaurant.phone) log("FOUND", `Phone: ${restaurant.phone}`);
    }
  }

  const stillMissing = pending.filter((r) => r.email === undefined);
  if (stillMissing.length) {
    log("INFO", `Asking fallback resolver about ${stillMissing.length} restaurants`);
    const answers = await resolveEmails(stillMissing);
    stillMissing.forEach((restaurant, i) => {
      const answer = answers[i];
      if (answer === undefined) return;
      checked.add(restaurant.website);

      const email = fromSentinel(cleanEmail(answer));
      if (!email) return;
      restaurant.email = email;
      updated += 1;
      log("FOUND", `Email for ${restaurant.name} from fallback: ${email}`);
    });
  }

  for (const website of checked) state.enrichedUrls.add(website);
  return updated;
}

/** Re-normalizes every record and keeps only the first record per website. */
export function cleanRecords(records: Restaurant[]): { records: Restaurant[]; removed: number } {
  const cleaned = records.map((r) => ({
    name: cleanName(r.name, r.website),
    website: r.website,
    email: fromSentinel(cleanEmail(toSentinel(r.email))),
    phone: fromSentinel(cleanPhone(toSentinel(r.phone))),
  }));
  const unique = _.uniqBy(cleaned, (r) => r.website);
  return { records: unique, removed: cleaned.length - unique.length };
}

export async function run(deps: PipelineDeps, confirm: Confirm): Promise<RunSummary> {
  const { files } = deps.config;

  let records = await loadRecords(files.records);
  const state = await loadRunState(files.state);

  const added = await scrapeNextPage(deps, records, state);

  await saveRunState(files.state, state);
  await saveRecords(files.records, records);
  log("SUCCESS", `${added} new restaurants added. Total: ${records.length}`);
  await exportSnapshot(files.export, records);

  let enriched = 0;
  if (await confirm("Update missing emails from existing data?")) {
    enriched = await fillMissingContacts(deps, records, state);
    await saveRecords(files.records, records);
    await saveRunState(files.state, state);
    await exportSnapshot(files.export, records);
    log(enriched ? "SUCCESS" : "INFO", `Updated ${enriched} restaurants with missing emails`);
  }

  let removed = 0;
  if (await confirm("Clean existing data?")) {
    ({ records, removed } = cleanRecords(records));
    await saveRecords(files.records, records);
    await exportSnapshot(files.export, records);
    log("SUCCESS", `Cleaned data and removed ${removed} duplicates`);
  }

  return { added, total: records.length, nextStartIndex: state.startIndex, enriched, removed };
}
