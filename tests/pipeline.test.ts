import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { InvalidArgumentError } from "../src/errors";
import { cleanRecords, fillMissingContacts, run, scrapeNextPage, type Confirm, type PipelineDeps } from "../src/pipeline";
import type { ExcerptFetcher, FallbackResolver, Restaurant, RunState, SearchClient, SearchItem } from "../src/types";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "restaurant-scraper-pipeline-"));
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

function makeDeps(items: SearchItem[], pages: Record<string, string> = {}, answers: string[] = []) {
  const search = vi.fn<SearchClient>(async () => items);
  const fetchExcerpt = vi.fn<ExcerptFetcher>(async (url) => pages[url] ?? "");
  const resolveEmails = vi.fn<FallbackResolver>(async (rs) => rs.map((_r, i) => answers[i] ?? "-"));
  const wait = vi.fn(async () => {});

  const deps: PipelineDeps = {
    config: {
      query: "restaurants colombo",
      pageSize: 10,
      files: {
        state: join(dir, "scraping_state.json"),
        records: join(dir, "restaurant_details.json"),
        export: join(dir, "restaurant_emails.csv"),
      },
    },
    search,
    fetchExcerpt,
    resolveEmails,
    throttle: { wait },
  };
  return { deps, search, fetchExcerpt, resolveEmails, wait };
}

const freshState = (startIndex = 1, scraped: string[] = [], enriched: string[] = []): RunState => ({
  startIndex,
  scrapedUrls: new Set(scraped),
  enrichedUrls: new Set(enriched),
});

const SAKURA: SearchItem = {
  title: "Sakura Japanese Restaurant - Home",
  snippet: "Reservations: sakura@dining.lk | +94 11 234 5678",
  link: "https://sakura.lk",
};

describe("scrapeNextPage", () => {
  it("builds records from new results and advances by a full page", async () => {
    const items: SearchItem[] = [
      SAKURA,
      { title: "Contact Us | Lagoon", snippet: "Seafood by the beach.", link: "https://www.lagoon.lk/contact" },
      { title: "Old Place", snippet: "", link: "https://old.lk" },
      { title: "No link", snippet: "info@nolink.lk", link: "" },
      { title: "Spice Route", snippet: "Great curries", link: "https://spiceroute.lk" },
    ];
    const { deps, search, fetchExcerpt, wait } = makeDeps(items, {
      "https://www.lagoon.lk/contact": "Email: Hello@Lagoon.lk Phone: 011 234 5678",
    });
    const records: Restaurant[] = [];
    const state = freshState(11, ["https://old.lk"]);

    await expect(scrapeNextPage(deps, records, state)).resolves.toBe(3);

    expect(search).toHaveBeenCalledWith("restaurants colombo", 11);
    expect(records).toEqual([
      {
        name: "Sakura Japanese Restaurant",
        website: "https://sakura.lk",
        email: "sakura@dining.lk",
        phone: "+94 11 234 5678",
      },
      { name: "Lagoon Restaurant", website: "https://www.lagoon.lk/contact", email: "hello@lagoon.lk", phone: undefined },
      { name: "Spice Route", website: "https://spiceroute.lk", email: undefined, phone: undefined },
    ]);
    expect(fetchExcerpt.mock.calls.map(([url]) => url)).toEqual(["https://www.lagoon.lk/contact", "https://spiceroute.lk"]);
    expect(wait).toHaveBeenCalledTimes(2);
    expect(state.startIndex).toBe(21);
    expect([...state.scrapedUrls]).toEqual([
      "https://old.lk",
      "https://sakura.lk",
      "https://www.lagoon.lk/contact",
      "https://spiceroute.lk",
    ]);
  });

  it("adds nothing but still advances when every link was already scraped", async () => {
    const items: SearchItem[] = [SAKURA, { title: "Lagoon", snippet: "", link: "https://lagoon.lk" }];
    const { deps, fetchExcerpt } = makeDeps(items);
    const records: Restaurant[] = [{ name: "Existing", website: "https://sakura.lk" }];
    const state = freshState(1, ["https://sakura.lk", "https://lagoon.lk"]);

    await expect(scrapeNextPage(deps, records, state)).resolves.toBe(0);

    expect(records).toEqual([{ name: "Existing", website: "https://sakura.lk" }]);
    expect(state.startIndex).toBe(11);
    expect(state.scrapedUrls.size).toBe(2);
    expect(fetchExcerpt).not.toHaveBeenCalled();
  });

  it("advances even when the search returns nothing", async () => {
    const { deps } = makeDeps([]);
    const state = freshState(31);
    await expect(scrapeNextPage(deps, [], state)).resolves.toBe(0);
    expect(state.startIndex).toBe(41);
  });
});

describe("fillMissingContacts", () => {
  it("tries the website first, then the fallback resolver, once per website", async () => {
    const { deps, fetchExcerpt, resolveEmails } = makeDeps(
      [],
      { "https://lagoon.lk": "Write to info@lagoon.lk or call 011 234 5678" },
      ["Orders@SpiceRoute.lk"]
    );
    const records: Restaurant[] = [
      { name: "Lagoon Restaurant", website: "https://lagoon.lk" },
      { name: "Spice Route", website: "https://spiceroute.lk", phone: "0771234567" },
      { name: "Sakura", website: "https://sakura.lk", email: "sakura@dining.lk" },
      { name: "Old Place", website: "https://old.lk" },
    ];
    const state = freshState(11, [], ["https://old.lk"]);

    await expect(fillMissingContacts(deps, records, state)).resolves.toBe(2);

    expect(records).toEqual([
      { name: "Lagoon Restaurant", website: "https://lagoon.lk", email: "info@lagoon.lk", phone: "011 234 5678" },
      { name: "Spice Route", website: "https://spiceroute.lk", email: "orders@spiceroute.lk", phone: "0771234567" },
      { name: "Sakura", website: "https://sakura.lk", email: "sakura@dining.lk" },
      { name: "Old Place", website: "https://old.lk" },
    ]);
    expect(fetchExcerpt.mock.calls.map(([url]) => url)).toEqual(["https://lagoon.lk", "https://spiceroute.lk"]);
    expect(resolveEmails).toHaveBeenCalledTimes(1);
    expect(resolveEmails.mock.calls[0][0].map((r) => r.website)).toEqual(["https://spiceroute.lk"]);
    expect([...state.enrichedUrls].sort()).toEqual(["https://lagoon.lk", "https://old.lk", "https://spiceroute.lk"]);
  });

  it("leaves records unknown when nothing is found", async () => {
    const { deps } = makeDeps([], {}, ["-"]);
    const records: Restaurant[] = [{ name: "Spice Route", website: "https://spiceroute.lk" }];
    const state = freshState();

    await expect(fillMissingContacts(deps, records, state)).resolves.toBe(0);
    expect(records[0].email).toBeUndefined();
    expect(state.enrichedUrls.has("https://spiceroute.lk")).toBe(true);
  });

  it("retries a website when neither the page nor the resolver could be consulted", async () => {
    const { deps, fetchExcerpt, resolveEmails } = makeDeps([]);
    resolveEmails.mockImplementation(async (rs) => rs.map(() => undefined));
    const records: Restaurant[] = [{ name: "Lagoon Restaurant", website: "https://lagoon.lk" }];
    const state = freshState();

    await expect(fillMissingContacts(deps, records, state)).resolves.toBe(0);
    expect(state.enrichedUrls.size).toBe(0);

    fetchExcerpt.mockResolvedValueOnce("Email info@lagoon.lk");
    await expect(fillMissingContacts(deps, records, state)).resolves.toBe(1);

    expect(records[0].email).toBe("info@lagoon.lk");
    expect(fetchExcerpt).toHaveBeenCalledTimes(2);
    expect(resolveEmails).toHaveBeenCalledTimes(1);
    expect([...state.enrichedUrls]).toEqual(["https://lagoon.lk"]);
  });

  it("does nothing when no email is missing", async () => {
    const { deps, fetchExcerpt, resolveEmails } = makeDeps([]);
    const records: Restaurant[] = [{ name: "Sakura", website: "https://sakura.lk", email: "sakura@dining.lk" }];

    await expect(fillMissingContacts(deps, records, freshState())).resolves.toBe(0);
    expect(fetchExcerpt).not.toHaveBeenCalled();
    expect(resolveEmails).not.toHaveBeenCalled();
  });
});

describe("cleanRecords", () => {
  it("re-normalizes fields and keeps the first record per website", () => {
    const records: Restaurant[] = [
      {
        name: "Sakura Japanese Restaurant - Home",
        website: "https://sakura.lk",
        email: "Info@Sakura.lk, info@sakura.lk",
        phone: "123, +65 6123 4567",
      },
      { name: "Lagoon", website: "https://lagoon.lk" },
      { name: "Sakura Again", website: "https://sakura.lk", email: "other@sakura.lk" },
      { name: "Lagoon Duplicate", website: "https://lagoon.lk", email: "dup@lagoon.lk" },
    ];

    const result = cleanRecords(records);

    expect(result.removed).toBe(2);
    expect(result.records).toEqual([
      { name: "Sakura Japanese Restaurant", website: "https://sakura.lk", email: "info@sakura.lk", phone: "+65 6123 4567" },
      { name: "Lagoon", website: "https://lagoon.lk", email: undefined, phone: undefined },
    ]);
  });

  it("removes nothing from a list without duplicates", () => {
    const records: Restaurant[] = [
      { name: "Sakura", website: "https://sakura.lk" },
      { name: "Lagoon", website: "https://lagoon.lk" },
    ];
    expect(cleanRecords(records).removed).toBe(0);
  });
});

describe("run", () => {
  it("scrapes a page, persists everything and runs the confirmed passes", async () => {
    const { deps, resolveEmails } = makeDeps([{ title: "Old Place", snippet: "", link: "https://old.lk" }, SAKURA]);
    await writeFile(
      deps.config.files.state,
      JSON.stringify({ start_index: 1, scraped_urls: ["https://old.lk"] }),
      "utf-8"
    );
    await writeFile(
      deps.config.files.records,
      JSON.stringify([{ name: "Old Place", website: "https://old.lk", email: "-", phone: "-" }]),
      "utf-8"
    );
    const confirm = vi.fn<Confirm>(async () => true);

    await expect(run(deps, confirm)).resolves.toEqual({
      added: 1,
      total: 2,
      nextStartIndex: 11,
      enriched: 0,
      removed: 0,
    });

    expect(confirm.mock.calls.map(([q]) => q)).toEqual([
      "Update missing emails from existing data?",
      "Clean existing data?",
    ]);
    expect(resolveEmails).toHaveBeenCalledTimes(1);
    expect(JSON.parse(await readFile(deps.config.files.state, "utf-8"))).toEqual({
      start_index: 11,
      scraped_urls: ["https://old.lk", "https://sakura.lk"],
      enriched_urls: ["https://old.lk"],
    });
    expect(JSON.parse(await readFile(deps.config.files.records, "utf-8"))).toEqual([
      { name: "Old Place", website: "https://old.lk", email: "-", phone: "-" },
      { name: "Sakura Japanese Restaurant", website: "https://sakura.lk", email: "sakura@dining.lk", phone: "+94 11 234 5678" },
    ]);
    expect(await readFile(deps.config.files.export, "utf-8")).toBe(
      [
        "name,website,email,phone",
        "Old Place,https://old.lk,-,-",
        "Sakura Japanese Restaurant,https://sakura.lk,sakura@dining.lk,+94 11 234 5678",
      ].join("\r\n")
    );
  });

  it("fills a record on a later run once its website is back", async () => {
    const { deps, fetchExcerpt, resolveEmails } = makeDeps([]);
    resolveEmails.mockImplementation(async (rs) => rs.map(() => undefined));
    await writeFile(
      deps.config.files.records,
      JSON.stringify([{ name: "Lagoon Restaurant", website: "https://lagoon.lk", email: "-", phone: "-" }]),
      "utf-8"
    );

    await expect(run(deps, async () => true)).resolves.toEqual({
      added: 0,
      total: 1,
      nextStartIndex: 11,
      enriched: 0,
      removed: 0,
    });
    expect(JSON.parse(await readFile(deps.config.files.state, "utf-8")).enriched_urls).toEqual([]);

    fetchExcerpt.mockImplementation(async () => "Email info@lagoon.lk");
    await expect(run(deps, async () => true)).resolves.toEqual({
      added: 0,
      total: 1,
      nextStartIndex: 21,
      enriched: 1,
      removed: 0,
    });
    expect(JSON.parse(await readFile(deps.config.files.state, "utf-8"))).toEqual({
      start_index: 21,
      scraped_urls: [],
      enriched_urls: ["https://lagoon.lk"],
    });
    expect(JSON.parse(await readFile(deps.config.files.records, "utf-8"))).toEqual([
      { name: "Lagoon Restaurant", website: "https://lagoon.lk", email: "info@lagoon.lk", phone: "-" },
    ]);
  });

  it("skips the optional passes when they are declined", async () => {
    const { deps, fetchExcerpt, resolveEmails } = makeDeps([
      { title: "Spice Route", snippet: "Great curries", link: "https://spiceroute.lk" },
    ]);

    const summary = await run(deps, async () => false);

    expect(summary).toEqual({ added: 1, total: 1, nextStartIndex: 11, enriched: 0, removed: 0 });
    expect(fetchExcerpt).toHaveBeenCalledTimes(1);
    expect(resolveEmails).not.toHaveBeenCalled();
    expect(JSON.parse(await readFile(deps.config.files.state, "utf-8")).enriched_urls).toEqual([]);
  });

  it("stops before writing anything when the search arguments are invalid", async () => {
    const { deps, search } = makeDeps([]);
    search.mockRejectedValueOnce(new InvalidArgumentError("Search offset must be an integer between 1 and 100, got 101"));

    await expect(run(deps, async () => true)).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(readFile(deps.config.files.state, "utf-8")).rejects.toThrow();
  });
});
