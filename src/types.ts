export type SearchItem = {
  title: string;
  snippet: string;
  link: string;
};

/** In-memory record. An unknown email or phone is `undefined`, never "-". */
export type Restaurant = {
  name: string;
  website: string;
  email?: string;
  phone?: string;
};

/** On-disk shape of a record; unknown fields are written as "-". */
export type RestaurantRow = {
  name: string;
  website: string;
  email: string;
  phone: string;
};

export type RunState = {
  startIndex: number;
  scrapedUrls: Set<string>;
  enrichedUrls: Set<string>;
};

export type SearchClient = (query: string, start: number) => Promise<SearchItem[]>;

export type ExcerptFetcher = (url: string) => Promise<string>;

/**
 * One entry per restaurant: the proposed email, "-" when the service was asked and had none,
 * or `undefined` when it was never asked (no key, or the request failed).
 */
export type FallbackResolver = (restaurants: Restaurant[]) => Promise<(string | undefined)[]>;

export type Throttle = { wait(): Promise<void> };

export type RunSummary = {
  added: number;
  total: number;
  nextStartIndex: number;
  enriched: number;
  removed: number;
};
