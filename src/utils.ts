import type { Throttle } from "./types";

export function squash(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

export async function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

export class RateLimiter implements Throttle {
  private last = 0;

  constructor(private readonly minIntervalMs = 1000) {}

  async wait(): Promise<void> {
    const elapsed = Date.now() - this.last;
    if (this.last > 0 && elapsed < this.minIntervalMs) {
      await sleep(this.minIntervalMs - elapsed);
    }
    this.last = Date.now();
  }
}
