import _ from "lodash";
import OpenAI from "openai";
import type { AppConfig } from "./config";
import { describeError } from "./errors";
import { extractEmails, NOT_FOUND } from "./extract";
import { log } from "./logger";
import type { FallbackResolver, Restaurant } from "./types";

const BATCH_SIZE = 3;

const SYSTEM_PROMPT =
  "You help build a directory of restaurant contact details. Answer with email addresses only, no commentary.";

export type CompletionFn = (prompt: string) => Promise<string>;

export function openaiCompletion(apiKey: string, model: string): CompletionFn {
  const openai = new OpenAI({ apiKey });
  return async (prompt) => {
    const res = await openai.chat.completions.create({
      model,
      temperature: 0.1,
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: prompt },
      ],
    });
    return res.choices[0]?.message.content ?? "";
  };
}

export function buildPrompt(batch: Restaurant[]): string {
  const lines = batch.map((r, i) => `${i + 1}. ${r.name} (${r.website})`);
  return [
    "Find the public contact email address of each restaurant below.",
    'Reply with exactly one line per restaurant, in the same order, holding only the email address, or "-" if you do not know it.',
    "",
    ...lines,
  ].join("\n");
}

async function resolveBatch(batch: Restaurant[], complete: CompletionFn): Promise<(string | undefined)[]> {
  try {
    const emails = extractEmails(await complete(buildPrompt(batch)));
    return batch.map((_r, i) => (i < emails.length ? emails[i] : NOT_FOUND));
  } catch (err) {
    log("WARN", `Fallback email lookup failed for ${batch.length} restaurants: ${describeError(err)}`);
    return batch.map(() => undefined);
  }
}

/**
 * Asks a chat model for the emails nobody could scrape, three restaurants per request.
 * Without an OpenAI key (and no injected completion) nobody is asked and every answer is undefined.
 */
export function createFallbackResolver(
  config: Pick<AppConfig, "openaiApiKey" | "openaiModel">,
  complete?: CompletionFn
): FallbackResolver {
  const completion =
    complete ?? (config.openaiApiKey ? openaiCompletion(config.openaiApiKey, config.openaiModel) : undefined);

  return async (restaurants) => {
    if (!completion) return restaurants.map(() => undefined);

    const answers: (string | undefined)[] = [];
    for (const batch of _.chunk(restaurants, BATCH_SIZE)) {
      answers.push(...(await resolveBatch(batch, completion)));
    }
    return answers;
  };
}
