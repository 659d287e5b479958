import Parser from "rss-parser";
import type { Logger } from "pino";
import type { FeedSource } from "../config";
import type { Candidate, PollResult } from "./types";

type FeedItem = {
  description?: string;
};

type FeedParser = Pick<Parser<Record<string, unknown>, FeedItem>, "parseURL">;

let parserOverride: FeedParser | null = null;
const parsers = new Map<string, FeedParser>();

export type ParserOptions = {
  readonly verifyTls: boolean;
  readonly userAgent: string;
  readonly timeoutMs: number;
};

export function createParser(options: ParserOptions): FeedParser {
  return new Parser<Record<string, unknown>, FeedItem>({
    timeout: options.timeoutMs,
    headers: { "User-Agent": options.userAgent },
    requestOptions: { rejectUnauthorized: options.verifyTls },
    customFields: {
      item: ["description"],
    },
  });
}

function parserKey(options: ParserOptions): string {
  return [options.verifyTls, options.userAgent, options.timeoutMs].join("|");
}

/**
 * Returns the parser for this set of request options, building it on first
 * use. A parser injected with `setParserInstance` wins over all of them.
 */
export function getParserInstance(options: ParserOptions): FeedParser {
  if (parserOverride) {
    return parserOverride;
  }

  const key = parserKey(options);
  let parser = parsers.get(key);
  if (!parser) {
    parser = createParser(options);
    parsers.set(key, parser);
  }
  return parser;
}

export function setParserInstance(parser: FeedParser): void {
  parserOverride = parser;
}

export function resetParser(): void {
  parserOverride = null;
  parsers.clear();
}

export async function pollFeed(
  source: FeedSource,
  options: ParserOptions,
  logger: Logger,
): Promise<PollResult> {
  try {
    const parser = getParserInstance(options);
    const feed = await parser.parseURL(source.url);

    const items: Array<Candidate> = feed.items.map((item) => ({
      title: item.title ?? "",
      url: item.link ?? "",
      description: item.description ?? item.content ?? "",
      sourceName: source.name,
      baseScore: source.baseScore,
      publishedAt: item.pubDate ?? "",
    }));

    logger.info(
      { feedName: source.name, itemCount: items.length },
      "feed polled successfully",
    );
    return { feedName: source.name, items, error: null };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(
      { feedName: source.name, feedUrl: source.url, error: message },
      "feed poll failed",
    );
    return { feedName: source.name, items: [], error: message };
  }
}

/**
 * Polls every source in order and concatenates their entries.
 * A source that fails contributes nothing; the others are still polled.
 */
export async function collectCandidates(
  sources: ReadonlyArray<FeedSource>,
  options: ParserOptions,
  logger: Logger,
): Promise<Array<Candidate>> {
  const candidates: Array<Candidate> = [];

  for (const source of sources) {
    const result = await pollFeed(source, options, logger);
    if (result.error) {
      logger.warn(
        { feedName: result.feedName },
        "source unavailable, no candidates collected from it",
      );
      continue;
    }
    candidates.push(...result.items);
  }

  logger.info(
    { sourceCount: sources.length, candidateCount: candidates.length },
    "candidate collection complete",
  );
  return candidates;
}
