import Parser from "rss-parser";
import { FEED_SOURCES, MAX_SUMMARY_LENGTH } from "../constants/feeds";
import { Article, FeedSource } from "../interfaces/article";
import { ConnectorResult, SourceFailure } from "../interfaces/connector";
import { logger } from "../logger";
import { FeedItem, FeedItemSchema } from "../schemas/feed.schema";
import { HttpClient } from "./httpClient";
import { createKeywordMatcher, KeywordMatcher } from "./keywordMatcher";
import { MalformedResponseError, toSourceFailure } from "./requestError";

const parser = new Parser();

const FEED_ACCEPT = "application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.9, */*;q=0.8";

/**
 * Poll every feed once and keep the health-related items.
 * A failing feed is reported in `failures`; the remaining feeds are still processed.
 */
export async function getArticles({
  feeds = FEED_SOURCES,
  keywords,
  http,
}: {
  feeds?: readonly FeedSource[];
  keywords: readonly string[];
  http: HttpClient;
}): Promise<ConnectorResult<Article>> {
  const matchKeywords = createKeywordMatcher(keywords);
  const records: Article[] = [];
  const failures: SourceFailure[] = [];
  let skipped = 0;

  for (const feed of feeds) {
    let items: unknown[];

    try {
      items = await fetchFeedItems(feed, http);
    } catch (err) {
      const failure = toSourceFailure(feed.name, feed.url, err);
      failures.push(failure);

      logger.warn(
        { source: feed.name, reason: failure.reason, status: failure.status, err: failure.message },
        "Feed fetch failed, continuing with remaining feeds"
      );
      continue;
    }

    let matched = 0;
    for (const raw of items) {
      const parsed = FeedItemSchema.safeParse(raw);
      if (!parsed.success) {
        skipped++;
        continue;
      }

      const article = toArticle(feed, parsed.data, matchKeywords);
      if (article) {
        records.push(article);
        matched++;
      }
    }

    logger.debug({ source: feed.name, items: items.length, matched }, "Feed processed");
  }

  logger.info(
    { articles: records.length, failedFeeds: failures.length, skipped },
    "Feed poll finished"
  );

  return {
    source: "rss",
    records,
    failures,
    skipped,
    fetchedAt: new Date().toISOString(),
  };
}

async function fetchFeedItems(feed: FeedSource, http: HttpClient): Promise<unknown[]> {
  const response = await http.get<unknown>(feed.url, {
    responseType: "text",
    headers: { Accept: FEED_ACCEPT },
  });

  const body = response.data;
  if (typeof body !== "string" || !body.trim()) {
    throw new MalformedResponseError("Feed response body is empty");
  }

  try {
    const output = await parser.parseString(body);
    return output.items;
  } catch (err) {
    throw new MalformedResponseError(
      `Feed could not be parsed: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

export function toArticle(
  feed: FeedSource,
  item: FeedItem,
  matchKeywords: KeywordMatcher
): Article | null {
  const title = collapseWhitespace(item.title);
  const summary = collapseWhitespace(item.contentSnippet ?? item.summary ?? "");

  const matchedKeywords = matchKeywords(`${title}\n${summary}`);
  if (!matchedKeywords.length) return null;

  return {
    source: feed.name,
    title,
    publishedAt: toIsoDate(item.isoDate) ?? toIsoDate(item.pubDate),
    url: item.link,
    summary: summary.slice(0, MAX_SUMMARY_LENGTH),
    matchedKeywords,
  };
}

function toIsoDate(value: string | undefined): string | null {
  if (!value) return null;
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : new Date(time).toISOString();
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}
