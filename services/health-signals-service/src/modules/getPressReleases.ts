import * as cheerio from "cheerio";
import diseaseKeywords from "../data/diseaseKeywords.json";
import { PRESS_RELEASES_ORIGIN, PRESS_RELEASES_URL } from "../constants/healthData";
import { ConnectorResult, SourceFailure } from "../interfaces/connector";
import { PressRelease } from "../interfaces/pressRelease";
import { logger } from "../logger";
import { HttpClient } from "./httpClient";
import { createKeywordMatcher } from "./keywordMatcher";
import { MalformedResponseError, toSourceFailure } from "./requestError";

const SOURCE = "nyc-doh-press";
const DAY_MS = 24 * 60 * 60 * 1000;

const MONTHS = [
  "january", "february", "march", "april", "may", "june",
  "july", "august", "september", "october", "november", "december",
];

/**
 * Parse the listing's date headings ("November 24, 2025") as UTC midnight.
 */
export function parseReleaseDate(text: string): Date | null {
  const match = /^([A-Za-z]+)\s+(\d{1,2}),\s*(\d{4})$/.exec(text.trim());
  if (!match) return null;

  const month = MONTHS.indexOf(match[1].toLowerCase());
  if (month === -1) return null;

  const day = Number(match[2]);
  const year = Number(match[3]);
  const date = new Date(Date.UTC(year, month, day));

  // rejects "February 30, 2025" which Date.UTC would roll over
  return date.getUTCDate() === day ? date : null;
}

type ListedRelease = { title: string; publishedAt: Date; url: string };

/**
 * Each release on the listing page is a <p> holding a <strong> date and an <a> title.
 */
export function extractReleases(html: string): { releases: ListedRelease[]; skipped: number } {
  const $ = cheerio.load(html);
  const releases: ListedRelease[] = [];
  let skipped = 0;

  $("p").each((_, element) => {
    const paragraph = $(element);
    const strong = paragraph.find("strong").first();
    const link = paragraph.find("a[href]").first();
    if (!strong.length || !link.length) return;

    const href = link.attr("href");
    const title = link.text().replace(/\s+/g, " ").trim();
    const publishedAt = parseReleaseDate(strong.text());

    if (!href || !title || !publishedAt) {
      skipped++;
      return;
    }

    releases.push({
      title,
      publishedAt,
      url: new URL(href, PRESS_RELEASES_ORIGIN).toString(),
    });
  });

  return { releases, skipped };
}

export async function getPressReleases({
  http,
  url = PRESS_RELEASES_URL,
  keywords = diseaseKeywords,
  daysBack = 30,
  now = new Date(),
}: {
  http: HttpClient;
  url?: string;
  keywords?: readonly string[];
  daysBack?: number;
  now?: Date;
}): Promise<ConnectorResult<PressRelease>> {
  const failures: SourceFailure[] = [];
  const records: PressRelease[] = [];
  let skipped = 0;

  try {
    const response = await http.get<unknown>(url, { responseType: "text" });
    if (typeof response.data !== "string") {
      throw new MalformedResponseError("Expected an HTML page");
    }

    const extracted = extractReleases(response.data);
    skipped = extracted.skipped;

    const cutoff = now.getTime() - daysBack * DAY_MS;
    const recent = extracted.releases.filter((release) => release.publishedAt.getTime() >= cutoff);
    const matchKeywords = createKeywordMatcher(keywords, { match: "substring" });

    for (const release of recent) {
      const matchedKeywords = matchKeywords(release.title);
      if (!matchedKeywords.length) continue;

      records.push({
        title: release.title,
        publishedAt: release.publishedAt.toISOString(),
        url: release.url,
        matchedKeywords,
      });
    }

    logger.info(
      { listed: extracted.releases.length, recent: recent.length, diseaseRelated: records.length, daysBack },
      "Press releases collected"
    );
  } catch (err) {
    const failure = toSourceFailure(SOURCE, url, err);
    failures.push(failure);
    logger.warn({ reason: failure.reason, status: failure.status }, "Press release page fetch failed");
  }

  return {
    source: SOURCE,
    records,
    failures,
    skipped,
    fetchedAt: new Date().toISOString(),
  };
}
