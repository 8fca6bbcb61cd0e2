/**
 * Normalized news item from one of the local RSS feeds
 */
export interface Article {
  source: string;
  title: string;
  publishedAt: string | null;
  url: string;
  summary: string;
  matchedKeywords: string[];
}

export interface FeedSource {
  name: string;
  url: string;
}
