import { FeedSource } from "../interfaces/article";

export const FEED_SOURCES: readonly FeedSource[] = [
  { name: "gothamist", url: "https://gothamist.com/feed" },
  { name: "nypost", url: "https://nypost.com/metro/feed/" },
  { name: "nyt-nyregion", url: "https://rss.nytimes.com/services/xml/rss/nyt/NYRegion.xml" },
];

// Trimmed summaries keep messages small; feeds sometimes embed the full story
export const MAX_SUMMARY_LENGTH = 1000;
