export interface PressRelease {
  title: string;
  publishedAt: string;
  url: string;
  matchedKeywords: string[];
}
