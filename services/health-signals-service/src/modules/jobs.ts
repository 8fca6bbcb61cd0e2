import { AppConfig } from "../config/env";
import { TOPICS } from "../constants/topics";
import { getArticles } from "./getArticles";
import { getComplaints } from "./getComplaints";
import { getPressReleases } from "./getPressReleases";
import { getRespiratoryData } from "./getRespiratoryData";
import { HttpClient } from "./httpClient";
import { defineJob, IngestJob } from "./ingestRunner";
import {
  articleToMessage,
  complaintToMessage,
  pressReleaseToMessage,
  respiratoryToMessage,
} from "./messages";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Connectors in run order. Time windows are computed per run.
 */
export function buildJobs(config: AppConfig, http: HttpClient): IngestJob[] {
  return [
    defineJob({
      name: "articles",
      topic: TOPICS.articles,
      fetch: () => getArticles({ keywords: config.feeds.keywords, http }),
      toMessage: articleToMessage,
    }),
    defineJob({
      name: "complaints",
      topic: TOPICS.complaints,
      fetch: () =>
        getComplaints({
          http,
          categories: config.openData.categories,
          since: new Date(Date.now() - config.openData.lookbackDays * DAY_MS),
          baseUrl: config.openData.baseUrl,
          pageSize: config.openData.pageSize,
          maxPages: config.openData.maxPages,
          appToken: config.openData.appToken,
        }),
      toMessage: complaintToMessage,
    }),
    defineJob({
      name: "pressReleases",
      topic: TOPICS.pressReleases,
      fetch: () => getPressReleases({ http, daysBack: config.pressReleases.lookbackDays }),
      toMessage: pressReleaseToMessage,
    }),
    defineJob({
      name: "respiratory",
      topic: TOPICS.respiratory,
      fetch: () => getRespiratoryData({ http, daysBack: config.respiratory.lookbackDays }),
      toMessage: respiratoryToMessage,
    }),
  ];
}
