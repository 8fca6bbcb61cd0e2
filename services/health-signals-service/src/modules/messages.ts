import { Article } from "../interfaces/article";
import { Complaint } from "../interfaces/complaint";
import { PressRelease } from "../interfaces/pressRelease";
import { RespiratoryObservation } from "../interfaces/respiratory";

export interface OutboundMessage {
  key: string;
  value: string;
}

export interface MessageEnvelope<T> {
  sourceType: string;
  sourceName: string;
  contentType: string;
  timestamp: string | null;
  scrapedAt: string;
  payload: T;
}

function toMessage<T>(key: string, envelope: MessageEnvelope<T>): OutboundMessage {
  return { key, value: JSON.stringify(envelope) };
}

export function articleToMessage(article: Article, scrapedAt: string): OutboundMessage {
  return toMessage(article.url, {
    sourceType: "local_news",
    sourceName: article.source,
    contentType: "article",
    timestamp: article.publishedAt,
    scrapedAt,
    payload: article,
  });
}

export function complaintToMessage(complaint: Complaint, scrapedAt: string): OutboundMessage {
  return toMessage(`nyc311_${complaint.id}`, {
    sourceType: "open_data",
    sourceName: "nyc_311",
    contentType: "service_request",
    timestamp: complaint.createdAt,
    scrapedAt,
    payload: complaint,
  });
}

export function pressReleaseToMessage(release: PressRelease, scrapedAt: string): OutboundMessage {
  return toMessage(release.url, {
    sourceType: "official_health_dept",
    sourceName: "nyc_doh",
    contentType: "press_release",
    timestamp: release.publishedAt,
    scrapedAt,
    payload: release,
  });
}

export function respiratoryToMessage(observation: RespiratoryObservation, scrapedAt: string): OutboundMessage {
  return toMessage(`nyc_respiratory_${observation.date}_${observation.metric}_${observation.submetric}`, {
    sourceType: "official_health_data",
    sourceName: "nyc_github_respiratory",
    contentType: "respiratory_observation",
    timestamp: observation.date,
    scrapedAt,
    payload: observation,
  });
}
