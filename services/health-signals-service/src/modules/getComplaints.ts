import { COMPLAINT_TYPES_BY_CATEGORY, DEFAULT_MAX_PAGES, DEFAULT_PAGE_SIZE, OPEN_DATA_URL } from "../constants/openData";
import { Complaint, ComplaintCategory } from "../interfaces/complaint";
import { ConnectorResult, SourceFailure } from "../interfaces/connector";
import { logger } from "../logger";
import { ServiceRequestRow, ServiceRequestRowSchema } from "../schemas/complaint.schema";
import { HttpClient } from "./httpClient";
import { openDataBreaker } from "./openDataBreaker";
import { openDataLimiter } from "./openDataLimiter";
import { isUpstreamFailure, MalformedResponseError, toSourceFailure } from "./requestError";

const SOURCE = "nyc-311";

export type ComplaintQuery = {
  $where: string;
  $order: string;
  $limit: number;
  $offset: number;
};

/**
 * SoQL floating timestamps carry no offset: "2026-10-11T00:00:00"
 */
export function toFloatingTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19);
}

export function buildComplaintQuery({
  categories,
  since,
  limit,
  offset,
}: {
  categories: readonly ComplaintCategory[];
  since: Date;
  limit: number;
  offset: number;
}): ComplaintQuery {
  const types = categories
    .flatMap((category) => COMPLAINT_TYPES_BY_CATEGORY[category])
    .map((type) => `'${type.toUpperCase().replace(/'/g, "''")}'`);

  return {
    $where: `upper(complaint_type) in(${types.join(", ")}) AND created_date >= '${toFloatingTimestamp(since)}'`,
    $order: "created_date DESC, unique_key",
    $limit: limit,
    $offset: offset,
  };
}

function categoryIndex(categories: readonly ComplaintCategory[]): Map<string, ComplaintCategory> {
  const index = new Map<string, ComplaintCategory>();
  for (const category of categories) {
    for (const type of COMPLAINT_TYPES_BY_CATEGORY[category]) {
      index.set(type.toLowerCase(), category);
    }
  }
  return index;
}

function toNumberOrNull(value: string | undefined): number | null {
  if (value === undefined || value.trim() === "") return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function toComplaint(row: ServiceRequestRow, category: ComplaintCategory): Complaint {
  return {
    id: row.unique_key,
    complaintType: row.complaint_type,
    category,
    descriptor: row.descriptor ?? null,
    borough: row.borough ?? null,
    createdAt: row.created_date,
    status: row.status ?? null,
    location: {
      address: row.incident_address ?? null,
      latitude: toNumberOrNull(row.latitude),
      longitude: toNumberOrNull(row.longitude),
    },
  };
}

/**
 * Query 311 service requests for the given complaint categories, page by page.
 *
 * A malformed page is reported and skipped. A network, timeout, rate limit or
 * HTTP error is reported and ends pagination for this run, as does an open breaker.
 */
export async function getComplaints({
  http,
  categories,
  since,
  baseUrl = OPEN_DATA_URL,
  pageSize = DEFAULT_PAGE_SIZE,
  maxPages = DEFAULT_MAX_PAGES,
  appToken,
}: {
  http: HttpClient;
  categories: readonly ComplaintCategory[];
  since: Date;
  baseUrl?: string;
  pageSize?: number;
  maxPages?: number;
  appToken?: string;
}): Promise<ConnectorResult<Complaint>> {
  const wanted = categoryIndex(categories);
  const records: Complaint[] = [];
  const failures: SourceFailure[] = [];
  let skipped = 0;
  let filteredOut = 0;

  for (let page = 0; page < maxPages; page++) {
    const offset = page * pageSize;

    if (!openDataBreaker.guard()) {
      failures.push({
        source: SOURCE,
        url: baseUrl,
        reason: "circuit_open",
        message: `Skipped page ${page + 1}: ${openDataBreaker.name} circuit open`,
      });
      break;
    }

    let rows: unknown[];
    try {
      const params = buildComplaintQuery({ categories, since, limit: pageSize, offset });
      rows = await openDataLimiter.schedule(() => fetchPage(http, baseUrl, params, appToken));
      openDataBreaker.success();
    } catch (err) {
      const failure = toSourceFailure(SOURCE, baseUrl, err);
      failures.push({ ...failure, message: `Page ${page + 1}: ${failure.message}` });

      if (isUpstreamFailure(failure.reason)) {
        openDataBreaker.failure(err);
        logger.warn(
          { page: page + 1, reason: failure.reason, status: failure.status },
          "311 request failed, stopping pagination"
        );
        break;
      }

      logger.warn({ page: page + 1, reason: failure.reason }, "311 page malformed, skipping");
      continue;
    }

    for (const raw of rows) {
      const parsed = ServiceRequestRowSchema.safeParse(raw);
      if (!parsed.success) {
        skipped++;
        continue;
      }

      const category = wanted.get(parsed.data.complaint_type.trim().toLowerCase());
      if (!category) {
        filteredOut++;
        continue;
      }

      records.push(toComplaint(parsed.data, category));
    }

    logger.debug({ page: page + 1, rows: rows.length }, "311 page fetched");

    if (rows.length < pageSize) break;
  }

  logger.info(
    { complaints: records.length, skipped, filteredOut, failures: failures.length },
    "311 query finished"
  );

  return {
    source: SOURCE,
    records,
    failures,
    skipped,
    fetchedAt: new Date().toISOString(),
  };
}

async function fetchPage(
  http: HttpClient,
  baseUrl: string,
  params: ComplaintQuery,
  appToken: string | undefined
): Promise<unknown[]> {
  const response = await http.get<unknown>(baseUrl, {
    params,
    headers: appToken ? { "X-App-Token": appToken } : undefined,
  });

  if (!Array.isArray(response.data)) {
    throw new MalformedResponseError("Expected a JSON array of service requests");
  }

  return response.data;
}
