import { CITYWIDE_SUBMETRIC, KEY_RESPIRATORY_METRICS, RESPIRATORY_DATA_URL } from "../constants/healthData";
import { ConnectorResult, SourceFailure } from "../interfaces/connector";
import { RespiratoryObservation } from "../interfaces/respiratory";
import { logger } from "../logger";
import { RESPIRATORY_COLUMNS, RespiratoryRowSchema } from "../schemas/respiratory.schema";
import { parseCsv } from "./csv";
import { HttpClient } from "./httpClient";
import { MalformedResponseError, toSourceFailure } from "./requestError";

const SOURCE = "nyc-respiratory";
const DAY_MS = 24 * 60 * 60 * 1000;

export function parseRespiratoryCsv(text: string): { rows: RespiratoryObservation[]; skipped: number } {
  const { header, rows } = parseCsv(text);

  const missing = RESPIRATORY_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length) {
    throw new MalformedResponseError(`Missing required columns: ${missing.join(", ")}`);
  }

  const observations: RespiratoryObservation[] = [];
  let skipped = 0;

  for (const row of rows) {
    const parsed = RespiratoryRowSchema.safeParse(row);
    if (!parsed.success) {
      skipped++;
      continue;
    }
    observations.push(parsed.data);
  }

  return { rows: observations, skipped };
}

export function filterByDate(
  rows: readonly RespiratoryObservation[],
  daysBack: number,
  now: Date = new Date()
): RespiratoryObservation[] {
  const cutoff = now.getTime() - daysBack * DAY_MS;
  return rows.filter((row) => Date.parse(row.date) >= cutoff);
}

export function filterByDisease(rows: readonly RespiratoryObservation[], disease: string): RespiratoryObservation[] {
  const needle = disease.toLowerCase();
  return rows.filter((row) => row.metric.toLowerCase().includes(needle));
}

export function filterByBorough(
  rows: readonly RespiratoryObservation[],
  borough: string = CITYWIDE_SUBMETRIC
): RespiratoryObservation[] {
  return rows.filter((row) => row.submetric === borough);
}

/**
 * Most recent observation per metric/submetric pair, sorted by metric then submetric.
 */
export function latestValues(rows: readonly RespiratoryObservation[]): RespiratoryObservation[] {
  const latest = new Map<string, RespiratoryObservation>();

  for (const row of rows) {
    const key = `${row.metric}\u0000${row.submetric}`;
    const current = latest.get(key);
    // dates are YYYY-MM-DD, so string order is chronological
    if (!current || row.date > current.date) {
      latest.set(key, row);
    }
  }

  return [...latest.values()].sort(
    (a, b) => a.metric.localeCompare(b.metric) || a.submetric.localeCompare(b.submetric)
  );
}

/**
 * Latest citywide value of each key metric, in key-metric order.
 */
export function latestCitywideValues(rows: readonly RespiratoryObservation[]): RespiratoryObservation[] {
  const latest = latestValues(filterByBorough(rows, CITYWIDE_SUBMETRIC));
  return KEY_RESPIRATORY_METRICS.flatMap((metric) => latest.filter((row) => row.metric === metric));
}

export async function getRespiratoryData({
  http,
  url = RESPIRATORY_DATA_URL,
  daysBack = 90,
  disease,
  borough,
  now = new Date(),
}: {
  http: HttpClient;
  url?: string;
  daysBack?: number;
  disease?: string;
  borough?: string;
  now?: Date;
}): Promise<ConnectorResult<RespiratoryObservation>> {
  const failures: SourceFailure[] = [];
  let records: RespiratoryObservation[] = [];
  let skipped = 0;

  try {
    const response = await http.get<unknown>(url, { responseType: "text" });
    if (typeof response.data !== "string") {
      throw new MalformedResponseError("Expected CSV text");
    }

    const parsed = parseRespiratoryCsv(response.data);
    skipped = parsed.skipped;

    records = filterByDate(parsed.rows, daysBack, now);
    if (disease) records = filterByDisease(records, disease);
    if (borough) records = filterByBorough(records, borough);

    logger.info(
      { downloaded: parsed.rows.length, kept: records.length, skipped, daysBack },
      "Respiratory illness data downloaded"
    );

    const latest = latestCitywideValues(parsed.rows);
    if (latest.length) {
      logger.info(
        { latest: latest.map(({ metric, date, display }) => ({ metric, date, display })) },
        "Latest citywide respiratory values"
      );
    }
  } catch (err) {
    const failure = toSourceFailure(SOURCE, url, err);
    failures.push(failure);
    logger.warn({ reason: failure.reason, status: failure.status }, "Respiratory data fetch failed");
  }

  return {
    source: SOURCE,
    records,
    failures,
    skipped,
    fetchedAt: new Date().toISOString(),
  };
}
