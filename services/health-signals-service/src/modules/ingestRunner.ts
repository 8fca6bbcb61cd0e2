import { ConnectorResult, SourceFailure } from "../interfaces/connector";
import { logger } from "../logger";
import { OutboundMessage } from "./messages";
import { RecordSink } from "./sink";

export interface JobOutput {
  messages: OutboundMessage[];
  records: number;
  skipped: number;
  failures: SourceFailure[];
}

export interface IngestJob {
  name: string;
  topic: string;
  collect: () => Promise<JobOutput>;
}

/**
 * Bind a connector to its topic and message format.
 */
export function defineJob<T>({
  name,
  topic,
  fetch,
  toMessage,
}: {
  name: string;
  topic: string;
  fetch: () => Promise<ConnectorResult<T>>;
  toMessage: (record: T, scrapedAt: string) => OutboundMessage;
}): IngestJob {
  return {
    name,
    topic,
    async collect() {
      const result = await fetch();
      return {
        messages: result.records.map((record) => toMessage(record, result.fetchedAt)),
        records: result.records.length,
        skipped: result.skipped,
        failures: result.failures,
      };
    },
  };
}

export type JobReport =
  | {
      job: string;
      status: "ok";
      records: number;
      skipped: number;
      published: number;
      failures: SourceFailure[];
    }
  | {
      job: string;
      status: "failed";
      stage: "collect" | "publish";
      error: string;
    };

export type RunSummary =
  | { status: "skipped"; trigger: string }
  | {
      status: "completed";
      trigger: string;
      startedAt: string;
      finishedAt: string;
      jobs: JobReport[];
    };

export function createIngestRunner({ jobs, sink }: { jobs: readonly IngestJob[]; sink: RecordSink }) {
  let runInProgress = false;

  async function runJob(job: IngestJob): Promise<JobReport> {
    let output: JobOutput;
    try {
      output = await job.collect();
    } catch (err) {
      logger.error({ err, job: job.name }, "Ingest job failed, continuing with remaining jobs");
      return { job: job.name, status: "failed", stage: "collect", error: errorMessage(err) };
    }

    let published: number;
    try {
      published = await sink.publish(job.topic, output.messages);
    } catch (err) {
      logger.error({ err, job: job.name, sink: sink.name }, "Publishing ingest job output failed");
      return { job: job.name, status: "failed", stage: "publish", error: errorMessage(err) };
    }

    return {
      job: job.name,
      status: "ok",
      records: output.records,
      skipped: output.skipped,
      published,
      failures: output.failures,
    };
  }

  async function run(trigger: string): Promise<RunSummary> {
    if (runInProgress) {
      logger.debug({ trigger }, "Ingest run already in progress, skipping");
      return { status: "skipped", trigger };
    }

    runInProgress = true;
    const startedAt = new Date().toISOString();
    logger.debug({ trigger }, "Ingest run started");

    try {
      const reports: JobReport[] = [];
      for (const job of jobs) {
        reports.push(await runJob(job));
      }

      const finishedAt = new Date().toISOString();
      logger.info(
        {
          trigger,
          jobs: reports.map((report) =>
            report.status === "ok"
              ? { job: report.job, records: report.records, published: report.published, failures: report.failures.length }
              : { job: report.job, failed: report.stage }
          ),
        },
        "Ingest run finished"
      );

      return { status: "completed", trigger, startedAt, finishedAt, jobs: reports };
    } finally {
      runInProgress = false;
    }
  }

  return { run };
}

export type IngestRunner = ReturnType<typeof createIngestRunner>;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
