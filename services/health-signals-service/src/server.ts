import { Consumer, Kafka, logLevel } from "kafkajs";
import { loadConfig } from "./config/env";
import { logger } from "./logger";
import { FileSink } from "./modules/fileSink";
import { createHttpClient } from "./modules/httpClient";
import { createIngestRunner } from "./modules/ingestRunner";
import { buildJobs } from "./modules/jobs";
import { KafkaSink } from "./modules/kafkaSink";
import { initRefreshConsumer, stopRefreshConsumer } from "./modules/refreshConsumer";
import { RecordSink } from "./modules/sink";

// -------------------------------------------------
// Config & clients
// -------------------------------------------------
const config = loadConfig();

const { axiosClient, httpsAgent } = createHttpClient(config.http.timeoutMs);

let sink: RecordSink;
let consumer: Consumer | undefined;
let connectKafka: (() => Promise<void>) | undefined;

if (config.sink.type === "kafka") {
    const kafka = new Kafka({
        clientId: "health-signals-service",
        brokers: [config.sink.broker],
        logLevel: logLevel.NOTHING,
        connectionTimeout: 10_000,
        authenticationTimeout: 10_000,
    });

    const producer = kafka.producer({
        idempotent: true,
        retry: {
            initialRetryTime: 300,
            retries: 20,
            maxRetryTime: 30_000,
        },
        maxInFlightRequests: 5,
    });
    const kafkaConsumer = kafka.consumer({ groupId: "health-signals-group" });

    sink = new KafkaSink(producer);
    consumer = kafkaConsumer;
    connectKafka = async () => {
        await producer.connect();
        await kafkaConsumer.connect();
    };
} else {
    sink = new FileSink(config.sink.outputDir);
}

const runner = createIngestRunner({
    jobs: buildJobs(config, axiosClient),
    sink,
});

async function refresh(trigger: string) {
    try {
        await runner.run(trigger);
    } catch (err) {
        logger.error({ err, trigger }, "Ingest run failed");
    }
}

// -------------------------------------------------
// Kafka (retry until reachable)
// -------------------------------------------------
let kafkaStarting = false;
let kafkaDownLogged = false;

async function initKafkaSafely(kafkaConsumer: Consumer, connect: () => Promise<void>) {
    if (kafkaStarting) return;
    kafkaStarting = true;

    for (; ;) {
        try {
            await connect();
            await initRefreshConsumer({
                consumer: kafkaConsumer,
                onRefreshCommand: refresh,
            });

            logger.info("Kafka connected (health signals service)");
            return;
        } catch (err) {
            if (!kafkaDownLogged) {
                kafkaDownLogged = true;
                logger.warn({ err }, "Kafka unavailable, retrying every 10s");
            }
            await new Promise(res => setTimeout(res, 10_000));
        }
    }
}

// -------------------------------------------------
// Scheduler (optional)
// -------------------------------------------------
let scheduler: NodeJS.Timeout | undefined;

function startScheduler(intervalMs: number) {
    scheduler = setInterval(() => {
        void refresh("interval");
    }, intervalMs);

    logger.info(
        `Ingest scheduler started (every ${intervalMs / 1000}s). Next run at ${new Date(
            Date.now() + intervalMs
        ).toLocaleString()}`
    );
}

async function start() {
    logger.info({ sink: sink.name }, "Health signals service starting");

    if (consumer && connectKafka) {
        await initKafkaSafely(consumer, connectKafka);
    }

    await refresh("initial");

    if (config.scheduler.intervalMs > 0) {
        startScheduler(config.scheduler.intervalMs);
    } else if (!consumer) {
        // file sink without an interval: a single pass, then exit
        await shutdown("run-complete");
    }
}

// -------------------------------------------------
// Graceful shutdown
// -------------------------------------------------
let shuttingDown = false;

async function shutdown(signal: string) {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info(`Received ${signal}. Shutting down...`);

    try {
        if (scheduler) clearInterval(scheduler);
        httpsAgent.destroy();

        if (consumer) await stopRefreshConsumer(consumer);
        await sink.close();

        setTimeout(() => process.exit(0), 2000);
    } catch (err) {
        logger.error({ err }, "Shutdown error");
        process.exit(1);
    }
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

start().catch((err) => {
    logger.error({ err }, "Health signals service failed to start");
    process.exit(1);
});
