import { Producer } from "kafkajs";
import { logger } from "../logger";
import { KafkaHealth } from "./kafkaHealth";
import { OutboundMessage } from "./messages";
import { RecordSink } from "./sink";

export class KafkaSink implements RecordSink {
  readonly name = "kafka";

  constructor(
    private readonly producer: Producer,
    readonly health: KafkaHealth = new KafkaHealth()
  ) {
    producer.on(producer.events.CONNECT, () => {
      const previous = this.health.markUp();
      if (previous === "down") {
        logger.info("Kafka connection restored");
      } else if (previous === "connecting") {
        logger.info("Kafka producer connected");
      }
    });

    producer.on(producer.events.DISCONNECT, () => {
      if (this.health.markDown() !== "down") {
        logger.warn("Kafka producer disconnected");
      }
    });
  }

  async publish(topic: string, messages: OutboundMessage[]): Promise<number> {
    if (!messages.length) return 0;

    if (!this.health.isAvailable()) {
      const { state, downSince } = this.health.current();
      logger.warn({ topic, count: messages.length, state, downSince }, "Kafka unavailable, skipping publish");
      return 0;
    }

    await this.producer.send({ topic, messages });

    logger.info({ topic, count: messages.length }, "Messages published to Kafka");
    return messages.length;
  }

  async close(): Promise<void> {
    await this.producer.disconnect();
  }
}
