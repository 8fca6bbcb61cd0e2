import { Consumer } from 'kafkajs';
import { REFRESH_COMMAND_TOPIC } from '../constants/topics';
import { logger } from '../logger';

export type RefreshConsumerDeps = {
  consumer: Consumer;
  onRefreshCommand: (trigger: string) => Promise<unknown>;
  fromBeginning?: boolean;
};

export async function initRefreshConsumer({
  consumer,
  onRefreshCommand,
  fromBeginning = false,
}: RefreshConsumerDeps) {
  await consumer.subscribe({
    topic: REFRESH_COMMAND_TOPIC,
    fromBeginning,
  });

  await consumer.run({
    eachMessage: async ({ topic, message }) => {
      const value = message.value?.toString().trim();

      try {
        logger.debug({ topic, value }, 'Received refresh command');
        await onRefreshCommand(value ? `command:${value}` : 'command');
      } catch (err) {
        logger.error(
          { err, topic, value },
          'Unhandled error while processing refresh command'
        );
      }
    },
  });

  logger.info('Kafka consumer started (health signals service)');
}

export async function stopRefreshConsumer(consumer: Consumer) {
  try {
    await consumer.disconnect();
    logger.info('Kafka consumer disconnected');
  } catch (err) {
    logger.warn({ err }, 'Error disconnecting Kafka consumer');
  }
}
