import { Kafka, Producer, Consumer, EachMessagePayload, logLevel } from 'kafkajs';
import { config } from '../../config';
import logger from '../../utils/logger';
import { DomainEvent, KAFKA_TOPICS } from '../../events/types';

export type LedgerTopic = (typeof KAFKA_TOPICS)[keyof typeof KAFKA_TOPICS];

export type MessageHandler = (payload: EachMessagePayload) => Promise<void>;

const kafka = new Kafka({
  clientId: config.kafka.clientId,
  brokers: config.kafka.brokers,
  logLevel: logLevel.WARN,
  retry: {
    initialRetryTime: 100,
    retries: 8,
  },
});

let producer: Promise<Producer> | null = null;
const consumers: Consumer[] = [];

const connectProducer = async (): Promise<Producer> => {
  // One in-flight request per connection keeps a partition's messages in send order
  const next = kafka.producer({
    allowAutoTopicCreation: false,
    idempotent: true,
    maxInFlightRequests: 1,
  });

  await next.connect();
  logger.info('Kafka producer connected');
  return next;
};

/**
 * Lazily connected producer shared by every publisher. A failed connect is
 * forgotten so the next publish retries it.
 */
export const getProducer = (): Promise<Producer> => {
  if (!producer) {
    producer = connectProducer().catch((error: unknown) => {
      producer = null;
      throw error;
    });
  }
  return producer;
};

export const publishEvent = async (topic: LedgerTopic, event: DomainEvent): Promise<void> => {
  try {
    const prod = await getProducer();

    await prod.send({
      topic,
      messages: [
        {
          key: event.aggregateId,
          value: JSON.stringify(event),
          headers: {
            eventType: event.eventType,
            correlationId: event.correlationId || '',
            timestamp: event.timestamp.toISOString(),
          },
        },
      ],
    });

    logger.debug('Event published', {
      topic,
      eventType: event.eventType,
      aggregateId: event.aggregateId,
    });
  } catch (error) {
    logger.error('Failed to publish event', { topic, eventType: event.eventType, error });
    throw error;
  }
};

/**
 * Subscribe a projection to ledger topics from the start of the log. A message
 * whose handler throws is logged and committed past; the read model can be
 * rebuilt from the journal.
 */
export const createConsumer = async (
  groupId: string,
  topics: LedgerTopic[],
  handler: MessageHandler
): Promise<Consumer> => {
  const consumer = kafka.consumer({ groupId });
  consumers.push(consumer);

  consumer.on(consumer.events.CRASH, (event) => {
    logger.error('Kafka consumer crashed', { groupId, error: event.payload.error });
  });

  await consumer.connect();
  await consumer.subscribe({ topics, fromBeginning: true });
  logger.info('Kafka consumer subscribed', { groupId, topics });

  await consumer.run({
    eachMessage: async (payload) => {
      try {
        await handler(payload);
      } catch (error) {
        logger.error('Error processing message', {
          topic: payload.topic,
          partition: payload.partition,
          offset: payload.message.offset,
          error,
        });
      }
    },
  });

  return consumer;
};

export const disconnectKafka = async (): Promise<void> => {
  try {
    if (producer) {
      const prod = await producer;
      await prod.disconnect();
      producer = null;
      logger.info('Kafka producer disconnected');
    }

    for (const consumer of consumers.splice(0)) {
      await consumer.disconnect();
    }
    logger.info('Kafka consumers disconnected');
  } catch (error) {
    logger.error('Error disconnecting from Kafka', error);
  }
};

export const createTopics = async (topics: LedgerTopic[]): Promise<void> => {
  const admin = kafka.admin();

  try {
    await admin.connect();

    const existingTopics = await admin.listTopics();
    const topicsToCreate = topics.filter((t) => !existingTopics.includes(t));

    if (topicsToCreate.length > 0) {
      await admin.createTopics({
        waitForLeaders: true,
        topics: topicsToCreate.map((topic) => ({
          topic,
          numPartitions: config.kafka.topicPartitions,
          replicationFactor: config.kafka.replicationFactor,
        })),
      });
      logger.info('Topics created', { topics: topicsToCreate });
    }
  } finally {
    await admin.disconnect();
  }
};

export { KAFKA_TOPICS };
