import { TOPICS } from '@relaydesk/shared';
import type { Container } from '../container.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('workers');

/**
 * Subscribe the pipeline's own consumers. message-created and
 * message-delivery belong to the AI responder and the delivery worker,
 * which run outside this service.
 */
export function startWorkers(container: Container): void {
  container.consumer.on(TOPICS.WEBHOOK_RECEIVED, async (event) => {
    await container.inbound.handle(event);
  });

  container.consumer.on(TOPICS.AI_RESPONSE_RECEIVED, async (event) => {
    await container.aiResponses.handle(event);
  });

  container.sweeper.start();

  log.info(
    { transport: container.transport.name, topics: [TOPICS.WEBHOOK_RECEIVED, TOPICS.AI_RESPONSE_RECEIVED] },
    'Pipeline workers started'
  );
}

export async function stopWorkers(container: Container): Promise<void> {
  container.sweeper.stop();
  await container.transport.close();
  log.info('Pipeline workers stopped');
}
