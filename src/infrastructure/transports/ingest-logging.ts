import { Logger } from '@nestjs/common';
import { IngestOutcome } from '../../domain/services/response-collector';

export function logIngestOutcome(logger: Logger, outcome: IngestOutcome): void {
  switch (outcome.kind) {
    case 'accepted':
      logger.debug(
        outcome.replaced
          ? `Duplicate pong from ${outcome.identity}, keeping the latest`
          : `Pong from ${outcome.identity}`,
      );
      break;
    case 'malformed':
      logger.warn(`Skipping malformed reply: ${outcome.error.message}`);
      break;
    case 'invalid':
      logger.debug('Ignoring reply without a worker identity');
      break;
  }
}
