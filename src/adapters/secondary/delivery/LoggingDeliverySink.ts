import type {
  DeliveryOutcome,
  IDeliverySink,
} from '../../../modules/notifications/application/ports/IDeliverySink';
import type { NotificationEvent } from '../../../modules/notifications/application/types/NotificationEvent';
import { logger } from '../../../shared/logger';

/**
 * Sink used when no bot token is configured: writes each message to the log
 * and reports it delivered.
 */
export class LoggingDeliverySink implements IDeliverySink {
  public async send(event: NotificationEvent): Promise<DeliveryOutcome> {
    logger.info({
      msg: 'Notification logged (no messaging transport configured)',
      userId: event.userId,
      chatId: event.chatId,
      category: event.category,
      body: event.body,
    });

    return { status: 'DELIVERED' };
  }
}
