import type { NotificationCategory } from '../../domain/value-objects/NotificationCategory';

/**
 * One message to one user, built and discarded within a single tick
 */
export interface NotificationEvent {
  userId: string;
  chatId: number;
  category: NotificationCategory;
  body: string;
}
