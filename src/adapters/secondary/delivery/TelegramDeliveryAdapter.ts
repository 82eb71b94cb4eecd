import axios, { type AxiosInstance, AxiosError, isAxiosError } from 'axios';
import axiosRetry, { exponentialDelay, isNetworkError } from 'axios-retry';
import type {
  DeliveryOutcome,
  IDeliverySink,
} from '../../../modules/notifications/application/ports/IDeliverySink';
import type { NotificationEvent } from '../../../modules/notifications/application/types/NotificationEvent';
import {
  TelegramErrorResponseSchema,
  TelegramSendMessageResponseSchema,
} from '../../../shared/validation/schemas';
import { PermanentDeliveryError } from '../../../domain/errors/PermanentDeliveryError';
import { TransientDeliveryError } from '../../../domain/errors/TransientDeliveryError';
import { logger } from '../../../shared/logger';
import { errorFields } from '../../../shared/utils/errors';

export interface TelegramDeliveryOptions {
  botToken: string;
  /** e.g. https://api.telegram.org */
  apiBaseUrl: string;
  timeoutMs: number;
  /** Transport-level retries; 0 keeps delivery at-most-once */
  retries: number;
}

function isRetryableStatus(status: number | undefined): boolean {
  return status === undefined || status === 429 || status >= 500;
}

/**
 * TelegramDeliveryAdapter
 *
 * IDeliverySink over the Telegram Bot API `sendMessage` method.
 *
 * **Error classification:**
 * | Cause | Outcome |
 * |-------|---------|
 * | 2xx with `ok: true` | DELIVERED |
 * | 429, 5xx, timeout, network error | FAILED, retryable (TransientDeliveryError) |
 * | Other 4xx (bot blocked, chat not found) | FAILED, not retryable (PermanentDeliveryError) |
 * | 2xx with an unexpected body | FAILED, not retryable |
 *
 * Never throws. The bot token is part of the request path, so request URLs
 * are never logged.
 */
export class TelegramDeliveryAdapter implements IDeliverySink {
  private readonly axiosInstance: AxiosInstance;

  public constructor(options: TelegramDeliveryOptions) {
    this.axiosInstance = axios.create({
      baseURL: `${options.apiBaseUrl.replace(/\/+$/, '')}/bot${options.botToken}`,
      timeout: options.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
      },
    });

    if (options.retries > 0) {
      axiosRetry(this.axiosInstance, {
        retries: options.retries,
        retryDelay: exponentialDelay,
        retryCondition: (error: AxiosError): boolean =>
          isNetworkError(error) || isRetryableStatus(error.response?.status),
        onRetry: (retryCount: number, error: AxiosError): void => {
          logger.warn({
            msg: 'Telegram delivery retry attempt',
            retryCount,
            statusCode: error.response?.status,
            error: error.message,
          });
        },
      });
    }
  }

  public async send(event: NotificationEvent, signal?: AbortSignal): Promise<DeliveryOutcome> {
    const startTime = Date.now();

    try {
      const response = await this.axiosInstance.post<unknown>(
        '/sendMessage',
        { chat_id: event.chatId, text: event.body },
        { signal }
      );

      const parsed = TelegramSendMessageResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        return this.failed(
          event,
          new PermanentDeliveryError('Unexpected sendMessage response body', response.status),
          startTime
        );
      }

      logger.info({
        msg: 'Telegram delivery succeeded',
        userId: event.userId,
        chatId: event.chatId,
        category: event.category,
        messageId: parsed.data.result.message_id,
        durationMs: Date.now() - startTime,
      });

      return { status: 'DELIVERED' };
    } catch (error) {
      return this.failed(event, this.classify(error), startTime);
    }
  }

  private classify(error: unknown): PermanentDeliveryError | TransientDeliveryError {
    if (!isAxiosError(error)) {
      return new TransientDeliveryError(
        `Unexpected error during Telegram delivery: ${errorFields(error).error}`
      );
    }

    const status = error.response?.status;
    const body = TelegramErrorResponseSchema.safeParse(error.response?.data);
    const description = body.success ? body.data.description : error.message;

    if (isRetryableStatus(status)) {
      return new TransientDeliveryError(`Telegram delivery failed: ${description}`, status);
    }
    return new PermanentDeliveryError(
      `Telegram rejected the message with HTTP ${String(status)}: ${description}`,
      status
    );
  }

  private failed(
    event: NotificationEvent,
    error: PermanentDeliveryError | TransientDeliveryError,
    startTime: number
  ): DeliveryOutcome {
    const retryable = error instanceof TransientDeliveryError;
    const fields = {
      userId: event.userId,
      chatId: event.chatId,
      category: event.category,
      statusCode: error.statusCode,
      durationMs: Date.now() - startTime,
      ...errorFields(error),
    };

    if (retryable) {
      logger.warn({ msg: 'Telegram delivery failed (transient)', ...fields });
    } else {
      logger.error({ msg: 'Telegram delivery failed (permanent)', ...fields });
    }

    return { status: 'FAILED', reason: error.message, retryable };
  }
}
