import { Telegram } from 'telegraf';
import type { Logger } from '../logger';
import { errorMessage } from '../errors';

/** Best-effort outbound notifications. Implementations never reject. */
export interface NotificationSink {
  sendMessage(text: string): Promise<void>;
}

export class TelegramNotifier implements NotificationSink {
  private readonly telegram: Telegram;

  constructor(
    botToken: string,
    private readonly chatId: string,
    private readonly logger: Logger,
  ) {
    this.telegram = new Telegram(botToken);
  }

  async sendMessage(text: string): Promise<void> {
    try {
      await this.telegram.sendMessage(this.chatId, text);
    } catch (error) {
      this.logger.warn(`Telegram notification failed: ${errorMessage(error)}`);
    }
  }
}

export class LogNotifier implements NotificationSink {
  constructor(private readonly logger: Logger) {}

  async sendMessage(text: string): Promise<void> {
    this.logger.info(`📣 ${text}`);
  }
}

export function createNotifier(
  telegram: { botToken: string; chatId: string } | undefined,
  logger: Logger,
): NotificationSink {
  return telegram ? new TelegramNotifier(telegram.botToken, telegram.chatId, logger) : new LogNotifier(logger);
}
