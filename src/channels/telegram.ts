import { Bot, GrammyError, HttpError, InlineKeyboard } from 'grammy';
import type { Logger } from '../types/logger.js';
import type { Group, HomeworkItem, Person, ScheduleSlot } from '../types/classroom.js';
import type { ReminderNotifier } from '../ports/notifier.js';
import type { ResolvedZone } from '../core/time-zone.js';
import { classReminderText, homeworkReminderText } from './messages.js';

/**
 * Telegram notifier configuration.
 */
export interface TelegramNotifierConfig {
  /** Bot token from BotFather; null disables delivery */
  botToken: string | null;
  /** Mini App URL for the "Open schedule" button; null hides the button */
  frontendDomain: string | null;
  /** Lead used in homework texts, in ms */
  homeworkLeadMs: number;
  /** Lead used in class texts, in ms */
  classLeadMs: number;
  /** API request timeout in ms (default: 30000) */
  timeout?: number;
  /** Max retries for retryable errors (default: 2) */
  maxRetries?: number;
  /** Base retry delay in ms (default: 1000) */
  retryDelay?: number;
}

const DEFAULT_CONFIG = {
  timeout: 30_000,
  maxRetries: 2,
  retryDelay: 1000,
};

/**
 * Telegram delivery error.
 */
export class TelegramError extends Error {
  readonly channelName = 'telegram';
  readonly retryable: boolean;
  readonly statusCode: number | undefined;

  constructor(
    message: string,
    options?: {
      retryable?: boolean;
      statusCode?: number;
    }
  ) {
    super(message);
    this.name = 'TelegramError';
    this.retryable = options?.retryable ?? false;
    this.statusCode = options?.statusCode;
  }
}

/**
 * Reminder delivery over the Telegram Bot API (grammY).
 *
 * Send-only: the bot's inbound conversation lives elsewhere, so nothing here
 * polls for updates. Every failed send throws, which lets the dispatcher count
 * it against that one recipient.
 */
export class TelegramNotifier implements ReminderNotifier {
  readonly name = 'telegram';

  private readonly config: Required<Pick<TelegramNotifierConfig, 'timeout' | 'maxRetries' | 'retryDelay'>> &
    TelegramNotifierConfig;
  private readonly logger: Logger;
  private readonly bot: Bot | null;

  constructor(config: TelegramNotifierConfig, logger: Logger) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = logger.child({ component: 'telegram' });
    this.bot = config.botToken ? new Bot(config.botToken) : null;
  }

  /**
   * Check if a bot token is configured.
   */
  isAvailable(): boolean {
    return this.bot !== null;
  }

  async notifyHomeworkDeadline(
    recipient: Person,
    homework: HomeworkItem,
    group: Group,
    recipientZone: ResolvedZone
  ): Promise<void> {
    const text = homeworkReminderText(homework, group, recipientZone, this.config.homeworkLeadMs);
    await this.send(recipient.chatId, text);
  }

  async notifyClassStarting(
    recipient: Person,
    group: Group,
    slot: ScheduleSlot,
    recipientZone: ResolvedZone,
    startsAt: Date
  ): Promise<void> {
    const text = classReminderText(
      group,
      slot.meetingLink,
      startsAt,
      recipientZone,
      this.config.classLeadMs
    );
    const keyboard = this.config.frontendDomain
      ? new InlineKeyboard().webApp('Open schedule', this.config.frontendDomain)
      : undefined;
    await this.send(recipient.chatId, text, keyboard);
  }

  /**
   * Send with retry on retryable errors.
   */
  private async send(target: string, text: string, keyboard?: InlineKeyboard): Promise<void> {
    const bot = this.bot;
    if (!bot) {
      this.logger.warn({ chatId: target }, 'Cannot send message: Telegram not configured');
      throw new TelegramError('Telegram bot token not configured');
    }

    const chatId = parseInt(target, 10);
    if (isNaN(chatId)) {
      throw new TelegramError(`Invalid chat ID: ${target}`, { retryable: false });
    }

    await this.executeWithRetry(() => this.doSendMessage(bot, chatId, text, keyboard));
    this.logger.debug({ chatId: target, textLength: text.length }, 'Message sent');
  }

  private async executeWithRetry<T>(operation: () => Promise<T>): Promise<T> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (error instanceof TelegramError && !error.retryable) {
          throw error;
        }

        if (attempt < this.config.maxRetries) {
          this.logger.warn(
            { attempt: attempt + 1, maxRetries: this.config.maxRetries },
            'Retrying after error'
          );
          await this.sleep(this.config.retryDelay * (attempt + 1));
        }
      }
    }

    throw lastError ?? new Error('Unknown error');
  }

  private async doSendMessage(
    bot: Bot,
    chatId: number,
    text: string,
    keyboard?: InlineKeyboard
  ): Promise<void> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.config.timeout);

    try {
      const options: Parameters<typeof bot.api.sendMessage>[2] = {};
      if (keyboard) {
        options.reply_markup = keyboard;
      }
      await bot.api.sendMessage(chatId, text, options, controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TelegramError('Request timed out', { retryable: true });
      }
      if (error instanceof GrammyError) {
        const retryable = error.error_code === 429 || error.error_code >= 500;
        throw new TelegramError(`Telegram API error: ${error.description}`, {
          retryable,
          statusCode: error.error_code,
        });
      }
      if (error instanceof HttpError) {
        throw new TelegramError(`Telegram network error: ${error.message}`, { retryable: true });
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Factory function.
 */
export function createTelegramNotifier(
  config: TelegramNotifierConfig,
  logger: Logger
): TelegramNotifier {
  return new TelegramNotifier(config, logger);
}
