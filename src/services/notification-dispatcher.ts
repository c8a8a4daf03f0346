import TelegramBot from 'node-telegram-bot-api';
import { DigestDocument } from './digest-formatter';
import { DeliveryError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface DeliveryReport {
  delivered: string[];
  failed: Array<{ recipient: string; error: string }>;
}

/**
 * Hands a rendered digest to its recipients
 */
export interface DigestDelivery {
  deliver(document: DigestDocument, recipients: string[]): Promise<DeliveryReport>;
}

/**
 * Sends digests to Telegram chats
 * Recipients are chat ids; each gets every section of the digest in order
 */
export class TelegramDigestDelivery implements DigestDelivery {
  private bot: TelegramBot;

  constructor(botToken: string) {
    this.bot = new TelegramBot(botToken, { polling: false });
  }

  async deliver(document: DigestDocument, recipients: string[]): Promise<DeliveryReport> {
    const report: DeliveryReport = { delivered: [], failed: [] };

    for (const recipient of recipients) {
      try {
        for (const section of document.sections) {
          await this.bot.sendMessage(recipient, section, {
            parse_mode: 'HTML',
            disable_web_page_preview: true,
          });
        }
        report.delivered.push(recipient);
        logger.info(`Digest sent`, { recipient, sections: document.sections.length });
      } catch (error) {
        const failure = new DeliveryError(recipient, { cause: error });
        report.failed.push({ recipient, error: failure.message });
        logger.error(`Failed to send digest`, failure, { recipient });
        // Continue with other recipients - partial failures are acceptable
      }
    }

    return report;
  }
}
