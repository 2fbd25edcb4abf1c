import { z } from 'zod/v4';

// Application
import { type LoggerPort } from '../../../application/ports/outbound/logging/logger.port.js';
import {
    type Digest,
    type NotifierPort,
} from '../../../application/ports/outbound/notifiers/notifier.port.js';

// Constants
const API_BASE_URL = 'https://api.telegram.org';
const REQUEST_TIMEOUT_MS = 10_000;

const telegramResponseSchema = z.object({
    description: z.string().optional(),
    ok: z.boolean(),
});

export interface TelegramConfiguration {
    botToken?: string;
    chatId?: string;
}

/**
 * Sends the plain report through a Telegram bot. No parse mode is set, so the text
 * goes out verbatim.
 */
export class TelegramNotifier implements NotifierPort {
    public readonly name = 'telegram';

    constructor(
        private readonly configuration: TelegramConfiguration,
        private readonly logger: LoggerPort,
    ) {}

    public async push(content: string): Promise<boolean> {
        const { botToken, chatId } = this.configuration;

        if (!botToken || !chatId) {
            this.logger.warn('Telegram bot token or chat id not configured, skipping push');
            return false;
        }

        try {
            const response = await fetch(`${API_BASE_URL}/bot${botToken}/sendMessage`, {
                body: JSON.stringify({
                    chat_id: chatId,
                    disable_web_page_preview: true,
                    text: content,
                }),
                headers: { 'Content-Type': 'application/json' },
                method: 'POST',
                signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
            });

            const result = telegramResponseSchema.parse(await response.json());

            if (!result.ok) {
                this.logger.error('Telegram rejected the message', {
                    description: result.description,
                    status: response.status,
                });
                return false;
            }

            this.logger.info('Digest pushed to Telegram');
            return true;
        } catch (error) {
            this.logger.error('Failed to push digest to Telegram', { error });
            return false;
        }
    }

    public send(digest: Digest): Promise<boolean> {
        return this.push(digest.plain);
    }
}
