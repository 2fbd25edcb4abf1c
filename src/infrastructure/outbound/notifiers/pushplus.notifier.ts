import { z } from 'zod/v4';

// Application
import { type LoggerPort } from '../../../application/ports/outbound/logging/logger.port.js';
import {
    type Digest,
    type NotifierPort,
} from '../../../application/ports/outbound/notifiers/notifier.port.js';

// Constants
const API_URL = 'http://www.pushplus.plus/send';
const REQUEST_TIMEOUT_MS = 10_000;
const SUCCESS_CODE = 200;

const pushPlusResponseSchema = z.object({
    code: z.number(),
    msg: z.string().optional(),
});

/**
 * Pushes the Markdown report to WeChat through PushPlus
 */
export class PushPlusNotifier implements NotifierPort {
    public readonly name = 'pushplus';

    constructor(
        private readonly token: string | undefined,
        private readonly logger: LoggerPort,
    ) {}

    public async push(title: string, content: string): Promise<boolean> {
        if (!this.token) {
            this.logger.warn('PushPlus token not configured, skipping WeChat push');
            return false;
        }

        try {
            const response = await fetch(API_URL, {
                body: JSON.stringify({ content, template: 'markdown', title, token: this.token }),
                headers: { 'Content-Type': 'application/json' },
                method: 'POST',
                signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
            });

            const result = pushPlusResponseSchema.parse(await response.json());

            if (result.code !== SUCCESS_CODE) {
                this.logger.error('PushPlus rejected the message', {
                    code: result.code,
                    message: result.msg,
                });
                return false;
            }

            this.logger.info('Digest pushed to WeChat');
            return true;
        } catch (error) {
            this.logger.error('Failed to push digest to WeChat', { error });
            return false;
        }
    }

    public send(digest: Digest): Promise<boolean> {
        return this.push(digest.title, digest.rich);
    }
}
