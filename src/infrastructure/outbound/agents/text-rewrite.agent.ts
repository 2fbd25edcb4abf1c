import { generateText, type LanguageModel } from 'ai';

// Application
import {
    type RewriteBatch,
    type RewriteTask,
    type TextRewriteAgentPort,
} from '../../../application/ports/outbound/agents/text-rewrite.agent.js';
import { type LoggerPort } from '../../../application/ports/outbound/logging/logger.port.js';

/**
 * A text-generation provider, tried in list order
 */
export interface RewriteModel {
    model: LanguageModel;
    name: string;
    timeoutMs: number;
}

const MAX_OUTPUT_TOKENS = 8192;
const TEMPERATURE = 0.3;
const MAX_MARKER_DIGITS = 4;
const LIST_SEPARATORS = ['.', '、'];
const REASONING_PATTERN = /<think>[\s\S]*?<\/think>/g;

/**
 * Removes the reasoning segments some models prepend to their answer
 */
export function stripReasoning(text: string): string {
    return text.replace(REASONING_PATTERN, '').trim();
}

/**
 * Strips a leading "12." or "12、" marker from a line
 */
function stripListMarker(line: string): string {
    for (let length = 1; length <= MAX_MARKER_DIGITS; length++) {
        const prefix = line.slice(0, length);
        const separator = line.charAt(length);

        if (LIST_SEPARATORS.includes(separator) && /^\d+$/.test(prefix)) {
            return line.slice(length + 1).trim();
        }
    }

    return line;
}

/**
 * Splits a reply already stripped of reasoning into its numbered lines
 */
function splitListLines(content: string, expectedCount: number): null | string[] {
    const lines = content
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0)
        .map(stripListMarker);

    return lines.length === expectedCount ? lines : null;
}

/**
 * Parses a numbered-list reply. Resolves to null unless exactly `expectedCount` lines remain,
 * so a translation can never be attributed to the wrong text.
 */
export function parseNumberedList(text: string, expectedCount: number): null | string[] {
    return splitListLines(stripReasoning(text), expectedCount);
}

export class TextRewriteAgent implements TextRewriteAgentPort {
    static readonly INSTRUCTIONS: Record<RewriteTask, string> = {
        summarize: [
            'The following are trending article titles from a technology community.',
            'For each title, write one sentence in Simplified Chinese (30 to 60 characters) describing the core content or background the article likely discusses.',
            'Keep the numbering, one line per item.',
            'Output only the descriptions and do not repeat the titles.',
        ].join(' '),
        translate: [
            'Translate each of the following English texts into concise Simplified Chinese, keeping the numbering.',
            'Output only the translations, without any explanation.',
            'Keep proper nouns (company names, product names, people) in English.',
        ].join(' '),
    };

    public readonly name = 'TextRewriteAgent';

    constructor(
        private readonly models: RewriteModel[],
        private readonly logger: LoggerPort,
    ) {}

    static readonly USER_PROMPT = (texts: string[], task: RewriteTask): string =>
        [
            TextRewriteAgent.INSTRUCTIONS[task],
            '',
            ...texts.map((text, index) => `${index + 1}. ${text}`),
        ].join('\n');

    public isAvailable(): boolean {
        return this.models.length > 0;
    }

    public async rewriteBatch(
        texts: string[],
        task: RewriteTask = 'translate',
    ): Promise<RewriteBatch> {
        const fallback: RewriteBatch = { rewritten: false, texts };

        if (texts.length === 0) {
            return fallback;
        }

        const reply = await this.generate(TextRewriteAgent.USER_PROMPT(texts, task));
        if (reply === null) {
            this.logger.warn('No provider produced a rewrite, keeping original texts', {
                count: texts.length,
                task,
            });
            return fallback;
        }

        const parsed = splitListLines(reply, texts.length);
        if (parsed === null) {
            this.logger.warn('Rewrite result count mismatch, keeping original texts', {
                expected: texts.length,
                task,
            });
            return fallback;
        }

        this.logger.info('Batch rewritten', { count: texts.length, task });
        return { rewritten: true, texts: parsed };
    }

    /**
     * Tries each provider in order until one returns usable text, stripped of reasoning
     */
    private async generate(prompt: string): Promise<null | string> {
        for (const { model, name, timeoutMs } of this.models) {
            try {
                const { text } = await generateText({
                    abortSignal: AbortSignal.timeout(timeoutMs),
                    maxRetries: 0,
                    maxTokens: MAX_OUTPUT_TOKENS,
                    model,
                    prompt,
                    temperature: TEMPERATURE,
                });

                const content = stripReasoning(text);
                if (content.length > 0) {
                    return content;
                }

                this.logger.warn('Provider returned an empty reply', { provider: name });
            } catch (error) {
                this.logger.error('Provider call failed', { error, provider: name });
            }
        }

        return null;
    }
}
