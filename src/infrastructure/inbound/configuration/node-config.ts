import { z } from 'zod/v4';

// Configuration
import {
    type ConfigurationPort,
    type InboundConfigurationPort,
    type OutboundConfigurationPort,
} from '../../../application/ports/inbound/configuration.port.js';

// Application
import { loggerLevelSchema } from '../../../application/ports/outbound/logging/logger.port.js';

// Shared
import { isValidTimezone } from '../../../shared/date/timezone.js';

/**
 * Environment variables come in as strings; an empty one means "not configured"
 */
const optionalStringSchema = z
    .string()
    .optional()
    .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const timezoneSchema = optionalStringSchema.refine(
    (timezone) => timezone === undefined || isValidTimezone(timezone),
    { message: 'Unknown IANA timezone' },
);

const categoriesSchema = z.preprocess(
    (value) =>
        typeof value === 'string'
            ? value
                  .split(',')
                  .map((category) => category.trim())
                  .filter((category) => category.length > 0)
            : value,
    z.array(z.string().min(1)).min(1),
);

const languageModelSchema = z.object({
    apiKey: optionalStringSchema,
    model: z.string().min(1),
});

const configurationSchema = z.object({
    inbound: z.object({
        env: z.enum(['development', 'production', 'test']),
        logger: z.object({
            level: loggerLevelSchema,
            prettyPrint: z.boolean(),
        }),
        report: z.object({
            timezone: timezoneSchema,
        }),
        sources: z.object({
            arxiv: z.object({
                categories: categoriesSchema,
                limit: z.coerce.number().int().positive(),
            }),
            hackerNews: z.object({
                limit: z.coerce.number().int().positive(),
            }),
        }),
        tasks: z.object({
            dailyDigest: z.object({
                schedule: optionalStringSchema,
            }),
        }),
    }),
    outbound: z.object({
        gemini: languageModelSchema,
        nvidia: languageModelSchema,
        pushPlus: z.object({
            token: optionalStringSchema,
        }),
        telegram: z.object({
            botToken: optionalStringSchema,
            chatId: optionalStringSchema,
        }),
    }),
});

export type ConfigurationOverrides = {
    outbound?: Partial<OutboundConfigurationPort>;
};

/**
 * Node.js configuration loader backed by node-config
 */
export class NodeConfig implements ConfigurationPort {
    private readonly configuration: {
        inbound: InboundConfigurationPort;
        outbound: OutboundConfigurationPort;
    };

    constructor(configurationInput: unknown, overrides?: ConfigurationOverrides) {
        // Parse and validate first
        const parsed = configurationSchema.parse(configurationInput);

        // Apply overrides after parsing
        this.configuration = {
            inbound: parsed.inbound,
            outbound: { ...parsed.outbound, ...overrides?.outbound },
        };
    }

    public getInboundConfiguration(): InboundConfigurationPort {
        return this.configuration.inbound;
    }

    public getOutboundConfiguration(): OutboundConfigurationPort {
        return this.configuration.outbound;
    }
}
