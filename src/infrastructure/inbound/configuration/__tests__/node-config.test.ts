import { describe, expect, test } from 'vitest';
import { ZodError } from 'zod/v4';

import { NodeConfig } from '../node-config.js';

describe('Node Config', () => {
    const validConfig = {
        inbound: {
            env: 'development',
            logger: {
                level: 'info',
                prettyPrint: false,
            },
            report: {
                timezone: 'Asia/Shanghai',
            },
            sources: {
                arxiv: {
                    categories: ['cs.AI', 'cs.LG', 'cs.CL'],
                    limit: 5,
                },
                hackerNews: {
                    limit: 10,
                },
            },
            tasks: {
                dailyDigest: {
                    schedule: '0 8 * * *',
                },
            },
        },
        outbound: {
            gemini: {
                apiKey: 'test-gemini-key',
                model: 'gemini-2.0-flash',
            },
            nvidia: {
                apiKey: 'test-nvidia-key',
                model: 'moonshotai/kimi-k2.5',
            },
            pushPlus: {
                token: 'test-pushplus-token',
            },
            telegram: {
                botToken: 'test-bot-token',
                chatId: '1234',
            },
        },
    };

    test('should load valid configuration', () => {
        // Given - a valid configuration object
        // When - creating a NodeConfig instance
        const config = new NodeConfig(validConfig);

        // Then - it should return the correct inbound and outbound configuration
        expect(config.getInboundConfiguration()).toEqual(validConfig.inbound);
        expect(config.getOutboundConfiguration()).toEqual(validConfig.outbound);
    });

    test('should coerce item counts given as environment strings', () => {
        // Given - limits provided as strings
        const config = new NodeConfig({
            ...validConfig,
            inbound: {
                ...validConfig.inbound,
                sources: {
                    arxiv: { categories: ['cs.AI'], limit: '3' },
                    hackerNews: { limit: '7' },
                },
            },
        });

        // Then - they are parsed as numbers
        expect(config.getInboundConfiguration().sources.hackerNews.limit).toBe(7);
        expect(config.getInboundConfiguration().sources.arxiv.limit).toBe(3);
    });

    test('should split comma separated categories', () => {
        // Given - categories provided as one environment string
        const config = new NodeConfig({
            ...validConfig,
            inbound: {
                ...validConfig.inbound,
                sources: {
                    ...validConfig.inbound.sources,
                    arxiv: { categories: 'cs.CV, cs.RO,,stat.ML', limit: 5 },
                },
            },
        });

        // Then - they become a clean list
        expect(config.getInboundConfiguration().sources.arxiv.categories).toEqual([
            'cs.CV',
            'cs.RO',
            'stat.ML',
        ]);
    });

    test('should treat empty credentials as absent', () => {
        // Given - credentials left empty in the environment
        const config = new NodeConfig({
            ...validConfig,
            outbound: {
                gemini: { apiKey: '', model: 'gemini-2.0-flash' },
                nvidia: { apiKey: '   ', model: 'moonshotai/kimi-k2.5' },
                pushPlus: { token: '' },
                telegram: {},
            },
        });

        // Then - every credential resolves to undefined
        const outbound = config.getOutboundConfiguration();
        expect(outbound.gemini.apiKey).toBeUndefined();
        expect(outbound.nvidia.apiKey).toBeUndefined();
        expect(outbound.pushPlus.token).toBeUndefined();
        expect(outbound.telegram.botToken).toBeUndefined();
        expect(outbound.telegram.chatId).toBeUndefined();
    });

    test('should apply outbound overrides after parsing', () => {
        // Given - an override for the telegram credentials
        const config = new NodeConfig(validConfig, {
            outbound: { telegram: { botToken: 'override-token', chatId: '42' } },
        });

        // Then - the override wins and other sections are untouched
        expect(config.getOutboundConfiguration().telegram).toEqual({
            botToken: 'override-token',
            chatId: '42',
        });
        expect(config.getOutboundConfiguration().pushPlus.token).toBe('test-pushplus-token');
    });

    test('should fail with invalid environment', () => {
        // Given - a configuration with an invalid environment
        const invalidConfig = {
            ...validConfig,
            inbound: {
                ...validConfig.inbound,
                env: 'invalid-env',
            },
        };

        // When/Then - creating a NodeConfig should throw a ZodError
        expect(() => new NodeConfig(invalidConfig)).toThrow(ZodError);
    });

    test.each([0, -2, 'ten'])('should fail with item count %s', (limit) => {
        // Given - a non positive or non numeric item count
        const invalidConfig = {
            ...validConfig,
            inbound: {
                ...validConfig.inbound,
                sources: {
                    ...validConfig.inbound.sources,
                    hackerNews: { limit },
                },
            },
        };

        // When/Then - creating a NodeConfig should throw a ZodError
        expect(() => new NodeConfig(invalidConfig)).toThrow(ZodError);
    });

    test('should fail with an empty category list', () => {
        const invalidConfig = {
            ...validConfig,
            inbound: {
                ...validConfig.inbound,
                sources: {
                    ...validConfig.inbound.sources,
                    arxiv: { categories: [], limit: 5 },
                },
            },
        };

        expect(() => new NodeConfig(invalidConfig)).toThrow(ZodError);
    });

    test('should fail with an unknown timezone', () => {
        // Given - a misspelt timezone
        const invalidConfig = {
            ...validConfig,
            inbound: {
                ...validConfig.inbound,
                report: { timezone: 'Asia/Shangai' },
            },
        };

        // When/Then - creating a NodeConfig should throw a ZodError
        expect(() => new NodeConfig(invalidConfig)).toThrow(ZodError);
    });

    test('should accept an unset timezone', () => {
        // Given - an empty timezone from the environment
        const config = new NodeConfig({
            ...validConfig,
            inbound: { ...validConfig.inbound, report: { timezone: '' } },
        });

        // Then - the process clock is used
        expect(config.getInboundConfiguration().report.timezone).toBeUndefined();
    });

    test('should fail with invalid log level', () => {
        // Given - a configuration with an invalid log level
        const invalidConfig = {
            ...validConfig,
            inbound: {
                ...validConfig.inbound,
                logger: {
                    ...validConfig.inbound.logger,
                    level: 'invalid-level',
                },
            },
        };

        // When/Then - creating a NodeConfig should throw a ZodError
        expect(() => new NodeConfig(invalidConfig)).toThrow(ZodError);
    });

    test('should fail with a missing model name', () => {
        const invalidConfig = {
            ...validConfig,
            outbound: {
                ...validConfig.outbound,
                nvidia: { apiKey: 'test-nvidia-key' },
            },
        };

        expect(() => new NodeConfig(invalidConfig)).toThrow(ZodError);
    });
});
