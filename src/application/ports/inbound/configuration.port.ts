// Application
import { type LoggerLevel } from '../outbound/logging/logger.port.js';

/**
 * Configuration port providing access to application settings
 */
export interface ConfigurationPort {
    /**
     * Get the inbound configuration
     */
    getInboundConfiguration(): InboundConfigurationPort;

    /**
     * Get the outbound configuration
     */
    getOutboundConfiguration(): OutboundConfigurationPort;
}

/**
 * Inbound configuration (defined by the user)
 */
export interface InboundConfigurationPort {
    env: 'development' | 'production' | 'test';
    logger: {
        level: LoggerLevel;
        prettyPrint: boolean;
    };
    report: {
        timezone?: string;
    };
    sources: SourcesConfigurationPort;
    tasks: TasksConfigurationPort;
}

/**
 * Outbound configuration (defined by external services)
 */
export interface OutboundConfigurationPort {
    gemini: LanguageModelConfiguration;
    nvidia: LanguageModelConfiguration;
    pushPlus: {
        token?: string;
    };
    telegram: {
        botToken?: string;
        chatId?: string;
    };
}

/**
 * A text-generation provider; it is disabled while the key is absent
 */
export interface LanguageModelConfiguration {
    apiKey?: string;
    model: string;
}

/**
 * Item counts and categories of the content sources
 */
export interface SourcesConfigurationPort {
    arxiv: {
        categories: string[];
        limit: number;
    };
    hackerNews: {
        limit: number;
    };
}

/**
 * Tasks configuration
 */
export interface TasksConfigurationPort {
    dailyDigest: {
        /**
         * Cron expression; the digest runs once and the process exits when absent
         */
        schedule?: string;
    };
}
