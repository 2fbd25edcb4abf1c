import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import { Container, Injectable } from '@snap/ts-inject';
import { default as nodeConfiguration } from 'config';

// Configuration
import type { ConfigurationPort } from '../application/ports/inbound/configuration.port.js';
import {
    type ConfigurationOverrides,
    NodeConfig,
} from '../infrastructure/inbound/configuration/node-config.js';

// Application
import type { TaskPort, WorkerPort } from '../application/ports/inbound/worker.port.js';
import type { TextRewriteAgentPort } from '../application/ports/outbound/agents/text-rewrite.agent.js';
import type { LoggerPort } from '../application/ports/outbound/logging/logger.port.js';
import type { NotifierPort } from '../application/ports/outbound/notifiers/notifier.port.js';
import type { NewsProviderPort } from '../application/ports/outbound/providers/news.port.js';
import type { PaperProviderPort } from '../application/ports/outbound/providers/papers.port.js';
import { PlainReportPresenter } from '../application/presenters/plain-report.presenter.js';
import { RichReportPresenter } from '../application/presenters/rich-report.presenter.js';
import { PublishDigestUseCase } from '../application/use-cases/digest/publish-digest.use-case.js';
import { RewritePapersUseCase } from '../application/use-cases/digest/rewrite-papers.use-case.js';
import { RewriteStoriesUseCase } from '../application/use-cases/digest/rewrite-stories.use-case.js';

// Infrastructure
import { DailyDigestTask } from '../infrastructure/inbound/worker/digest/daily-digest.task.js';
import { ImmediateAdapter } from '../infrastructure/inbound/worker/immediate.adapter.js';
import { NodeCronAdapter } from '../infrastructure/inbound/worker/node-cron.adapter.js';
import {
    type RewriteModel,
    TextRewriteAgent,
} from '../infrastructure/outbound/agents/text-rewrite.agent.js';
import { PinoLogger } from '../infrastructure/outbound/logging/pino.logger.js';
import { PushPlusNotifier } from '../infrastructure/outbound/notifiers/pushplus.notifier.js';
import { TelegramNotifier } from '../infrastructure/outbound/notifiers/telegram.notifier.js';
import { Arxiv } from '../infrastructure/outbound/providers/arxiv.provider.js';
import { HackerNews } from '../infrastructure/outbound/providers/hacker-news.provider.js';

const NVIDIA_BASE_URL = 'https://integrate.api.nvidia.com/v1';
const NVIDIA_TIMEOUT_MS = 90_000;
const GEMINI_TIMEOUT_MS = 60_000;

/**
 * Outbound adapters
 */
const loggerFactory = Injectable(
    'Logger',
    ['Configuration'] as const,
    (config: ConfigurationPort): LoggerPort =>
        new PinoLogger({
            level: config.getInboundConfiguration().logger.level,
            prettyPrint: config.getInboundConfiguration().logger.prettyPrint,
        }),
);

const newsFactory = Injectable(
    'News',
    ['Logger'] as const,
    (logger: LoggerPort): NewsProviderPort => new HackerNews(logger),
);

const papersFactory = Injectable(
    'Papers',
    ['Logger'] as const,
    (logger: LoggerPort): PaperProviderPort => new Arxiv(logger),
);

/**
 * Text generation providers, in fallback order. A provider without a key is left out.
 */
const modelsFactory = Injectable(
    'Models',
    ['Configuration', 'Logger'] as const,
    (config: ConfigurationPort, logger: LoggerPort): RewriteModel[] => {
        const { gemini, nvidia } = config.getOutboundConfiguration();
        const models: RewriteModel[] = [];

        if (nvidia.apiKey) {
            const provider = createOpenAICompatible({
                apiKey: nvidia.apiKey,
                baseURL: NVIDIA_BASE_URL,
                name: 'nvidia',
            });
            models.push({
                model: provider.chatModel(nvidia.model),
                name: 'nvidia',
                timeoutMs: NVIDIA_TIMEOUT_MS,
            });
        }

        if (gemini.apiKey) {
            const provider = createGoogleGenerativeAI({ apiKey: gemini.apiKey });
            models.push({
                model: provider(gemini.model),
                name: 'gemini',
                timeoutMs: GEMINI_TIMEOUT_MS,
            });
        }

        logger.info('Initializing text generation providers', {
            providers: models.map((model) => model.name),
        });
        return models;
    },
);

const textRewriteAgentFactory = Injectable(
    'TextRewriteAgent',
    ['Models', 'Logger'] as const,
    (models: RewriteModel[], logger: LoggerPort): TextRewriteAgentPort =>
        new TextRewriteAgent(models, logger),
);

const notifiersFactory = Injectable(
    'Notifiers',
    ['Configuration', 'Logger'] as const,
    (config: ConfigurationPort, logger: LoggerPort): NotifierPort[] => {
        const { pushPlus, telegram } = config.getOutboundConfiguration();

        return [
            new PushPlusNotifier(pushPlus.token, logger),
            new TelegramNotifier(telegram, logger),
        ];
    },
);

/**
 * Presenters
 */
const presentersFactory = Injectable(
    'Presenters',
    ['Configuration'] as const,
    (config: ConfigurationPort) => {
        const { timezone } = config.getInboundConfiguration().report;

        return {
            plain: new PlainReportPresenter(timezone),
            rich: new RichReportPresenter(timezone),
        };
    },
);

/**
 * Use case factories
 */
const rewriteStoriesUseCaseFactory = Injectable(
    'RewriteStories',
    ['TextRewriteAgent', 'Logger'] as const,
    (agent: TextRewriteAgentPort, logger: LoggerPort) => new RewriteStoriesUseCase(agent, logger),
);

const rewritePapersUseCaseFactory = Injectable(
    'RewritePapers',
    ['TextRewriteAgent', 'Logger'] as const,
    (agent: TextRewriteAgentPort, logger: LoggerPort) => new RewritePapersUseCase(agent, logger),
);

const publishDigestUseCaseFactory = Injectable(
    'PublishDigest',
    ['Presenters', 'Notifiers', 'Logger'] as const,
    (
        presenters: ReturnType<typeof presentersFactory>,
        notifiers: NotifierPort[],
        logger: LoggerPort,
    ) => new PublishDigestUseCase(presenters.rich, presenters.plain, notifiers, logger),
);

/**
 * Task factories
 */
const tasksFactory = Injectable(
    'Tasks',
    [
        'News',
        'Papers',
        'TextRewriteAgent',
        'RewriteStories',
        'RewritePapers',
        'PublishDigest',
        'Configuration',
        'Logger',
    ] as const,
    (
        news: NewsProviderPort,
        papers: PaperProviderPort,
        agent: TextRewriteAgentPort,
        rewriteStories: RewriteStoriesUseCase,
        rewritePapers: RewritePapersUseCase,
        publishDigest: PublishDigestUseCase,
        configuration: ConfigurationPort,
        logger: LoggerPort,
    ): TaskPort[] => {
        const { sources, tasks } = configuration.getInboundConfiguration();

        return [
            new DailyDigestTask(
                news,
                papers,
                agent,
                rewriteStories,
                rewritePapers,
                publishDigest,
                sources,
                tasks.dailyDigest,
                logger,
            ),
        ];
    },
);

/**
 * Inbound adapters
 */
const configurationFactory = (overrides?: ContainerOverrides) =>
    Injectable(
        'Configuration',
        (): ConfigurationPort => new NodeConfig(nodeConfiguration, overrides),
    );

const workerFactory = Injectable(
    'Worker',
    ['Configuration', 'Logger', 'Tasks'] as const,
    (config: ConfigurationPort, logger: LoggerPort, tasks: TaskPort[]): WorkerPort => {
        const { report, tasks: tasksConfiguration } = config.getInboundConfiguration();

        if (tasksConfiguration.dailyDigest.schedule) {
            logger.info('Initializing Worker', { implementation: 'NodeCron' });
            return new NodeCronAdapter(logger, tasks, report.timezone);
        }

        logger.info('Initializing Worker', { implementation: 'Immediate' });
        return new ImmediateAdapter(logger, tasks);
    },
);

/**
 * Container configuration
 */
export type ContainerOverrides = ConfigurationOverrides;

export const createContainer = (overrides?: ContainerOverrides) =>
    Container
        // Outbound adapters
        .provides(configurationFactory(overrides))
        .provides(loggerFactory)
        .provides(newsFactory)
        .provides(papersFactory)
        .provides(modelsFactory)
        .provides(textRewriteAgentFactory)
        .provides(notifiersFactory)
        // Use cases
        .provides(presentersFactory)
        .provides(rewriteStoriesUseCaseFactory)
        .provides(rewritePapersUseCaseFactory)
        .provides(publishDigestUseCaseFactory)
        // Tasks
        .provides(tasksFactory)
        // Inbound adapters
        .provides(workerFactory);
