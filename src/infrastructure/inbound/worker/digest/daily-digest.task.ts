// Configuration
import {
    type SourcesConfigurationPort,
    type TasksConfigurationPort,
} from '../../../../application/ports/inbound/configuration.port.js';

// Application
import { type TaskPort } from '../../../../application/ports/inbound/worker.port.js';
import { type TextRewriteAgentPort } from '../../../../application/ports/outbound/agents/text-rewrite.agent.js';
import { type LoggerPort } from '../../../../application/ports/outbound/logging/logger.port.js';
import { type NewsProviderPort } from '../../../../application/ports/outbound/providers/news.port.js';
import { type PaperProviderPort } from '../../../../application/ports/outbound/providers/papers.port.js';
import { type PublishDigestUseCase } from '../../../../application/use-cases/digest/publish-digest.use-case.js';
import { type RewritePapersUseCase } from '../../../../application/use-cases/digest/rewrite-papers.use-case.js';
import { type RewriteStoriesUseCase } from '../../../../application/use-cases/digest/rewrite-stories.use-case.js';

export class DailyDigestTask implements TaskPort {
    public readonly executeOnStartup = true;
    public readonly name = 'daily-digest';
    public readonly schedule?: string;

    constructor(
        private readonly newsProvider: NewsProviderPort,
        private readonly paperProvider: PaperProviderPort,
        private readonly textRewriteAgent: TextRewriteAgentPort,
        private readonly rewriteStories: RewriteStoriesUseCase,
        private readonly rewritePapers: RewritePapersUseCase,
        private readonly publishDigest: PublishDigestUseCase,
        private readonly sources: SourcesConfigurationPort,
        taskConfiguration: TasksConfigurationPort['dailyDigest'],
        private readonly logger: LoggerPort,
    ) {
        this.schedule = taskConfiguration.schedule;
    }

    async execute(): Promise<void> {
        this.logger.info('Daily digest task started');

        // Step 1: Fetch sources
        let stories = await this.newsProvider.fetchNews(this.sources.hackerNews.limit);
        this.logger.info('Stories fetched', { storyCount: stories.length });

        let papers = await this.paperProvider.fetchPapers(
            this.sources.arxiv.categories,
            this.sources.arxiv.limit,
        );
        this.logger.info('Papers fetched', { paperCount: papers.length });

        // Step 2: Rewrite into the reader's language
        if (this.textRewriteAgent.isAvailable()) {
            stories = await this.rewriteStories.execute(stories);
            papers = await this.rewritePapers.execute(papers);
            this.logger.info('Digest content rewritten');
        } else {
            this.logger.info('No text generation provider configured, skipping translation');
        }

        // Step 3: Render and push
        const results = await this.publishDigest.execute(stories, papers);

        this.logger.info('Daily digest task finished', {
            delivered: results
                .filter((result) => result.delivered)
                .map((result) => result.notifier),
            paperCount: papers.length,
            storyCount: stories.length,
        });
    }
}
