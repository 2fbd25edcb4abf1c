// Domain
import { type NewsItem } from '../../../domain/entities/news-item.entity.js';

// Ports
import { type TextRewriteAgentPort } from '../../ports/outbound/agents/text-rewrite.agent.js';
import { type LoggerPort } from '../../ports/outbound/logging/logger.port.js';

/**
 * Use case for translating story titles and generating a one-line description of each
 */
export class RewriteStoriesUseCase {
    constructor(
        private readonly textRewriteAgent: TextRewriteAgentPort,
        private readonly logger: LoggerPort,
    ) {}

    /**
     * Titles and descriptions are two independent batches: one failing leaves the other intact
     */
    public async execute(stories: NewsItem[]): Promise<NewsItem[]> {
        if (stories.length === 0) {
            return stories;
        }

        const titles = stories.map((story) => story.title);

        this.logger.info('Translating story titles', { count: stories.length });
        const translatedTitles = await this.textRewriteAgent.rewriteBatch(titles, 'translate');

        this.logger.info('Generating story descriptions', { count: stories.length });
        const summaries = await this.textRewriteAgent.rewriteBatch(titles, 'summarize');

        return stories.map((story, index) =>
            story.withRewrite({
                summary: summaries.rewritten ? summaries.texts[index] : undefined,
                title: translatedTitles.rewritten ? translatedTitles.texts[index] : undefined,
            }),
        );
    }
}
