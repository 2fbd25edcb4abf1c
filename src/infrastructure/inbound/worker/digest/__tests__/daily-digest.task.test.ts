import { beforeEach, describe, expect, test } from 'vitest';
import { mock, type MockProxy } from 'vitest-mock-extended';

// Application
import { type TextRewriteAgentPort } from '../../../../../application/ports/outbound/agents/text-rewrite.agent.js';
import { type LoggerPort } from '../../../../../application/ports/outbound/logging/logger.port.js';
import { type NewsProviderPort } from '../../../../../application/ports/outbound/providers/news.port.js';
import { type PaperProviderPort } from '../../../../../application/ports/outbound/providers/papers.port.js';
import { type PublishDigestUseCase } from '../../../../../application/use-cases/digest/publish-digest.use-case.js';
import { type RewritePapersUseCase } from '../../../../../application/use-cases/digest/rewrite-papers.use-case.js';
import { type RewriteStoriesUseCase } from '../../../../../application/use-cases/digest/rewrite-stories.use-case.js';

// Domain
import { getMockNewsItems } from '../../../../../domain/entities/__mocks__/news-items.mock.js';
import { getMockPaperItems } from '../../../../../domain/entities/__mocks__/paper-items.mock.js';

import { DailyDigestTask } from '../daily-digest.task.js';

describe('DailyDigestTask', () => {
    const sources = {
        arxiv: { categories: ['cs.AI', 'cs.CL'], limit: 3 },
        hackerNews: { limit: 7 },
    };

    let newsProvider: MockProxy<NewsProviderPort>;
    let paperProvider: MockProxy<PaperProviderPort>;
    let textRewriteAgent: MockProxy<TextRewriteAgentPort>;
    let rewriteStories: MockProxy<RewriteStoriesUseCase>;
    let rewritePapers: MockProxy<RewritePapersUseCase>;
    let publishDigest: MockProxy<PublishDigestUseCase>;
    let task: DailyDigestTask;

    const stories = getMockNewsItems(2);
    const papers = getMockPaperItems(1);

    beforeEach(() => {
        newsProvider = mock<NewsProviderPort>();
        paperProvider = mock<PaperProviderPort>();
        textRewriteAgent = mock<TextRewriteAgentPort>();
        rewriteStories = mock<RewriteStoriesUseCase>();
        rewritePapers = mock<RewritePapersUseCase>();
        publishDigest = mock<PublishDigestUseCase>();

        newsProvider.fetchNews.mockResolvedValue(stories);
        paperProvider.fetchPapers.mockResolvedValue(papers);
        publishDigest.execute.mockResolvedValue([{ delivered: true, notifier: 'telegram' }]);

        task = new DailyDigestTask(
            newsProvider,
            paperProvider,
            textRewriteAgent,
            rewriteStories,
            rewritePapers,
            publishDigest,
            sources,
            { schedule: '0 8 * * *' },
            mock<LoggerPort>(),
        );
    });

    test('should expose its schedule and run on startup', () => {
        expect(task.name).toBe('daily-digest');
        expect(task.schedule).toBe('0 8 * * *');
        expect(task.executeOnStartup).toBe(true);
    });

    test('should fetch, rewrite and publish when a provider is available', async () => {
        // Given - an available rewrite agent
        const rewrittenStories = stories.map((story) => story.withRewrite({ title: '译' }));
        const rewrittenPapers = papers.map((paper) => paper.withRewrite({ title: '译' }));
        textRewriteAgent.isAvailable.mockReturnValue(true);
        rewriteStories.execute.mockResolvedValue(rewrittenStories);
        rewritePapers.execute.mockResolvedValue(rewrittenPapers);

        // When - running the task
        await task.execute();

        // Then - sources are queried with the configured limits
        expect(newsProvider.fetchNews).toHaveBeenCalledWith(7);
        expect(paperProvider.fetchPapers).toHaveBeenCalledWith(['cs.AI', 'cs.CL'], 3);

        // And - availability is checked once for the whole run
        expect(textRewriteAgent.isAvailable).toHaveBeenCalledTimes(1);

        // And - the rewritten content is published
        expect(rewriteStories.execute).toHaveBeenCalledWith(stories);
        expect(rewritePapers.execute).toHaveBeenCalledWith(papers);
        expect(publishDigest.execute).toHaveBeenCalledWith(rewrittenStories, rewrittenPapers);
    });

    test('should publish the originals when no provider is configured', async () => {
        // Given - no rewrite provider
        textRewriteAgent.isAvailable.mockReturnValue(false);

        // When - running the task
        await task.execute();

        // Then - the rewrite steps are skipped
        expect(rewriteStories.execute).not.toHaveBeenCalled();
        expect(rewritePapers.execute).not.toHaveBeenCalled();
        expect(publishDigest.execute).toHaveBeenCalledWith(stories, papers);
    });

    test('should publish an empty digest when both sources are empty', async () => {
        // Given - sources returning nothing
        newsProvider.fetchNews.mockResolvedValue([]);
        paperProvider.fetchPapers.mockResolvedValue([]);
        textRewriteAgent.isAvailable.mockReturnValue(false);

        // When - running the task
        await task.execute();

        // Then - the digest is still pushed
        expect(publishDigest.execute).toHaveBeenCalledWith([], []);
    });
});
