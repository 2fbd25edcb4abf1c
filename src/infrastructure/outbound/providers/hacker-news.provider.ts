import { z } from 'zod/v4';

// Application
import { type LoggerPort } from '../../../application/ports/outbound/logging/logger.port.js';
import { type NewsProviderPort } from '../../../application/ports/outbound/providers/news.port.js';

// Domain
import { NewsItem } from '../../../domain/entities/news-item.entity.js';

// Constants
const API_BASE_URL = 'https://hacker-news.firebaseio.com/v0';
const TOP_STORIES_ENDPOINT = '/topstories.json';
const DISCUSSION_BASE_URL = 'https://news.ycombinator.com/item?id=';
const TOP_STORIES_TIMEOUT_MS = 10_000;
const ITEM_TIMEOUT_MS = 5_000;

// Schemas
const topStoriesSchema = z.array(z.number().int());

const hackerNewsItemSchema = z
    .object({
        descendants: z.number().int().min(0).optional(),
        score: z.number().int().min(0).optional(),
        title: z.string().optional(),
        url: z.string().optional(),
    })
    .nullable();

export class HackerNews implements NewsProviderPort {
    constructor(private readonly logger: LoggerPort) {}

    public async fetchNews(limit: number): Promise<NewsItem[]> {
        try {
            this.logger.debug('Fetching top stories from Hacker News', { limit });

            const ids = await this.fetchTopStoryIds(limit);
            const stories: NewsItem[] = [];

            for (const id of ids) {
                const story = await this.fetchStory(id);
                if (story) {
                    stories.push(story);
                }
            }

            this.logger.info('Successfully fetched stories from Hacker News', {
                requested: ids.length,
                storyCount: stories.length,
            });
            return stories;
        } catch (error) {
            this.logger.error('Failed to fetch stories from Hacker News', { error, limit });
            return [];
        }
    }

    private async fetchTopStoryIds(limit: number): Promise<number[]> {
        const data = await this.getJson(
            `${API_BASE_URL}${TOP_STORIES_ENDPOINT}`,
            TOP_STORIES_TIMEOUT_MS,
        );
        return topStoriesSchema.parse(data).slice(0, limit);
    }

    /**
     * A single story failing is skipped, it never fails the whole ranking
     */
    private async fetchStory(id: number): Promise<NewsItem | null> {
        try {
            const data = await this.getJson(`${API_BASE_URL}/item/${id}.json`, ITEM_TIMEOUT_MS);
            const item = hackerNewsItemSchema.parse(data);

            if (!item?.title) {
                return null;
            }

            return new NewsItem({
                commentCount: item.descendants ?? 0,
                score: item.score ?? 0,
                title: item.title,
                url: item.url || `${DISCUSSION_BASE_URL}${id}`,
            });
        } catch (error) {
            this.logger.warn('Failed to fetch Hacker News story', { error, id });
            return null;
        }
    }

    private async getJson(url: string, timeoutMs: number): Promise<unknown> {
        const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });

        if (!response.ok) {
            throw new Error(`API request failed: ${response.status} ${response.statusText}`);
        }

        return response.json();
    }
}
