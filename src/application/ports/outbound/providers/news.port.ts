// Domain
import { type NewsItem } from '../../../../domain/entities/news-item.entity.js';

/**
 * News provider port - fetches the currently top ranked stories
 */
export interface NewsProviderPort {
    /**
     * Fetch up to `limit` stories. Resolves to an empty list on failure, never rejects.
     */
    fetchNews(limit: number): Promise<NewsItem[]>;
}
