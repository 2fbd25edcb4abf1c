import { NewsItem } from '../news-item.entity.js';

/**
 * Creates news items with predictable titles: "Story 1", "Story 2", ...
 */
export function getMockNewsItems(count: number): NewsItem[] {
    return Array.from(
        { length: count },
        (_, index) =>
            new NewsItem({
                commentCount: (index + 1) * 10,
                score: (index + 1) * 100,
                title: `Story ${index + 1}`,
                url: `https://example.com/story-${index + 1}`,
            }),
    );
}
