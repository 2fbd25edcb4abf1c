import { PaperCategory } from '../../value-objects/paper-category.vo.js';
import { PaperItem } from '../paper-item.entity.js';

const CATEGORIES = ['cs.AI', 'cs.LG', 'cs.CL'];

/**
 * Creates paper items with predictable titles: "Paper 1", "Paper 2", ...
 */
export function getMockPaperItems(count: number): PaperItem[] {
    return Array.from(
        { length: count },
        (_, index) =>
            new PaperItem({
                category: new PaperCategory(CATEGORIES[index % CATEGORIES.length] ?? 'cs.AI'),
                summary: `Abstract of paper ${index + 1}.`,
                title: `Paper ${index + 1}`,
                url: `http://arxiv.org/abs/2501.0000${index + 1}v1`,
            }),
    );
}
