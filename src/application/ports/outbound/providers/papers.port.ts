// Domain
import { type PaperItem } from '../../../../domain/entities/paper-item.entity.js';

/**
 * Paper provider port - fetches the most recently submitted papers of some categories
 */
export interface PaperProviderPort {
    /**
     * Fetch up to `limit` papers from any of `categories`. Resolves to an empty list on failure.
     */
    fetchPapers(categories: string[], limit: number): Promise<PaperItem[]>;
}
