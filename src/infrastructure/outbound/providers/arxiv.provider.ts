import { load } from 'cheerio';

// Application
import { type LoggerPort } from '../../../application/ports/outbound/logging/logger.port.js';
import { type PaperProviderPort } from '../../../application/ports/outbound/providers/papers.port.js';

// Domain
import { PaperItem } from '../../../domain/entities/paper-item.entity.js';
import { PaperCategory } from '../../../domain/value-objects/paper-category.vo.js';

// Constants
const API_URL = 'http://export.arxiv.org/api/query';
const REQUEST_TIMEOUT_MS = 15_000;

/**
 * Collapses every whitespace run (line breaks included) into a single space
 */
export function normalizeWhitespace(text: string): string {
    return text.split(/\s+/).filter(Boolean).join(' ');
}

export class Arxiv implements PaperProviderPort {
    constructor(private readonly logger: LoggerPort) {}

    public async fetchPapers(categories: string[], limit: number): Promise<PaperItem[]> {
        try {
            const url = this.buildApiUrl(categories, limit);
            this.logger.debug('Fetching papers from arXiv', { categories, limit });

            const response = await fetch(url.toString(), {
                signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
            });

            if (!response.ok) {
                throw new Error(`API request failed: ${response.status} ${response.statusText}`);
            }

            const papers = this.parseFeed(await response.text());

            this.logger.info('Successfully fetched papers from arXiv', {
                categories,
                paperCount: papers.length,
            });
            return papers;
        } catch (error) {
            this.logger.error('Failed to fetch papers from arXiv', { categories, error });
            return [];
        }
    }

    private buildApiUrl(categories: string[], limit: number): URL {
        const url = new URL(API_URL);

        url.searchParams.append(
            'search_query',
            categories.map((category) => `cat:${category}`).join(' OR '),
        );
        url.searchParams.append('start', '0');
        url.searchParams.append('max_results', String(limit));
        url.searchParams.append('sortBy', 'submittedDate');
        url.searchParams.append('sortOrder', 'descending');

        return url;
    }

    private parseFeed(document: string): PaperItem[] {
        const $ = load(document, { xml: true });
        const papers: PaperItem[] = [];

        $('feed > entry').each((_, element) => {
            const entry = $(element);
            const title = entry.children('title').first();

            if (title.length === 0 || normalizeWhitespace(title.text()).length === 0) {
                return;
            }

            const summary = entry.children('summary').first();
            const id = entry.children('id').first();

            papers.push(
                new PaperItem({
                    // The first listed category is the primary one
                    category: new PaperCategory(
                        entry.children('category').first().attr('term') ?? '',
                    ),
                    summary: summary.length > 0 ? normalizeWhitespace(summary.text()) : '',
                    title: normalizeWhitespace(title.text()),
                    url: id.length > 0 ? id.text().trim() : '',
                }),
            );
        });

        return papers;
    }
}
