// Domain
import { type PaperItem } from '../../../domain/entities/paper-item.entity.js';

// Ports
import { type TextRewriteAgentPort } from '../../ports/outbound/agents/text-rewrite.agent.js';
import { type LoggerPort } from '../../ports/outbound/logging/logger.port.js';

/**
 * Use case for translating paper titles and abstracts
 */
export class RewritePapersUseCase {
    constructor(
        private readonly textRewriteAgent: TextRewriteAgentPort,
        private readonly logger: LoggerPort,
    ) {}

    /**
     * Titles and abstracts travel interleaved in one batch, so a rejected batch
     * leaves every paper untouched.
     */
    public async execute(papers: PaperItem[]): Promise<PaperItem[]> {
        if (papers.length === 0) {
            return papers;
        }

        this.logger.info('Translating papers', { count: papers.length });

        const texts = papers.flatMap((paper) => [paper.title, paper.summary]);
        const batch = await this.textRewriteAgent.rewriteBatch(texts, 'translate');

        if (!batch.rewritten) {
            return papers;
        }

        return papers.map((paper, index) =>
            paper.withRewrite({
                summary: batch.texts[index * 2 + 1],
                title: batch.texts[index * 2],
            }),
        );
    }
}
