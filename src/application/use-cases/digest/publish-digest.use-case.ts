// Application
import { type PlainReportPresenter } from '../../presenters/plain-report.presenter.js';
import { type RichReportPresenter } from '../../presenters/rich-report.presenter.js';

// Domain
import { type NewsItem } from '../../../domain/entities/news-item.entity.js';
import { type PaperItem } from '../../../domain/entities/paper-item.entity.js';

// Ports
import { type LoggerPort } from '../../ports/outbound/logging/logger.port.js';
import { type Digest, type NotifierPort } from '../../ports/outbound/notifiers/notifier.port.js';

export interface PublishDigestResult {
    delivered: boolean;
    notifier: string;
}

/**
 * Use case for rendering the digest and pushing it to every configured channel
 */
export class PublishDigestUseCase {
    constructor(
        private readonly richPresenter: RichReportPresenter,
        private readonly plainPresenter: PlainReportPresenter,
        private readonly notifiers: NotifierPort[],
        private readonly logger: LoggerPort,
    ) {}

    public async execute(
        stories: NewsItem[],
        papers: PaperItem[],
        now: Date = new Date(),
    ): Promise<PublishDigestResult[]> {
        const digest: Digest = {
            plain: this.plainPresenter.format(stories, papers, now),
            rich: this.richPresenter.format(stories, papers, now),
            title: this.richPresenter.title(now),
        };

        this.logger.info('Digest rendered', {
            paperCount: papers.length,
            storyCount: stories.length,
            title: digest.title,
        });

        // Every channel is attempted, whatever happened to the previous one
        const results: PublishDigestResult[] = [];
        for (const notifier of this.notifiers) {
            const delivered = await notifier.send(digest);
            results.push({ delivered, notifier: notifier.name });
        }

        this.logger.info('Digest published', {
            delivered: results.filter((result) => result.delivered).length,
            notifiers: results.length,
        });

        return results;
    }
}
