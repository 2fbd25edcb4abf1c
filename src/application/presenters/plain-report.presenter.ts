// Domain
import { type NewsItem } from '../../domain/entities/news-item.entity.js';
import { type PaperItem } from '../../domain/entities/paper-item.entity.js';

import {
    formatInTimezone,
    REPORT_DATE_FORMAT,
    REPORT_TIME_FORMAT,
} from '../../shared/date/timezone.js';
import { REPORT_LABELS, reportTitle } from './report-labels.js';

/**
 * Plain text report with raw links, pushed to Telegram.
 * Unlike the rich report, an empty section is left out entirely.
 */
export class PlainReportPresenter {
    constructor(private readonly timezone?: string) {}

    public format(stories: NewsItem[], papers: PaperItem[], now: Date = new Date()): string {
        const lines = [
            `📰 ${reportTitle(formatInTimezone(now, REPORT_DATE_FORMAT, this.timezone))}`,
            '',
        ];

        if (stories.length > 0) {
            lines.push(REPORT_LABELS.newsHeading, '');
            stories.forEach((story, index) => {
                lines.push(`${index + 1}. ${story.displayTitle()}`);
                if (story.translatedSummary !== undefined) {
                    lines.push(`   📝 ${story.translatedSummary}`);
                }
                lines.push(`   👍${story.score}人点赞 💬${story.commentCount}条评论`);
                lines.push(`   ${story.url}`, '');
            });
        }

        if (papers.length > 0) {
            lines.push(REPORT_LABELS.papersHeading, '');
            papers.forEach((paper, index) => {
                lines.push(`${index + 1}. 【${paper.category.label()}】${paper.displayTitle()}`);
                lines.push(`   ${paper.url}`, '');
            });
        }

        lines.push('📌 数据来源：Hacker News 社区 + ArXiv 学术平台');
        lines.push(`⏰ 生成时间: ${formatInTimezone(now, REPORT_TIME_FORMAT, this.timezone)}`);

        return lines.join('\n');
    }
}
