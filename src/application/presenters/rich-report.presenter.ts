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
 * Markdown report with headings and hyperlinks, pushed to WeChat
 */
export class RichReportPresenter {
    constructor(private readonly timezone?: string) {}

    public format(stories: NewsItem[], papers: PaperItem[], now: Date = new Date()): string {
        const lines = [
            `# 📰 ${this.title(now)}`,
            '',
            ...this.formatSection(REPORT_LABELS.newsHeading, stories, (story, position) =>
                this.formatStory(story, position),
            ),
            ...this.formatSection(REPORT_LABELS.papersHeading, papers, (paper, position) =>
                this.formatPaper(paper, position),
            ),
            '---',
            '📌 **数据来源：** 技术热点来自 Hacker News 社区，论文来自 ArXiv 学术平台',
            '',
            `⏰ *生成时间: ${formatInTimezone(now, REPORT_TIME_FORMAT, this.timezone)}*`,
        ];

        return lines.join('\n');
    }

    /**
     * Push title of the report, e.g. "AI 热点日报 (2025-03-14)"
     */
    public title(now: Date = new Date()): string {
        return reportTitle(formatInTimezone(now, REPORT_DATE_FORMAT, this.timezone));
    }

    private formatSection<T>(
        heading: string,
        items: T[],
        formatItem: (item: T, position: number) => string[],
    ): string[] {
        const lines = [`## ${heading}`];

        if (items.length === 0) {
            return [...lines, REPORT_LABELS.emptySection, ''];
        }

        lines.push('');
        items.forEach((item, index) => {
            lines.push(...formatItem(item, index + 1), '');
        });

        return lines;
    }

    private formatStory(story: NewsItem, position: number): string[] {
        return [
            `**${position}. [${story.displayTitle()}](${story.url})**`,
            ...(story.translatedSummary === undefined ? [] : [`   📝 ${story.translatedSummary}`]),
            `   👍 ${story.score}人点赞 | 💬 ${story.commentCount}条评论`,
        ];
    }

    private formatPaper(paper: PaperItem, position: number): string[] {
        return [
            `**${position}. 【${paper.category.label()}】${paper.displayTitle()}**`,
            `   ${paper.displaySummary()}`,
            `   🔗 [查看论文](${paper.url})`,
        ];
    }
}
