/**
 * Headings and phrases shared by both report layouts
 */
export const REPORT_LABELS = {
    emptySection: '暂无数据',
    newsHeading: '🔥 技术社区热门（Hacker News）',
    papersHeading: '📚 AI 前沿论文（ArXiv）',
    title: 'AI 热点日报',
} as const;

export const reportTitle = (date: string): string => `${REPORT_LABELS.title} (${date})`;
