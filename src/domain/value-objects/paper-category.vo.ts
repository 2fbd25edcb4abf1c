import { z } from 'zod/v4';

export const DEFAULT_PAPER_CATEGORY = 'cs.AI';

/**
 * Display labels of the arXiv taxonomy codes the digest follows
 */
export const PAPER_CATEGORY_LABELS: Readonly<Record<string, string>> = {
    'cs.AI': '人工智能',
    'cs.CL': '自然语言处理',
    'cs.CV': '计算机视觉',
    'cs.IR': '信息检索',
    'cs.LG': '机器学习',
    'cs.NE': '神经网络',
    'cs.RO': '机器人',
    'stat.ML': '统计机器学习',
};

export const paperCategorySchema = z
    .string()
    .trim()
    .describe('An arXiv taxonomy code such as cs.AI or stat.ML.');

export class PaperCategory {
    public readonly value: string;

    constructor(code: string) {
        const result = paperCategorySchema.safeParse(code);

        if (!result.success || result.data.length === 0) {
            this.value = DEFAULT_PAPER_CATEGORY;
        } else {
            this.value = result.data;
        }
    }

    /**
     * Human readable label, or the raw code when the taxonomy entry is unknown
     */
    public label(): string {
        return PAPER_CATEGORY_LABELS[this.value] ?? this.value;
    }

    public toString(): string {
        return this.value;
    }
}
