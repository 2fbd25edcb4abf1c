import { z } from 'zod/v4';

import { PaperCategory } from '../value-objects/paper-category.vo.js';

export const paperItemSchema = z.object({
    category: z.instanceof(PaperCategory).describe('Primary taxonomy category of the paper.'),
    summary: z.string().describe('Abstract with whitespace collapsed.'),
    title: z.string().min(1).describe('Title with whitespace collapsed.'),
    translatedSummary: z.string().optional().describe('Abstract rewritten into the target language.'),
    translatedTitle: z.string().optional().describe('Title rewritten into the target language.'),
    url: z.string().describe('Abstract page of the paper.'),
});

export type PaperItemProps = z.input<typeof paperItemSchema>;

/**
 * @description A recently submitted paper from the academic feed
 */
export class PaperItem {
    public readonly category: PaperCategory;
    public readonly summary: string;
    public readonly title: string;
    public readonly translatedSummary?: string;
    public readonly translatedTitle?: string;
    public readonly url: string;

    public constructor(data: PaperItemProps) {
        const result = paperItemSchema.safeParse(data);

        if (!result.success) {
            throw new Error(`Invalid paper item data: ${result.error.message}`);
        }

        const validatedData = result.data;
        this.title = validatedData.title;
        this.summary = validatedData.summary;
        this.url = validatedData.url;
        this.category = validatedData.category;
        this.translatedTitle = validatedData.translatedTitle;
        this.translatedSummary = validatedData.translatedSummary;
    }

    public displaySummary(): string {
        return this.translatedSummary ?? this.summary;
    }

    public displayTitle(): string {
        return this.translatedTitle ?? this.title;
    }

    public withRewrite(rewrite: { summary?: string; title?: string }): PaperItem {
        return new PaperItem({
            category: this.category,
            summary: this.summary,
            title: this.title,
            translatedSummary: rewrite.summary ?? this.translatedSummary,
            translatedTitle: rewrite.title ?? this.translatedTitle,
            url: this.url,
        });
    }
}
