import { z } from 'zod/v4';

export const newsItemSchema = z.object({
    commentCount: z.number().int().min(0).describe('Number of comments on the story.'),
    score: z.number().int().min(0).describe('Points the story collected on the ranking.'),
    title: z.string().min(1).describe('Original title of the story.'),
    translatedSummary: z
        .string()
        .optional()
        .describe('One-sentence description generated from the title.'),
    translatedTitle: z.string().optional().describe('Title rewritten into the target language.'),
    url: z.string().min(1).describe('Link to the story, or to its discussion page.'),
});

export type NewsItemProps = z.input<typeof newsItemSchema>;

/**
 * @description A story taken from the tech-news ranking
 */
export class NewsItem {
    public readonly commentCount: number;
    public readonly score: number;
    public readonly title: string;
    public readonly translatedSummary?: string;
    public readonly translatedTitle?: string;
    public readonly url: string;

    public constructor(data: NewsItemProps) {
        const result = newsItemSchema.safeParse(data);

        if (!result.success) {
            throw new Error(`Invalid news item data: ${result.error.message}`);
        }

        const validatedData = result.data;
        this.title = validatedData.title;
        this.url = validatedData.url;
        this.score = validatedData.score;
        this.commentCount = validatedData.commentCount;
        this.translatedTitle = validatedData.translatedTitle;
        this.translatedSummary = validatedData.translatedSummary;
    }

    public displayTitle(): string {
        return this.translatedTitle ?? this.title;
    }

    /**
     * Returns a copy carrying the rewritten fields; fields left undefined keep their value
     */
    public withRewrite(rewrite: { summary?: string; title?: string }): NewsItem {
        return new NewsItem({
            commentCount: this.commentCount,
            score: this.score,
            title: this.title,
            translatedSummary: rewrite.summary ?? this.translatedSummary,
            translatedTitle: rewrite.title ?? this.translatedTitle,
            url: this.url,
        });
    }
}
