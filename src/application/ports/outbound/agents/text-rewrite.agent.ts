/**
 * @description
 * What a batch asks the model for: a translation of each text,
 * or a short generated description of each title
 */
export type RewriteTask = 'summarize' | 'translate';

/**
 * @description
 * Outcome of a batch. `texts` always has the length of the request;
 * when `rewritten` is false it holds the original input.
 */
export interface RewriteBatch {
    rewritten: boolean;
    texts: string[];
}

/**
 * @description
 * Port for the agent rewriting numbered batches of texts through a remote language model
 */
export interface TextRewriteAgentPort {
    /**
     * Whether any text-generation provider is configured
     */
    isAvailable(): boolean;

    rewriteBatch(texts: string[], task?: RewriteTask): Promise<RewriteBatch>;
}
