/**
 * A rendered digest, ready to be pushed
 */
export interface Digest {
    plain: string;
    rich: string;
    title: string;
}

/**
 * Notifier port - delivers a digest to one push channel
 */
export interface NotifierPort {
    readonly name: string;

    /**
     * Resolves to true when the channel accepted the digest. Never rejects.
     */
    send(digest: Digest): Promise<boolean>;
}
