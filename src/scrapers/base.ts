/**
 * Abstract base class for page fetchers
 */

export interface FetchOptions {
    limit: number;
    signal?: AbortSignal;
}

export abstract class PageFetcher {
    abstract name: string;

    /**
     * Fetch post candidates for a profile, in the order the page lists them.
     * Candidates are unvalidated; the pipeline runs them through parseRawPost.
     * @param handle Normalized profile handle
     * @throws FetchError on network or navigation failure
     */
    abstract fetchPosts(handle: string, options: FetchOptions): Promise<unknown[]>;

    /**
     * Validate that the fetcher is properly configured
     */
    abstract isConfigured(): boolean;

    /**
     * Release the browser session, if any
     */
    async close(): Promise<void> { }
}
