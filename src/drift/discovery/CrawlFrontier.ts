import type { CanonicalPage } from '../types.js';

/**
 * Single owner of crawl state: the FIFO frontier and the visited set.
 *
 * A page is marked visited when it is first discovered, so it enters the
 * frontier at most once. `isFull()` turns true when the visited set reaches
 * the page cap; no further page is accepted after that.
 */
export class CrawlFrontier {
    private queue: CanonicalPage[] = [];
    private visited = new Set<CanonicalPage>();

    constructor(
        private readonly maxPages: number,
        private log: (msg: string) => void = () => undefined
    ) { }

    /**
     * Record a newly seen page. Returns false for duplicates and once the cap is hit.
     */
    public offer(page: CanonicalPage): boolean {
        if (this.visited.has(page) || this.isFull()) return false;

        this.visited.add(page);
        this.queue.push(page);
        if (this.isFull()) {
            this.log(`[CrawlFrontier] Page cap reached (${this.maxPages})`);
        }
        return true;
    }

    /**
     * Remove and return every page currently waiting, in FIFO order.
     */
    public takeLevel(): CanonicalPage[] {
        const level = this.queue;
        this.queue = [];
        return level;
    }

    public isVisited(page: CanonicalPage): boolean {
        return this.visited.has(page);
    }

    public isFull(): boolean {
        return this.visited.size >= this.maxPages;
    }

    public getQueueLength(): number { return this.queue.length; }
    public getVisitedCount(): number { return this.visited.size; }

    /** Visited pages in insertion (BFS) order */
    public getVisited(): CanonicalPage[] {
        return [...this.visited];
    }
}
