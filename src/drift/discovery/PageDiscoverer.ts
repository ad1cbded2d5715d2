/**
 * PageDiscoverer
 *
 * Breadth-first crawl of the source-locale link graph. Target-locale pages
 * are never crawled: they are derived from the discovered canonical pages
 * through the LocalePathResolver.
 */

import { ConfigurationError, MalformedAddressError, errorMessage } from '../../shared/errors.js';
import { ErrorHandler, ErrorSeverity } from '../../shared/utils/ErrorHandler.js';
import type { LocalePathResolver } from '../locale/LocalePathResolver.js';
import { mapPool } from '../runner/WorkerPool.js';
import type { CanonicalPage, CrawlDiscovery, DeviceProfile, DiscoveryFailure, Renderer } from '../types.js';
import { CrawlFrontier } from './CrawlFrontier.js';

export interface PageDiscovererOptions {
    resolver: LocalePathResolver;
    renderer: Renderer;
    sourceLocale: string;
    /** Pages of one BFS level rendered at the same time */
    concurrency?: number;
    profile?: DeviceProfile;
    signal?: AbortSignal;
    log?: (msg: string) => void;
}

interface VisitResult {
    page: CanonicalPage;
    address: string;
    links: string[];
    error?: string;
}

export class PageDiscoverer {
    private log: (msg: string) => void;

    constructor(private options: PageDiscovererOptions) {
        if (options.resolver.kind !== 'url-prefix') {
            throw new ConfigurationError('PageDiscoverer needs a url-prefix locale convention');
        }
        this.log = options.log ?? ((msg) => console.log(msg));
    }

    async discover(rootAddress: string, maxPages: number): Promise<CrawlDiscovery> {
        if (!Number.isInteger(maxPages) || maxPages < 1) {
            throw new ConfigurationError(`maxPages must be a positive integer, got ${maxPages}`);
        }

        const root = this.canonicalizeRoot(rootAddress);
        const frontier = new CrawlFrontier(maxPages, this.log);
        const failures: DiscoveryFailure[] = [];
        frontier.offer(root);

        this.log(`[PageDiscoverer] Crawling ${rootAddress} (source: ${this.options.sourceLocale}, limit: ${maxPages})`);

        let depth = 0;
        while (frontier.getQueueLength() > 0 && !frontier.isFull() && !this.options.signal?.aborted) {
            const level = frontier.takeLevel();
            this.log(`[PageDiscoverer] [D${depth}] Rendering ${level.length} page(s)`);

            // Render concurrently, merge in frontier order so BFS order stays deterministic.
            const results = await mapPool(level, this.options.concurrency ?? 1, page => this.visit(page));

            for (const result of results) {
                if (result.error) {
                    failures.push({ page: result.page, reason: result.error });
                    continue;
                }
                for (const link of result.links) {
                    const page = this.toSourcePage(link, result.address);
                    if (page !== null) frontier.offer(page);
                    if (frontier.isFull()) break;
                }
                if (frontier.isFull()) break;
            }
            depth++;
        }

        const stoppedEarly = Boolean(this.options.signal?.aborted) && frontier.getQueueLength() > 0 && !frontier.isFull();
        if (stoppedEarly) {
            this.log(`[PageDiscoverer] Stopped early: deadline reached`);
        }

        const pages = frontier.getVisited();
        this.log(`[PageDiscoverer] Discovered ${pages.length} page(s), ${failures.length} render failure(s)`);
        return { pages, failures, stoppedEarly };
    }

    private canonicalizeRoot(rootAddress: string): CanonicalPage {
        try {
            const root = this.options.resolver.canonicalize(rootAddress);
            if (root.locale !== null && root.locale !== this.options.sourceLocale) {
                this.log(`[PageDiscoverer] Root is a ${root.locale} page; crawling its ${this.options.sourceLocale} variant`);
            }
            return root.page;
        } catch (error) {
            throw new ConfigurationError(`Cannot crawl from ${rootAddress}: ${errorMessage(error)}`);
        }
    }

    private async visit(page: CanonicalPage): Promise<VisitResult> {
        const { resolver, renderer, sourceLocale, profile } = this.options;
        const address = resolver.resolve(page, sourceLocale);

        try {
            const { links } = await renderer.render(address, sourceLocale, profile);
            return { page, address, links };
        } catch (error) {
            const info = ErrorHandler.handle(
                error,
                { component: 'PageDiscoverer', operation: 'render', data: { address } },
                ErrorSeverity.WARNING
            );
            return { page, address, links: [], error: info.message };
        }
    }

    /**
     * Canonical source-locale page for an in-scope link, or null when the
     * link leaves the site, points at another locale or cannot be decomposed.
     */
    private toSourcePage(link: string, fromAddress: string): CanonicalPage | null {
        let url: URL;
        try {
            url = new URL(link, fromAddress);
        } catch {
            return null;
        }
        if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
        if (url.origin !== this.options.resolver.scopeOrigin) return null;
        url.hash = '';
        url.search = '';

        try {
            const { page, locale } = this.options.resolver.canonicalize(url.href);
            if (locale !== null && locale !== this.options.sourceLocale) return null;
            return page;
        } catch (error) {
            if (error instanceof MalformedAddressError) return null;
            throw error;
        }
    }
}
