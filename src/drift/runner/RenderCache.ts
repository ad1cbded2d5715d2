import type { DeviceProfile, RenderResult, Renderer } from '../types.js';

export interface RenderCacheOptions {
    /** Only renders in these locales are kept; others pass straight through */
    locales?: Iterable<string>;
}

/**
 * Memoizes renders per (locale, address, profile) so a page rendered during
 * discovery is reused as the source artifact instead of being rendered again.
 * Concurrent requests for the same key share one in-flight render; a rejected
 * render is evicted so the next request tries again.
 */
export class RenderCache implements Renderer {
    private entries = new Map<string, Promise<RenderResult>>();
    private readonly locales: ReadonlySet<string> | null;

    constructor(private readonly inner: Renderer, options: RenderCacheOptions = {}) {
        this.locales = options.locales ? new Set(options.locales) : null;
    }

    render(address: string, locale: string, profile?: DeviceProfile): Promise<RenderResult> {
        if (this.locales && !this.locales.has(locale)) {
            return this.inner.render(address, locale, profile);
        }

        const key = cacheKey(address, locale, profile);
        const cached = this.entries.get(key);
        if (cached) return cached;

        const pending = this.inner.render(address, locale, profile).catch((error: unknown) => {
            this.entries.delete(key);
            throw error;
        });
        this.entries.set(key, pending);
        return pending;
    }

    /** Forget one render once nothing will read it again. */
    release(address: string, locale: string, profile?: DeviceProfile): void {
        this.entries.delete(cacheKey(address, locale, profile));
    }

    get size(): number {
        return this.entries.size;
    }

    /** Drop every cached render; the wrapped renderer stays open. */
    clear(): void {
        this.entries.clear();
    }
}

function cacheKey(address: string, locale: string, profile?: DeviceProfile): string {
    return JSON.stringify([locale, address, profile?.name ?? null]);
}
