/**
 * LocalePathResolver
 *
 * Maps a canonical page plus a locale code to the concrete address to
 * capture, and back. Two conventions are supported:
 *
 * - url-prefix:      https://example.com/<locale>/pricing  <->  /pricing
 * - directory-token: pixel7-34-fr-portrait/home.png        <->  pixel7-34-portrait/home.png
 *
 * For every canonical page p and known locale l,
 * canonicalize(resolve(p, l)) returns { page: p, locale: l }.
 */

import { MalformedAddressError } from '../../shared/errors.js';
import { NAMING } from '../config/constants.js';
import type { CanonicalAddress, CanonicalPage, LocaleVariant } from '../types.js';
import { formatRunName, parseRunName } from './RunNameParser.js';

export type LocaleConvention =
    | { kind: 'url-prefix'; baseUrl: string; locales: string[] }
    | { kind: 'directory-token' };

export class LocalePathResolver {
    private readonly origin: string = '';
    private readonly basePath: string = '';
    private readonly locales = new Set<string>();

    constructor(private readonly convention: LocaleConvention) {
        if (convention.kind === 'url-prefix') {
            const base = parseHttpUrl(convention.baseUrl);
            if (!base) throw new MalformedAddressError(convention.baseUrl, 'base URL must be an absolute http(s) URL');

            this.origin = base.origin;
            this.basePath = trimTrailingSlash(base.pathname);
            convention.locales.forEach(locale => this.locales.add(locale));
        }
    }

    get kind(): LocaleConvention['kind'] {
        return this.convention.kind;
    }

    /** Origin that in-scope links must share (url-prefix only) */
    get scopeOrigin(): string {
        return this.origin;
    }

    resolve(page: CanonicalPage, locale: string): string {
        return this.convention.kind === 'url-prefix'
            ? this.resolveUrl(page, locale)
            : this.resolveDirectory(page, locale);
    }

    canonicalize(address: string): CanonicalAddress {
        return this.convention.kind === 'url-prefix'
            ? this.canonicalizeUrl(address)
            : this.canonicalizeDirectory(address);
    }

    variant(page: CanonicalPage, locale: string): LocaleVariant {
        return { page, locale, address: this.resolve(page, locale) };
    }

    private resolveUrl(page: CanonicalPage, locale: string): string {
        if (!this.locales.has(locale)) {
            throw new MalformedAddressError(page, `unknown locale "${locale}"`);
        }
        if (!page.startsWith('/') || /[?#]/.test(page) || (page.length > 1 && page.endsWith('/'))) {
            throw new MalformedAddressError(page, 'not a canonical page path');
        }
        return `${this.origin}${this.basePath}/${locale}${page}`;
    }

    private canonicalizeUrl(address: string): CanonicalAddress {
        const url = parseHttpUrl(address);
        if (!url) throw new MalformedAddressError(address, 'not an absolute http(s) URL');
        if (url.origin !== this.origin) throw new MalformedAddressError(address, `outside ${this.origin}`);

        let rest = url.pathname;
        if (this.basePath) {
            if (rest !== this.basePath && !rest.startsWith(`${this.basePath}/`)) {
                throw new MalformedAddressError(address, `outside base path ${this.basePath}`);
            }
            rest = rest.slice(this.basePath.length);
        }
        rest = trimTrailingSlash(rest) || '/';

        const segments = rest.split('/');
        const first = segments[1];
        if (first && this.locales.has(first)) {
            return { page: `/${segments.slice(2).join('/')}`, locale: first };
        }
        return { page: rest, locale: null };
    }

    private resolveDirectory(page: CanonicalPage, locale: string): string {
        if (!locale || locale.includes(NAMING.RUN_NAME_DELIMITER) || locale.includes('/')) {
            throw new MalformedAddressError(page, `locale "${locale}" cannot be embedded in a run name`);
        }
        const { head, tail } = splitFirstSegment(page);
        const runName = formatRunName(head, locale);
        if (!runName) {
            throw new MalformedAddressError(page, `"${head}" is not a <model>-<platformVersion>-<orientation> group key`);
        }
        return tail ? `${runName}/${tail}` : runName;
    }

    private canonicalizeDirectory(address: string): CanonicalAddress {
        const { head, tail } = splitFirstSegment(address);
        const parsed = parseRunName(head);
        if (!parsed.ok) throw new MalformedAddressError(address, parsed.reason);

        return {
            page: tail ? `${parsed.groupKey}/${tail}` : parsed.groupKey,
            locale: parsed.locale
        };
    }
}

/**
 * File-system friendly name for a page path: `/` -> `index`, `/about/team` -> `about_team`.
 */
export function pageFileName(page: CanonicalPage): string {
    const trimmed = page.replace(/^\/+|\/+$/g, '');
    return trimmed ? trimmed.replace(/\//g, '_') : 'index';
}

function parseHttpUrl(value: string): URL | null {
    try {
        const url = new URL(value);
        return url.protocol === 'http:' || url.protocol === 'https:' ? url : null;
    } catch {
        return null;
    }
}

function trimTrailingSlash(pathname: string): string {
    return pathname.length > 1 ? pathname.replace(/\/+$/, '') : pathname === '/' ? '' : pathname;
}

function splitFirstSegment(address: string): { head: string; tail: string } {
    const normalized = address.replace(/\\/g, '/').replace(/^\/+/, '');
    const slash = normalized.indexOf('/');
    return slash === -1
        ? { head: normalized, tail: '' }
        : { head: normalized.slice(0, slash), tail: normalized.slice(slash + 1) };
}
