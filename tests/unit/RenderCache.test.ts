import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ArtifactLoader } from '../../src/drift/runner/ArtifactLoader.js';
import { RenderCache } from '../../src/drift/runner/RenderCache.js';
import type { RenderResult, Renderer } from '../../src/drift/types.js';
import { ConfigurationError, RenderError } from '../../src/shared/errors.js';
import { FakeSiteRenderer } from '../helpers/fakes.js';

describe('RenderCache', () => {
    it('should render each (locale, address) once', async () => {
        const inner = new FakeSiteRenderer();
        const cache = new RenderCache(inner);

        const [first, second] = await Promise.all([
            cache.render('https://example.com/en/', 'en'),
            cache.render('https://example.com/en/', 'en')
        ]);
        await cache.render('https://example.com/fr/', 'fr');

        expect(first).toBe(second);
        expect(inner.calls).toHaveLength(2);
        expect(cache.size).toBe(2);
    });

    it('should keep device profiles apart', async () => {
        const inner = new FakeSiteRenderer();
        const cache = new RenderCache(inner);
        const profile = { name: 'Pixel 7', viewport: { width: 412, height: 915 } };

        await cache.render('https://example.com/en/', 'en');
        await cache.render('https://example.com/en/', 'en', profile);

        expect(inner.calls.map(c => c.profile)).toEqual([undefined, 'Pixel 7']);
    });

    it('should pass renders in other locales straight through', async () => {
        const inner = new FakeSiteRenderer();
        const cache = new RenderCache(inner, { locales: ['en'] });

        await cache.render('https://example.com/fr/', 'fr');
        await cache.render('https://example.com/fr/', 'fr');
        await cache.render('https://example.com/en/', 'en');

        expect(inner.calls.map(c => c.locale)).toEqual(['fr', 'fr', 'en']);
        expect(cache.size).toBe(1);
    });

    it('should render again after a release', async () => {
        const inner = new FakeSiteRenderer();
        const cache = new RenderCache(inner);

        await cache.render('https://example.com/en/', 'en');
        cache.release('https://example.com/en/', 'en');
        expect(cache.size).toBe(0);

        await cache.render('https://example.com/en/', 'en');
        expect(inner.calls).toHaveLength(2);
    });

    it('should forget failed renders', async () => {
        let attempts = 0;
        const flaky: Renderer = {
            render: async (address): Promise<RenderResult> => {
                if (++attempts === 1) throw new RenderError(address, 'socket hang up');
                return { image: Buffer.from('ok'), links: [] };
            }
        };
        const cache = new RenderCache(flaky);

        await expect(cache.render('https://example.com/en/', 'en')).rejects.toThrow('socket hang up');
        expect(cache.size).toBe(0);

        const result = await cache.render('https://example.com/en/', 'en');
        expect(result.image.toString()).toBe('ok');
        expect(attempts).toBe(2);
    });
});

describe('ArtifactLoader', () => {
    let dir: string | undefined;

    afterEach(() => {
        if (dir) fs.rmSync(dir, { recursive: true, force: true });
        dir = undefined;
    });

    it('should read file artifacts from disk', async () => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'drift-loader-'));
        const file = path.join(dir, 'a.png');
        fs.writeFileSync(file, 'png-bytes');

        const bytes = await new ArtifactLoader().load({ kind: 'file', path: file, locale: 'en', name: 'a.png' });

        expect(bytes.toString()).toBe('png-bytes');
    });

    it('should wrap unreadable files in RenderError', async () => {
        const loader = new ArtifactLoader();

        await expect(loader.load({ kind: 'file', path: path.join(os.tmpdir(), 'no-such-dir-xyz', 'a.png'), locale: 'en', name: 'a.png' }))
            .rejects.toThrow(RenderError);
    });

    it('should render page artifacts', async () => {
        const renderer = new FakeSiteRenderer();

        const bytes = await new ArtifactLoader(renderer).load({
            kind: 'page',
            address: 'https://example.com/fr/',
            locale: 'fr',
            name: 'index.png'
        });

        expect(bytes.toString()).toBe('png:https://example.com/fr/');
        expect(renderer.calls).toEqual([{ address: 'https://example.com/fr/', locale: 'fr', profile: undefined }]);
    });

    it('should refuse page artifacts without a renderer', async () => {
        await expect(new ArtifactLoader().load({ kind: 'page', address: 'https://example.com/fr/', locale: 'fr', name: 'index.png' }))
            .rejects.toThrow(ConfigurationError);
    });
});
