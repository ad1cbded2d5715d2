import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { RunConfig } from '../../src/drift/config/RunConfig.js';
import { Reporter } from '../../src/drift/report/Reporter.js';
import { DriftRunner } from '../../src/drift/runner/DriftRunner.js';
import type { Finding } from '../../src/drift/types.js';
import { ConfigurationError, OracleUnavailableError } from '../../src/shared/errors.js';
import { FakeSiteRenderer, ScriptedOracle, noSleep, quietLog } from '../helpers/fakes.js';

const config: RunConfig = {
    locales: { sourceLocale: 'en', targetLocales: ['fr', 'es'] },
    concurrency: 2,
    maxPages: 20,
    retries: 2,
    backoffMs: 0,
    renderTimeoutMs: 1000
};

const clipped: Finding = { location: 'Plan card', issue: 'Price overflows the card', remediation: 'Allow the price to wrap' };

function writeRun(root: string, directory: string, files: string[]): void {
    fs.mkdirSync(path.join(root, directory), { recursive: true });
    for (const file of files) {
        fs.writeFileSync(path.join(root, directory, file), `${directory}/${file}`);
    }
}

describe('Drift flow', () => {
    let root: string;

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'drift-flow-'));
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    describe('device mode', () => {
        const screens = ['screen_001.png', 'screen_002.png', 'screen_003.png'];

        beforeEach(() => {
            writeRun(root, 'm1-29-en-portrait', screens);
            writeRun(root, 'm1-29-fr-portrait', screens);
            writeRun(root, 'm1-29-es-portrait', screens);
            fs.mkdirSync(path.join(root, 'logs'));
        });

        it('should report only the affected pair', async () => {
            const oracle = new ScriptedOracle(ctx =>
                ctx.artifactName === 'screen_003.png' && ctx.targetLocale === 'es' ? [clipped] : []
            );
            const runner = new DriftRunner({ config, oracle, sleep: noSleep, log: quietLog });

            const report = await runner.runDevice(root);

            expect(oracle.contexts).toHaveLength(6);
            expect(report.summary).toEqual({
                contexts: 1,
                pairsAnalyzed: 6,
                cleanPairs: 5,
                affectedPairs: 1,
                totalFindings: 1,
                analysisFailed: 0,
                missingTargets: 0,
                skippedPairs: 0
            });
            expect(report.contexts).toEqual([
                {
                    contextKey: 'm1-29-portrait',
                    locales: [{ locale: 'es', artifacts: [{ artifact: 'screen_003.png', status: 'findings', findings: [clipped] }] }]
                }
            ]);

            const lines = Reporter.renderText(report).split('\n');
            expect(lines).toContain('Issues found: 1');
            expect(lines).toContain('  [es]');
            expect(lines).not.toContain('  [fr]');
        });

        it('should send the source and target screenshots of the same screen', async () => {
            const seen: string[] = [];
            const oracle = new ScriptedOracle((ctx, source, target) => {
                seen.push(`${ctx.targetLocale}:${source.toString()}|${target.toString()}`);
                return [];
            });
            const runner = new DriftRunner({ config: { ...config, concurrency: 1 }, oracle, sleep: noSleep, log: quietLog });

            await runner.runDevice(root);

            expect(seen[0]).toBe('fr:m1-29-en-portrait/screen_001.png|m1-29-fr-portrait/screen_001.png');
            expect(seen[5]).toBe('es:m1-29-en-portrait/screen_003.png|m1-29-es-portrait/screen_003.png');
        });

        it('should report screens missing in a target run', async () => {
            fs.rmSync(path.join(root, 'm1-29-fr-portrait', 'screen_002.png'));
            const runner = new DriftRunner({ config, oracle: new ScriptedOracle(), sleep: noSleep, log: quietLog });

            const report = await runner.runDevice(root);

            expect(report.summary.pairsAnalyzed).toBe(5);
            expect(report.summary.missingTargets).toBe(1);
            expect(report.contexts[0].locales).toEqual([
                {
                    locale: 'fr',
                    artifacts: [{
                        artifact: 'screen_002.png',
                        status: 'missing-target',
                        findings: [],
                        reason: 'not captured in m1-29-fr-portrait'
                    }]
                }
            ]);
        });

        it('should return a partial report when the deadline has passed', async () => {
            const oracle = new ScriptedOracle();
            const runner = new DriftRunner({ config, oracle, signal: AbortSignal.abort(), sleep: noSleep, log: quietLog });

            const report = await runner.runDevice(root);

            expect(oracle.contexts).toHaveLength(0);
            expect(report.partial).toBe(true);
            expect(report.summary.skippedPairs).toBe(6);
        });

        it('should refuse an unreadable results directory', async () => {
            const runner = new DriftRunner({ config, oracle: new ScriptedOracle(), log: quietLog });

            await expect(runner.runDevice(path.join(root, 'missing'))).rejects.toThrow(ConfigurationError);
        });
    });

    describe('crawl mode', () => {
        const site = {
            'https://example.com/en/': ['https://example.com/en/about', 'https://example.com/en/pricing'],
            'https://example.com/en/pricing': ['https://example.com/fr/pricing', 'https://example.com/en/']
        };

        it('should crawl the source locale and compare every page in each target', async () => {
            const renderer = new FakeSiteRenderer(site);
            const oracle = new ScriptedOracle(ctx =>
                ctx.artifactName === 'pricing.png' && ctx.targetLocale === 'fr' ? [clipped] : []
            );
            const runner = new DriftRunner({ config, oracle, renderer, sleep: noSleep, log: quietLog });

            const report = await runner.runCrawl('https://example.com');

            expect(report.summary.contexts).toBe(3);
            expect(report.summary.pairsAnalyzed).toBe(6);
            expect(report.summary.affectedPairs).toBe(1);
            expect(report.contexts.map(c => c.contextKey)).toEqual(['/pricing']);
            // Source pages render once: during discovery.
            expect(renderer.calls.filter(c => c.locale === 'en')).toHaveLength(3);
            expect(renderer.calls).toHaveLength(9);

            const lines = Reporter.renderText(report).split('\n');
            expect(lines).toContain('Pages crawled: 3');
            expect(lines).toContain('Issues found: 1');
            expect(lines).toContain('Route: /pricing');
            expect(lines).toContain('      - Plan card: Price overflows the card → Allow the price to wrap');
        });

        it('should contain oracle and capture failures to their own pairs', async () => {
            const renderer = new FakeSiteRenderer(site, new Set(['https://example.com/es/about']));
            const oracle = new ScriptedOracle(ctx =>
                ctx.artifactName === 'index.png' && ctx.targetLocale === 'fr' ? new OracleUnavailableError('Gemini down') : []
            );
            const runner = new DriftRunner({ config, oracle, renderer, sleep: noSleep, log: quietLog });

            const report = await runner.runCrawl('https://example.com');

            expect(report.summary).toEqual({
                contexts: 3,
                pairsAnalyzed: 4,
                cleanPairs: 4,
                affectedPairs: 0,
                totalFindings: 0,
                analysisFailed: 1,
                missingTargets: 1,
                skippedPairs: 0
            });
            expect(report.contexts).toEqual([
                {
                    contextKey: '/',
                    locales: [{
                        locale: 'fr',
                        artifacts: [{
                            artifact: 'index.png',
                            status: 'analysis-failed',
                            findings: [],
                            reason: 'Gemini down (gave up after 3 attempt(s))'
                        }]
                    }]
                },
                {
                    contextKey: '/about',
                    locales: [{
                        locale: 'es',
                        artifacts: [{
                            artifact: 'about.png',
                            status: 'missing-target',
                            findings: [],
                            reason: 'target capture failed: Failed to render https://example.com/es/about: net::ERR_CONNECTION_REFUSED'
                        }]
                    }]
                }
            ]);
        });

        it('should mark pairs of an unrenderable source page as analysis failures', async () => {
            const renderer = new FakeSiteRenderer(site, new Set(['https://example.com/en/about']));
            const runner = new DriftRunner({ config, oracle: new ScriptedOracle(), renderer, sleep: noSleep, log: quietLog });

            const report = await runner.runCrawl('https://example.com');

            expect(report.discoveryFailures.map(f => f.page)).toEqual(['/about']);
            expect(report.summary.analysisFailed).toBe(2);
            expect(report.contexts.map(c => c.contextKey)).toEqual(['/about']);
        });

        it('should need a renderer', async () => {
            const runner = new DriftRunner({ config, oracle: new ScriptedOracle(), log: quietLog });

            await expect(runner.runCrawl('https://example.com')).rejects.toThrow('Crawl mode needs a renderer');
        });
    });

    describe('compare mode', () => {
        it('should compare two screenshots directly', async () => {
            fs.writeFileSync(path.join(root, 'home-en.png'), 'en');
            fs.writeFileSync(path.join(root, 'home-fr.png'), 'fr');
            const oracle = new ScriptedOracle(() => [clipped]);
            const runner = new DriftRunner({
                config: { ...config, locales: { sourceLocale: 'en', targetLocales: ['fr'] } },
                oracle,
                sleep: noSleep,
                log: quietLog
            });

            const report = await runner.runCompare(path.join(root, 'home-en.png'), path.join(root, 'home-fr.png'));

            expect(oracle.contexts).toEqual([{ sourceLocale: 'en', targetLocale: 'fr', artifactName: 'home-fr.png' }]);
            expect(report.mode).toBe('compare');
            expect(report.summary.affectedPairs).toBe(1);
            expect(Reporter.renderText(report).split('\n')).toContain('Pair: home-en.png');
        });

        it('should not call a run partial when the deadline passes during its last pair', async () => {
            fs.writeFileSync(path.join(root, 'home-en.png'), 'en');
            fs.writeFileSync(path.join(root, 'home-fr.png'), 'fr');
            const controller = new AbortController();
            const oracle = new ScriptedOracle(() => {
                controller.abort();
                return [];
            });
            const runner = new DriftRunner({
                config: { ...config, locales: { sourceLocale: 'en', targetLocales: ['fr'] } },
                oracle,
                signal: controller.signal,
                sleep: noSleep,
                log: quietLog
            });

            const report = await runner.runCompare(path.join(root, 'home-en.png'), path.join(root, 'home-fr.png'));

            expect(report.partial).toBe(false);
            expect(report.summary.cleanPairs).toBe(1);
            expect(report.summary.skippedPairs).toBe(0);
            expect(Reporter.renderText(report).split('\n')).toContain('No localization issues detected.');
        });

        it('should refuse missing image files', async () => {
            const runner = new DriftRunner({ config, oracle: new ScriptedOracle(), log: quietLog });

            await expect(runner.runCompare(path.join(root, 'a.png'), path.join(root, 'b.png')))
                .rejects.toThrow(`Image file is not readable: ${path.join(root, 'a.png')}`);
        });
    });
});
