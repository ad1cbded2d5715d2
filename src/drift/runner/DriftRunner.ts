/**
 * DriftRunner
 *
 * Wires one run end to end:
 * discovery -> pairs -> worker pool -> oracle client -> aggregator -> report.
 *
 * Only ConfigurationError leaves a run. Capture and oracle failures are
 * contained per pair and show up in the report.
 */

import * as path from 'path';
import { ConfigurationError, errorMessage } from '../../shared/errors.js';
import { ErrorHandler, ErrorSeverity } from '../../shared/utils/ErrorHandler.js';
import { FileSystemHelper } from '../../shared/utils/FileSystemHelper.js';
import { validateRunConfig, type RunConfig } from '../config/RunConfig.js';
import { NAMING } from '../config/constants.js';
import { PageDiscoverer } from '../discovery/PageDiscoverer.js';
import { RunGrouper } from '../discovery/RunGrouper.js';
import { LocalePathResolver } from '../locale/LocalePathResolver.js';
import { DriftOracleClient } from '../oracle/DriftOracleClient.js';
import { PairBuilder } from '../pairing/PairBuilder.js';
import { DriftAggregator } from '../report/DriftAggregator.js';
import type { ComparisonPair, DeviceProfile, DriftReport, Oracle, PairOutcome, Renderer } from '../types.js';
import { ArtifactLoader } from './ArtifactLoader.js';
import { RenderCache } from './RenderCache.js';
import { runPool } from './WorkerPool.js';

export interface DriftRunnerOptions {
    config: RunConfig;
    oracle: Oracle;
    /** Required by crawl mode */
    renderer?: Renderer;
    profile?: DeviceProfile;
    /** Overall deadline; aborting yields a partial report */
    signal?: AbortSignal;
    sleep?: (ms: number) => Promise<void>;
    log?: (msg: string) => void;
}

export class DriftRunner {
    private readonly config: RunConfig;
    private readonly log: (msg: string) => void;
    private readonly client: DriftOracleClient;

    constructor(private readonly options: DriftRunnerOptions) {
        this.config = validateRunConfig(options.config);
        this.log = options.log ?? ((msg) => console.log(msg));
        this.client = new DriftOracleClient({
            oracle: options.oracle,
            retries: this.config.retries,
            backoffMs: this.config.backoffMs,
            sleep: options.sleep,
            log: this.log
        });
    }

    /**
     * Crawl the source locale from `<baseUrl>/<source>/` and compare every
     * discovered page against each target locale.
     */
    async runCrawl(baseUrl: string): Promise<DriftReport> {
        const { renderer, profile, signal } = this.options;
        if (!renderer) throw new ConfigurationError('Crawl mode needs a renderer');

        const { locales } = this.config;
        let resolver: LocalePathResolver;
        try {
            resolver = new LocalePathResolver({
                kind: 'url-prefix',
                baseUrl,
                locales: [locales.sourceLocale, ...locales.targetLocales]
            });
        } catch (error) {
            throw new ConfigurationError(`Invalid base URL ${baseUrl}: ${errorMessage(error)}`);
        }

        const cache = new RenderCache(renderer, { locales: [locales.sourceLocale] });
        try {
            const discoverer = new PageDiscoverer({
                resolver,
                renderer: cache,
                sourceLocale: locales.sourceLocale,
                concurrency: this.config.concurrency,
                profile,
                signal,
                log: this.log
            });
            const discovery = await discoverer.discover(resolver.resolve('/', locales.sourceLocale), this.config.maxPages);

            const aggregator = new DriftAggregator('crawl', locales, discovery.pages);
            aggregator.addDiscoveryFailures(discovery.failures);

            // A source render is read by one pair per target locale, then dropped.
            const pending = new Map<string, number>(discovery.pages.map(page => [page, locales.targetLocales.length] as const));
            const release = (pair: ComparisonPair): void => {
                const left = (pending.get(pair.contextKey) ?? 1) - 1;
                if (left > 0) {
                    pending.set(pair.contextKey, left);
                    return;
                }
                pending.delete(pair.contextKey);
                if (pair.source.kind === 'page') cache.release(pair.source.address, pair.source.locale, profile);
            };

            await this.execute(
                PairBuilder.crawl(discovery, locales, resolver),
                aggregator,
                new ArtifactLoader(cache, profile),
                { discoveryStoppedEarly: discovery.stoppedEarly ?? false, afterPair: release }
            );
            return aggregator.render();
        } finally {
            cache.clear();
        }
    }

    /**
     * Compare device-farm result directories named
     * `<model>-<platformVersion>-<locale>-<orientation>` under `resultsDir`.
     */
    async runDevice(resultsDir: string, devices?: string[]): Promise<DriftReport> {
        if (!FileSystemHelper.isReadableDirectory(resultsDir)) {
            throw new ConfigurationError(`Results directory is not readable: ${resultsDir}`);
        }

        const { locales } = this.config;
        const grouper = new RunGrouper({ devices, log: this.log });
        const grouping = grouper.group(FileSystemHelper.listDirectories(resultsDir));
        const discovery = grouper.match(grouping, locales, resultsDir, directory =>
            FileSystemHelper.listFilesRecursive(
                path.join(resultsDir, directory),
                NAMING.SCREENSHOT_PATTERN,
                NAMING.SCREENSHOT_MAX_DEPTH
            )
        );

        const aggregator = new DriftAggregator('device', locales, discovery.groups.map(group => group.key));
        for (const group of discovery.groups) {
            for (const missing of group.missing) {
                const directory = group.directories.get(missing.locale) ?? missing.locale;
                aggregator.addMissing(missing.groupKey, missing.locale, missing.fileName, `not captured in ${directory}`);
            }
        }

        const resolver = new LocalePathResolver({ kind: 'directory-token' });
        await this.execute(PairBuilder.device(discovery, locales, resolver), aggregator, new ArtifactLoader());
        return aggregator.render();
    }

    /** Compare two screenshots directly. */
    async runCompare(sourceImage: string, targetImage: string): Promise<DriftReport> {
        for (const file of [sourceImage, targetImage]) {
            if (!FileSystemHelper.isReadableFile(file)) {
                throw new ConfigurationError(`Image file is not readable: ${file}`);
            }
        }

        const { sourceLocale, targetLocales } = this.config.locales;
        const targetLocale = targetLocales[0];
        const locales = { sourceLocale, targetLocales: [targetLocale] };
        const artifactName = path.basename(targetImage);
        const contextKey = path.basename(sourceImage);

        const pair: ComparisonPair = Object.freeze<ComparisonPair>({
            sequence: 0,
            contextKey,
            targetLocale,
            artifactName,
            source: { kind: 'file', path: sourceImage, locale: sourceLocale, name: contextKey },
            target: { kind: 'file', path: targetImage, locale: targetLocale, name: artifactName }
        });

        const aggregator = new DriftAggregator('compare', locales, [contextKey]);
        await this.execute([pair], aggregator, new ArtifactLoader());
        return aggregator.render();
    }

    private async execute(
        pairs: Iterable<ComparisonPair>,
        aggregator: DriftAggregator,
        loader: ArtifactLoader,
        hooks: { discoveryStoppedEarly?: boolean; afterPair?: (pair: ComparisonPair) => void } = {}
    ): Promise<void> {
        const { signal } = this.options;
        let completed = 0;

        const stats = await runPool(pairs, this.config.concurrency, async pair => {
            const outcome = await this.comparePair(pair, loader);
            aggregator.record(pair, outcome);
            hooks.afterPair?.(pair);
            completed++;
            this.log(`[DriftRunner] [${completed}] ${pair.contextKey} ${pair.artifactName} [${pair.targetLocale}]: ${describe(outcome)}`);
        }, signal);

        if (stats.skipped > 0 || hooks.discoveryStoppedEarly) {
            this.log(`[DriftRunner] ⚠️ Deadline reached: ${stats.skipped} pair(s) not started`);
            aggregator.markPartial(stats.skipped);
        }
    }

    private async comparePair(pair: ComparisonPair, loader: ArtifactLoader): Promise<PairOutcome> {
        const context = { component: 'DriftRunner', operation: 'capture', data: { artifact: pair.artifactName } };

        let source: Buffer;
        try {
            source = await loader.load(pair.source);
        } catch (error) {
            if (error instanceof ConfigurationError) throw error;
            const info = ErrorHandler.handle(error, context, ErrorSeverity.WARNING);
            return { status: 'analysis-failed', reason: `source capture failed: ${info.message}` };
        }

        let target: Buffer;
        try {
            target = await loader.load(pair.target);
        } catch (error) {
            if (error instanceof ConfigurationError) throw error;
            const info = ErrorHandler.handle(error, context, ErrorSeverity.WARNING);
            return { status: 'missing-target', reason: `target capture failed: ${info.message}` };
        }

        return this.client.compare(source, target, {
            sourceLocale: this.config.locales.sourceLocale,
            targetLocale: pair.targetLocale,
            artifactName: pair.artifactName
        });
    }
}

function describe(outcome: PairOutcome): string {
    switch (outcome.status) {
        case 'analyzed':
            return outcome.findings.length === 0 ? 'clean' : `${outcome.findings.length} finding(s)`;
        case 'analysis-failed':
            return 'analysis failed';
        case 'missing-target':
            return 'missing target';
    }
}
