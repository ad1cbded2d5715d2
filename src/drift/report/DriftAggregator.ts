/**
 * DriftAggregator
 *
 * Collects per-pair outcomes as they complete, in any order, and renders a
 * report whose grouping follows the deterministic PairBuilder order
 * (context -> target locale -> artifact). Clean pairs are only counted.
 *
 * Entries are keyed by (context, locale, artifact); re-adding a key replaces
 * it, so feeding the same result twice changes nothing. Every mutation is a
 * synchronous method call, which keeps concurrent workers from interleaving
 * inside an update.
 */

import type {
    ArtifactReport,
    ArtifactStatus,
    ComparisonPair,
    ContextReport,
    DiscoveryFailure,
    DriftMode,
    DriftReport,
    Finding,
    LocaleSet,
    PairOutcome
} from '../types.js';

interface Entry {
    contextKey: string;
    locale: string;
    artifact: string;
    status: ArtifactStatus | 'clean';
    findings: Finding[];
    reason?: string;
}

export class DriftAggregator {
    private entries = new Map<string, Entry>();
    private contextRank = new Map<string, number>();
    private localeRank = new Map<string, number>();
    private discoveryFailures: DiscoveryFailure[] = [];
    private skippedPairs = 0;
    private partial = false;

    constructor(
        private readonly mode: DriftMode,
        private readonly locales: LocaleSet,
        private readonly contexts: readonly string[]
    ) {
        contexts.forEach((key, index) => {
            if (!this.contextRank.has(key)) this.contextRank.set(key, index);
        });
        locales.targetLocales.forEach((locale, index) => this.localeRank.set(locale, index));
    }

    add(pair: ComparisonPair, findings: Finding[]): void {
        const unique = dedupeFindings(findings);
        this.put({
            contextKey: pair.contextKey,
            locale: pair.targetLocale,
            artifact: pair.artifactName,
            status: unique.length > 0 ? 'findings' : 'clean',
            findings: unique
        });
    }

    addFailure(pair: ComparisonPair, reason: string): void {
        this.put({
            contextKey: pair.contextKey,
            locale: pair.targetLocale,
            artifact: pair.artifactName,
            status: 'analysis-failed',
            findings: [],
            reason
        });
    }

    addMissing(contextKey: string, locale: string, artifact: string, reason: string): void {
        this.put({ contextKey, locale, artifact, status: 'missing-target', findings: [], reason });
    }

    record(pair: ComparisonPair, outcome: PairOutcome): void {
        switch (outcome.status) {
            case 'analyzed':
                this.add(pair, outcome.findings);
                break;
            case 'analysis-failed':
                this.addFailure(pair, outcome.reason);
                break;
            case 'missing-target':
                this.addMissing(pair.contextKey, pair.targetLocale, pair.artifactName, outcome.reason);
                break;
        }
    }

    addDiscoveryFailures(failures: DiscoveryFailure[]): void {
        this.discoveryFailures.push(...failures);
    }

    /** Mark the report partial: `skipped` pairs were never started. */
    markPartial(skipped: number): void {
        this.partial = true;
        this.skippedPairs += skipped;
    }

    render(): DriftReport {
        const ordered = [...this.entries.values()].sort((a, b) => this.compare(a, b));

        const summary = {
            contexts: this.contexts.length,
            pairsAnalyzed: 0,
            cleanPairs: 0,
            affectedPairs: 0,
            totalFindings: 0,
            analysisFailed: 0,
            missingTargets: 0,
            skippedPairs: this.skippedPairs
        };

        const contexts: ContextReport[] = [];
        for (const entry of ordered) {
            switch (entry.status) {
                case 'clean':
                    summary.pairsAnalyzed++;
                    summary.cleanPairs++;
                    continue;
                case 'findings':
                    summary.pairsAnalyzed++;
                    summary.affectedPairs++;
                    summary.totalFindings += entry.findings.length;
                    break;
                case 'analysis-failed':
                    summary.analysisFailed++;
                    break;
                case 'missing-target':
                    summary.missingTargets++;
                    break;
            }

            let context = contexts[contexts.length - 1];
            if (!context || context.contextKey !== entry.contextKey) {
                context = { contextKey: entry.contextKey, locales: [] };
                contexts.push(context);
            }
            let locale = context.locales[context.locales.length - 1];
            if (!locale || locale.locale !== entry.locale) {
                locale = { locale: entry.locale, artifacts: [] };
                context.locales.push(locale);
            }

            const artifact: ArtifactReport = {
                artifact: entry.artifact,
                status: entry.status,
                findings: entry.findings.map(f => ({ ...f }))
            };
            if (entry.reason !== undefined) artifact.reason = entry.reason;
            locale.artifacts.push(artifact);
        }

        return {
            mode: this.mode,
            sourceLocale: this.locales.sourceLocale,
            targetLocales: [...this.locales.targetLocales],
            generatedAt: new Date().toISOString(),
            partial: this.partial,
            summary,
            contexts,
            discoveryFailures: [...this.discoveryFailures]
        };
    }

    private put(entry: Entry): void {
        this.entries.set(JSON.stringify([entry.contextKey, entry.locale, entry.artifact]), entry);
    }

    private compare(a: Entry, b: Entry): number {
        return rankCompare(this.contextRank, a.contextKey, b.contextKey)
            || rankCompare(this.localeRank, a.locale, b.locale)
            || lexical(a.artifact, b.artifact);
    }
}

function rankCompare(ranks: Map<string, number>, a: string, b: string): number {
    const rankA = ranks.get(a) ?? Number.MAX_SAFE_INTEGER;
    const rankB = ranks.get(b) ?? Number.MAX_SAFE_INTEGER;
    return rankA - rankB || lexical(a, b);
}

function lexical(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

function dedupeFindings(findings: Finding[]): Finding[] {
    const seen = new Set<string>();
    const unique: Finding[] = [];
    for (const finding of findings) {
        const key = JSON.stringify([finding.location, finding.issue, finding.remediation]);
        if (seen.has(key)) continue;
        seen.add(key);
        unique.push({ location: finding.location, issue: finding.issue, remediation: finding.remediation });
    }
    return unique;
}
