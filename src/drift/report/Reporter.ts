/**
 * Reporter
 *
 * Renders a DriftReport as console text or JSON and writes both to disk.
 */

import * as path from 'path';
import { FileSystemHelper } from '../../shared/utils/FileSystemHelper.js';
import { REPORT } from '../config/constants.js';
import type { ArtifactReport, DriftMode, DriftReport } from '../types.js';

const BAR = '═══════════════════════════════════════════════════════════════';
const RULE = '───────────────────────────────────────────────────────────────';

const CONTEXT_LABELS: Record<DriftMode, { label: string; heading: string }> = {
    crawl: { label: 'Pages crawled', heading: 'Route' },
    device: { label: 'Run groups', heading: 'Group' },
    compare: { label: 'Image pairs', heading: 'Pair' }
};

export interface WrittenReport {
    textPath: string;
    jsonPath: string;
}

export class Reporter {
    static renderText(report: DriftReport): string {
        const lines: string[] = [];
        const { label: contextLabel, heading } = CONTEXT_LABELS[report.mode];
        const { summary } = report;

        lines.push(BAR);
        lines.push('🌐 LOCALIZATION DRIFT REPORT');
        lines.push(BAR);
        lines.push('');
        lines.push(`Mode: ${report.mode}`);
        lines.push(`Source locale: ${report.sourceLocale}`);
        lines.push(`Target locales: ${report.targetLocales.join(', ')}`);
        lines.push(`Generated: ${report.generatedAt}`);
        if (report.partial) {
            lines.push('⚠️  PARTIAL: deadline reached before every pair was compared');
        }
        lines.push('');
        lines.push(RULE);
        lines.push('SUMMARY');
        lines.push(RULE);
        lines.push(`${contextLabel}: ${summary.contexts}`);
        lines.push(`Pairs analyzed: ${summary.pairsAnalyzed}`);
        lines.push(`Issues found: ${summary.affectedPairs}`);
        lines.push(`Total findings: ${summary.totalFindings}`);
        lines.push(`Analysis failed: ${summary.analysisFailed}`);
        lines.push(`Missing targets: ${summary.missingTargets}`);
        lines.push(`Skipped pairs: ${summary.skippedPairs}`);
        lines.push('');

        if (summary.affectedPairs === 0) {
            const unchecked = summary.analysisFailed + summary.missingTargets + summary.skippedPairs;
            lines.push(unchecked === 0
                ? REPORT.NO_ISSUES_LINE
                : `No drift found in the ${summary.pairsAnalyzed} pair(s) analyzed; ${unchecked} could not be checked.`);
            lines.push('');
        }

        if (report.contexts.length > 0) {
            lines.push(RULE);
            lines.push('DETAILS');
            lines.push(RULE);
            for (const context of report.contexts) {
                lines.push('');
                lines.push(`${heading}: ${context.contextKey}`);
                for (const locale of context.locales) {
                    lines.push(`  [${locale.locale}]`);
                    for (const artifact of locale.artifacts) {
                        lines.push(...renderArtifact(artifact));
                    }
                }
            }
            lines.push('');
        }

        if (report.discoveryFailures.length > 0) {
            lines.push(RULE);
            lines.push('DISCOVERY FAILURES');
            lines.push(RULE);
            for (const failure of report.discoveryFailures) {
                lines.push(`❌ ${failure.page}: ${failure.reason}`);
            }
            lines.push('');
        }

        lines.push(BAR);
        return lines.join('\n');
    }

    static renderJson(report: DriftReport): string {
        return JSON.stringify(report, null, 2);
    }

    /**
     * Write drift-report.json and drift-report.txt into `outputDir`.
     * Returns null when either write fails.
     */
    static writeReport(report: DriftReport, outputDir: string): WrittenReport | null {
        const jsonPath = path.join(outputDir, REPORT.JSON_FILE);
        const textPath = path.join(outputDir, REPORT.TEXT_FILE);

        const jsonOk = FileSystemHelper.safeWriteText(jsonPath, Reporter.renderJson(report));
        const textOk = FileSystemHelper.safeWriteText(textPath, Reporter.renderText(report));
        return jsonOk && textOk ? { textPath, jsonPath } : null;
    }
}

function renderArtifact(artifact: ArtifactReport): string[] {
    switch (artifact.status) {
        case 'findings':
            return [
                `    ${artifact.artifact}`,
                ...artifact.findings.map(f => `      - ${f.location}: ${f.issue} → ${f.remediation}`)
            ];
        case 'analysis-failed':
            return [`    ${artifact.artifact}: ANALYSIS FAILED (${artifact.reason ?? 'unknown error'})`];
        case 'missing-target':
            return [`    ${artifact.artifact}: MISSING TARGET ARTIFACT (${artifact.reason ?? 'not captured'})`];
    }
}
