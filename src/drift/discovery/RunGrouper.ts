/**
 * RunGrouper
 *
 * Device-farm mode. Groups result directories that share device identity
 * (model, platform version, orientation) and differ only by locale, then
 * matches screenshots across locales by file name.
 */

import { MalformedAddressError } from '../../shared/errors.js';
import { ErrorHandler, ErrorSeverity } from '../../shared/utils/ErrorHandler.js';
import { parseRunName, type ParseFailure } from '../locale/RunNameParser.js';
import type { DeviceDiscovery, DeviceRunGroup, LocaleSet, MissingTargetArtifact, RunGroupKey } from '../types.js';

export interface RunGrouping {
    /** group key -> (locale -> directory name), in first-seen order of the sorted input */
    groups: Map<RunGroupKey, Map<string, string>>;
    rejected: ParseFailure[];
}

export interface RunGrouperOptions {
    /** Keep only runs of these device models */
    devices?: string[];
    log?: (msg: string) => void;
}

export class RunGrouper {
    private log: (msg: string) => void;
    private devices: Set<string> | null;

    constructor(options: RunGrouperOptions = {}) {
        this.log = options.log ?? ((msg) => console.log(msg));
        this.devices = options.devices && options.devices.length > 0 ? new Set(options.devices) : null;
    }

    group(directoryNames: string[]): RunGrouping {
        const groups = new Map<RunGroupKey, Map<string, string>>();
        const rejected: ParseFailure[] = [];

        for (const name of [...directoryNames].sort()) {
            const parsed = parseRunName(name);
            if (!parsed.ok) {
                rejected.push(parsed);
                ErrorHandler.handle(
                    new MalformedAddressError(name, parsed.reason),
                    { component: 'RunGrouper', operation: 'group' },
                    ErrorSeverity.WARNING
                );
                continue;
            }
            if (this.devices && !this.devices.has(parsed.model)) continue;

            const byLocale = groups.get(parsed.groupKey) ?? new Map<string, string>();
            byLocale.set(parsed.locale, name);
            groups.set(parsed.groupKey, byLocale);
        }

        this.log(`[RunGrouper] ${groups.size} run group(s), ${rejected.length} directory name(s) rejected`);
        return { groups, rejected };
    }

    /**
     * The source locale's files form each group's match set. Target-only
     * files are ignored; source files a target lacks become MissingTargetArtifact.
     */
    match(
        grouping: RunGrouping,
        locales: LocaleSet,
        root: string,
        listFiles: (directory: string) => string[]
    ): DeviceDiscovery {
        const groups: DeviceRunGroup[] = [];

        for (const [key, directories] of grouping.groups) {
            const sourceDir = directories.get(locales.sourceLocale);
            if (!sourceDir) {
                this.log(`[RunGrouper] ⚠️ Skipping ${key}: no ${locales.sourceLocale} run`);
                continue;
            }

            const matchSet = [...new Set(listFiles(sourceDir))].sort();
            const targetFiles = new Map<string, Set<string>>();
            const missing: MissingTargetArtifact[] = [];

            for (const locale of locales.targetLocales) {
                const targetDir = directories.get(locale);
                if (!targetDir) {
                    this.log(`[RunGrouper] ${key}: no ${locale} run, nothing to compare`);
                    continue;
                }
                const files = new Set(listFiles(targetDir));
                targetFiles.set(locale, files);
                for (const fileName of matchSet) {
                    if (!files.has(fileName)) missing.push({ groupKey: key, locale, fileName });
                }
            }

            this.log(`[RunGrouper] ${key}: ${matchSet.length} screen(s), ${missing.length} missing in targets`);
            groups.push({ key, directories, matchSet, targetFiles, missing });
        }

        return { root, groups };
    }
}
