/** Locale-independent identity of a screen, e.g. `/pricing` or `pixel7-34-portrait/home.png`. */
export type CanonicalPage = string;

/** Shared identity of device-run directories that differ only by locale, e.g. `pixel7-34-portrait`. */
export type RunGroupKey = string;

export type DriftMode = 'crawl' | 'device' | 'compare';

/**
 * The locales of one run. The source locale is explicit; targets keep the
 * order the user supplied, which is also the report order.
 */
export interface LocaleSet {
    sourceLocale: string;
    targetLocales: string[];
}

export interface LocaleVariant {
    page: CanonicalPage;
    locale: string;
    address: string;
}

export interface CanonicalAddress {
    page: CanonicalPage;
    /** null when the address carries no locale segment */
    locale: string | null;
}

export interface Finding {
    /** Element or screen area */
    location: string;
    issue: string;
    remediation: string;
}

export interface DeviceProfile {
    name: string;
    viewport: { width: number; height: number };
    deviceScaleFactor?: number;
    isMobile?: boolean;
    hasTouch?: boolean;
    userAgent?: string;
}

export interface RenderResult {
    /** PNG bytes */
    image: Buffer;
    /** Absolute link targets found on the page */
    links: string[];
}

/**
 * Browser/device capture collaborator.
 * Fails with RenderTimeoutError or RenderError.
 */
export interface Renderer {
    render(address: string, locale: string, profile?: DeviceProfile): Promise<RenderResult>;
    close?(): Promise<void>;
}

export interface OracleContext {
    sourceLocale: string;
    targetLocale: string;
    artifactName: string;
}

/**
 * Vision comparison collaborator.
 * Fails with OracleUnavailableError or OracleMalformedResponseError.
 */
export interface Oracle {
    compare(source: Buffer, target: Buffer, context: OracleContext): Promise<Finding[]>;
}

export type Artifact =
    | { kind: 'page'; address: string; locale: string; name: string }
    | { kind: 'file'; path: string; locale: string; name: string };

export interface ComparisonPair {
    /** Position in PairBuilder order; the report preserves this order */
    readonly sequence: number;
    readonly contextKey: string;
    readonly targetLocale: string;
    readonly artifactName: string;
    readonly source: Artifact;
    readonly target: Artifact;
}

export type PairOutcome =
    | { status: 'analyzed'; findings: Finding[] }
    | { status: 'analysis-failed'; reason: string }
    | { status: 'missing-target'; reason: string };

export interface DiscoveryFailure {
    page: CanonicalPage;
    reason: string;
}

export interface CrawlDiscovery {
    /** BFS insertion order */
    pages: CanonicalPage[];
    failures: DiscoveryFailure[];
    /** The deadline cut the crawl off with pages still queued */
    stoppedEarly?: boolean;
}

export interface MissingTargetArtifact {
    groupKey: RunGroupKey;
    locale: string;
    fileName: string;
}

export interface DeviceRunGroup {
    key: RunGroupKey;
    /** locale -> directory name */
    directories: Map<string, string>;
    /** Files present in the source locale's directory, sorted */
    matchSet: string[];
    /** target locale -> files present in that directory */
    targetFiles: Map<string, Set<string>>;
    missing: MissingTargetArtifact[];
}

export interface DeviceDiscovery {
    root: string;
    groups: DeviceRunGroup[];
}

export type ArtifactStatus = 'findings' | 'analysis-failed' | 'missing-target';

export interface ArtifactReport {
    artifact: string;
    status: ArtifactStatus;
    findings: Finding[];
    reason?: string;
}

export interface LocaleReport {
    locale: string;
    artifacts: ArtifactReport[];
}

export interface ContextReport {
    contextKey: string;
    locales: LocaleReport[];
}

export interface DriftSummary {
    /** Pages crawled or run groups matched */
    contexts: number;
    pairsAnalyzed: number;
    cleanPairs: number;
    affectedPairs: number;
    totalFindings: number;
    analysisFailed: number;
    missingTargets: number;
    skippedPairs: number;
}

export interface DriftReport {
    mode: DriftMode;
    sourceLocale: string;
    targetLocales: string[];
    generatedAt: string;
    /** True when a deadline stopped the run before every pair was compared */
    partial: boolean;
    summary: DriftSummary;
    contexts: ContextReport[];
    discoveryFailures: DiscoveryFailure[];
}
