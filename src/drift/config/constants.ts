/**
 * Centralized defaults for the drift engine.
 * Every value can be overridden by an environment variable or a CLI flag.
 */

// ============================================================
// RUN DEFAULTS
// ============================================================

export const DRIFT_DEFAULTS = {
    /** Oracle model id */
    MODEL: 'gemini-2.5-flash',

    /** Worker-pool width for rendering and oracle calls */
    CONCURRENCY: 4,

    /** Crawl page cap */
    MAX_PAGES: 20,

    /** Oracle retries after the first attempt */
    ORACLE_RETRIES: 2,

    /** Base oracle backoff; doubles on every retry */
    ORACLE_BACKOFF_MS: 1000,

    /** Per-page render timeout */
    RENDER_TIMEOUT_MS: 30000,

    /** Where text and JSON reports are written */
    OUTPUT_DIR: './output/drift',
} as const;

// ============================================================
// NAMING CONVENTIONS
// ============================================================

export const NAMING = {
    /** Device-run directory delimiter: <model>-<platformVersion>-<locale>-<orientation> */
    RUN_NAME_DELIMITER: '-',

    /** Number of tokens in a device-run directory name */
    RUN_NAME_TOKENS: 4,

    /** Token position of the locale in a device-run directory name */
    RUN_NAME_LOCALE_INDEX: 2,

    /** Screenshot files considered by the device-farm mode */
    SCREENSHOT_PATTERN: /\.png$/i,

    /** Nesting depth searched inside one device-run directory */
    SCREENSHOT_MAX_DEPTH: 4,
} as const;

// ============================================================
// REPORT
// ============================================================

export const REPORT = {
    TEXT_FILE: 'drift-report.txt',
    JSON_FILE: 'drift-report.json',
    NO_ISSUES_LINE: 'No localization issues detected.',
} as const;
