import { Command } from 'commander';
import * as fs from 'fs';
import { ConfigurationError, errorMessage } from '../../shared/errors.js';
import { ErrorHandler, ErrorSeverity } from '../../shared/utils/ErrorHandler.js';
import { PlaywrightRenderer, resolveDeviceProfile } from '../capture/PlaywrightRenderer.js';
import { parseInteger, type EnvDefaults, type RunConfig } from '../config/RunConfig.js';
import { DRIFT_DEFAULTS } from '../config/constants.js';
import { GeminiOracle } from '../oracle/GeminiOracle.js';
import { Reporter } from '../report/Reporter.js';
import { DriftRunner } from '../runner/DriftRunner.js';
import type { DriftReport, LocaleSet, Oracle } from '../types.js';

export interface SharedOptions {
    concurrency: number;
    retries: number;
    backoffMs: number;
    timeout: number;
    /** Overall run deadline in seconds */
    deadline?: number;
    model: string;
    prompt?: string;
    promptFile?: string;
    outputDir: string;
    json: boolean;
    quiet: boolean;
}

interface CompareOptions extends SharedOptions {
    sourceLocale: string;
    targetLocale: string;
}

interface CrawlOptions extends SharedOptions {
    maxPages: number;
    device?: string;
    headless: boolean;
    browserPath?: string;
}

interface DeviceOptions extends SharedOptions {
    devices?: string[];
}

export interface OracleSettings {
    model: string;
    /** Custom instructions from --prompt or --prompt-file */
    prompt?: string;
}

/** Collaborators the commands build; tests swap them for in-process fakes. */
export interface ProgramDeps {
    createOracle?: (settings: OracleSettings) => Oracle;
    print?: (text: string) => void;
}

const integer = (label: string) => (value: string): number => parseInteger(value, label);

const commaList = (value: string): string[] =>
    value.split(',').map(item => item.trim()).filter(item => item.length > 0);

function withSharedOptions(command: Command, env: EnvDefaults): Command {
    return command
        .option('--concurrency <number>', 'Pairs and pages processed in parallel', integer('--concurrency'), env.concurrency)
        .option('--retries <number>', 'Oracle retries after the first attempt', integer('--retries'), env.retries)
        .option('--backoff-ms <number>', 'Base oracle backoff, doubled per retry', integer('--backoff-ms'), env.backoffMs)
        .option('--timeout <ms>', 'Per-page render timeout', integer('--timeout'), env.renderTimeoutMs)
        .option('--deadline <seconds>', 'Stop starting new work after this many seconds', integer('--deadline'))
        .option('--model <id>', 'Oracle model id', env.model)
        .option('--prompt <text>', 'Replace the built-in drift prompt')
        .option('--prompt-file <path>', 'Read the drift prompt from a file')
        .option('--output-dir <path>', 'Where drift-report.{txt,json} are written', DRIFT_DEFAULTS.OUTPUT_DIR)
        .option('--json', 'Print the report as JSON', false)
        .option('--quiet', 'Suppress progress logs', false);
}

export function createProgram(env: EnvDefaults, deps: ProgramDeps = {}): Command {
    const print = deps.print ?? ((text: string) => console.log(text));
    const buildOracle = deps.createOracle ?? ((settings: OracleSettings) => new GeminiOracle({ apiKey: env.apiKey, ...settings }));
    const createOracle = (options: SharedOptions): Oracle =>
        buildOracle({ model: options.model, prompt: readPrompt(options) });

    const program = new Command();
    program
        .name('locale-drift')
        .description('Detect localization drift between locale variants of the same screens')
        .version('1.0.0');

    withSharedOptions(
        program
            .command('compare')
            .description('Compare one source screenshot with one target screenshot')
            .argument('<sourceImage>', 'Screenshot in the source locale')
            .argument('<targetImage>', 'Screenshot in the target locale')
            .option('--source-locale <code>', 'Label for the source image', 'source')
            .option('--target-locale <code>', 'Label for the target image', 'target'),
        env
    ).action(async (sourceImage: string, targetImage: string, options: CompareOptions) => {
        const locales = { sourceLocale: options.sourceLocale, targetLocales: [options.targetLocale] };
        const runner = new DriftRunner({
            config: runConfig(locales, options, env.maxPages),
            oracle: createOracle(options),
            log: logger(options)
        });
        finish(await runner.runCompare(sourceImage, targetImage), options, print);
    });

    withSharedOptions(
        program
            .command('crawl')
            .description('Crawl a site in the source locale and compare each page with its target-locale variants')
            .argument('<baseUrl>', 'Site root without the locale segment, e.g. https://example.com')
            .argument('<sourceLocale>', 'Locale the crawl follows')
            .argument('<targetLocales...>', 'Locales compared against the source')
            .option('--max-pages <number>', 'Crawl page cap', integer('--max-pages'), env.maxPages)
            .option('--device <name>', 'Emulate a Playwright device, e.g. "Pixel 7"')
            .option('--browser-path <path>', 'Chromium executable', process.env.LOCALE_DRIFT_CHROMIUM_PATH)
            .option('--headless', 'Run the browser headless', true)
            .option('--no-headless', 'Show the browser window'),
        env
    ).action(async (baseUrl: string, sourceLocale: string, targetLocales: string[], options: CrawlOptions) => {
        const log = logger(options);
        const locales = { sourceLocale, targetLocales };
        const config = runConfig(locales, options, options.maxPages);
        const oracle = createOracle(options);
        const profile = options.device ? resolveDeviceProfile(options.device) : undefined;

        const renderer = new PlaywrightRenderer({
            headless: options.headless,
            timeoutMs: options.timeout,
            executablePath: options.browserPath,
            log
        });
        try {
            await renderer.init();
            const runner = new DriftRunner({ config, oracle, renderer, profile, signal: deadlineSignal(options), log });
            finish(await runner.runCrawl(baseUrl), options, print);
        } finally {
            await ErrorHandler.safeExecute(
                () => renderer.close(),
                { component: 'cli', operation: 'closeBrowser' },
                undefined,
                ErrorSeverity.WARNING
            );
        }
    });

    withSharedOptions(
        program
            .command('ftl-analyze')
            .description('Compare device-farm result directories named <model>-<version>-<locale>-<orientation>')
            .argument('<resultsDir>', 'Directory holding one subdirectory per device run')
            .argument('<sourceLocale>', 'Locale whose screenshots form the match set')
            .argument('<targetLocales...>', 'Locales compared against the source')
            .option('--devices <models>', 'Comma-separated device models to keep', commaList),
        env
    ).action(async (resultsDir: string, sourceLocale: string, targetLocales: string[], options: DeviceOptions) => {
        const locales = { sourceLocale, targetLocales };
        const runner = new DriftRunner({
            config: runConfig(locales, options, env.maxPages),
            oracle: createOracle(options),
            signal: deadlineSignal(options),
            log: logger(options)
        });
        finish(await runner.runDevice(resultsDir, options.devices), options, print);
    });

    return program;
}

function runConfig(locales: LocaleSet, options: SharedOptions, maxPages: number): RunConfig {
    return {
        locales,
        concurrency: options.concurrency,
        maxPages,
        retries: options.retries,
        backoffMs: options.backoffMs,
        renderTimeoutMs: options.timeout
    };
}

function logger(options: SharedOptions): (msg: string) => void {
    return (msg) => {
        if (!options.quiet) console.log(msg);
    };
}

function deadlineSignal(options: SharedOptions): AbortSignal | undefined {
    if (options.deadline === undefined) return undefined;
    if (options.deadline < 1) throw new ConfigurationError(`--deadline must be at least 1 second, got ${options.deadline}`);
    return AbortSignal.timeout(options.deadline * 1000);
}

function readPrompt(options: SharedOptions): string | undefined {
    const { promptFile } = options;
    if (promptFile) {
        try {
            return fs.readFileSync(promptFile, 'utf-8');
        } catch (error) {
            return ErrorHandler.critical(
                new ConfigurationError(`Prompt file is not readable: ${promptFile}`),
                { component: 'cli', operation: 'readPrompt', data: { cause: errorMessage(error) } }
            );
        }
    }
    return options.prompt;
}

function finish(report: DriftReport, options: SharedOptions, print: (text: string) => void): void {
    const written = Reporter.writeReport(report, options.outputDir);
    print(options.json ? Reporter.renderJson(report) : Reporter.renderText(report));
    if (written && !options.json) {
        logger(options)(`[locale-drift] Report saved to ${written.textPath} and ${written.jsonPath}`);
    }
}
