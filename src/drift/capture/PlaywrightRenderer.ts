/**
 * PlaywrightRenderer
 *
 * Renders one address per call in a fresh browser context carrying the
 * requested locale (and device profile), returning a full-page PNG and the
 * absolute targets of every `a[href]` on the page.
 */

import { chromium, devices, errors, type Browser } from 'playwright-core';
import { ConfigurationError, RenderError, RenderTimeoutError, errorMessage } from '../../shared/errors.js';
import { ErrorHandler, ErrorSeverity } from '../../shared/utils/ErrorHandler.js';
import { Validators } from '../../shared/utils/JsonValidator.js';
import { DRIFT_DEFAULTS } from '../config/constants.js';
import type { DeviceProfile, RenderResult, Renderer } from '../types.js';

export interface PlaywrightRendererOptions {
    headless?: boolean;
    timeoutMs?: number;
    /** Chromium binary; playwright-core ships none */
    executablePath?: string;
    log?: (msg: string) => void;
}

const DEFAULT_VIEWPORT = { width: 1440, height: 900 };

// Evaluated in the page; `href` is already absolute.
const COLLECT_LINKS = `Array.from(document.querySelectorAll('a[href]'), a => a.href)`;

const isStringList = Validators.array(Validators.string);

export class PlaywrightRenderer implements Renderer {
    private browser: Browser | null = null;
    private readonly timeoutMs: number;
    private readonly log: (msg: string) => void;

    constructor(private readonly options: PlaywrightRendererOptions = {}) {
        this.timeoutMs = options.timeoutMs ?? DRIFT_DEFAULTS.RENDER_TIMEOUT_MS;
        this.log = options.log ?? ((msg) => console.log(msg));
    }

    /**
     * Launch Chromium. A browser that cannot start is a setup problem, not a
     * per-page failure.
     */
    async init(): Promise<void> {
        if (this.browser) return;
        this.log(`[PlaywrightRenderer] Launching browser (headless: ${this.options.headless ?? true})...`);
        try {
            this.browser = await chromium.launch({
                headless: this.options.headless ?? true,
                executablePath: this.options.executablePath
            });
        } catch (error) {
            ErrorHandler.handle(
                new ConfigurationError(`Could not launch Chromium: ${errorMessage(error)}`),
                {
                    component: 'PlaywrightRenderer',
                    operation: 'launch',
                    data: { executablePath: this.options.executablePath ?? '(playwright default)' }
                },
                ErrorSeverity.CRITICAL
            );
        }
    }

    async render(address: string, locale: string, profile?: DeviceProfile): Promise<RenderResult> {
        await this.init();
        if (!this.browser) throw new RenderError(address, 'browser is not running');

        const context = await this.browser.newContext({
            locale,
            extraHTTPHeaders: { 'Accept-Language': locale },
            viewport: profile?.viewport ?? DEFAULT_VIEWPORT,
            deviceScaleFactor: profile?.deviceScaleFactor,
            isMobile: profile?.isMobile,
            hasTouch: profile?.hasTouch,
            userAgent: profile?.userAgent
        });

        try {
            const page = await context.newPage();
            await page.goto(address, { waitUntil: 'networkidle', timeout: this.timeoutMs });
            const image = await page.screenshot({ fullPage: true, type: 'png', timeout: this.timeoutMs });
            const links: unknown = await page.evaluate(COLLECT_LINKS);
            return { image, links: isStringList(links) ? links : [] };
        } catch (error) {
            if (error instanceof errors.TimeoutError) throw new RenderTimeoutError(address, this.timeoutMs);
            throw new RenderError(address, errorMessage(error));
        } finally {
            await context.close();
        }
    }

    async close(): Promise<void> {
        if (this.browser) {
            await this.browser.close();
            this.browser = null;
        }
    }
}

/**
 * Look up a device descriptor by Playwright registry name, e.g. "Pixel 7".
 */
export function resolveDeviceProfile(name: string): DeviceProfile {
    const descriptor = devices[name];
    if (!descriptor) {
        throw new ConfigurationError(`Unknown device "${name}"`);
    }
    return {
        name,
        viewport: { width: descriptor.viewport.width, height: descriptor.viewport.height },
        deviceScaleFactor: descriptor.deviceScaleFactor,
        isMobile: descriptor.isMobile,
        hasTouch: descriptor.hasTouch,
        userAgent: descriptor.userAgent
    };
}
