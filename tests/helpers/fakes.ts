import { RenderError } from '../../src/shared/errors.js';
import type { DeviceProfile, Finding, Oracle, OracleContext, RenderResult, Renderer } from '../../src/drift/types.js';

/**
 * In-process site: address -> links on that page. Addresses listed in
 * `failing` reject with RenderError; unknown addresses render with no links.
 */
export class FakeSiteRenderer implements Renderer {
    readonly calls: Array<{ address: string; locale: string; profile?: string }> = [];

    constructor(
        private readonly site: Record<string, string[]> = {},
        private readonly failing: Set<string> = new Set()
    ) { }

    async render(address: string, locale: string, profile?: DeviceProfile): Promise<RenderResult> {
        this.calls.push({ address, locale, profile: profile?.name });
        if (this.failing.has(address)) {
            throw new RenderError(address, 'net::ERR_CONNECTION_REFUSED');
        }
        return { image: Buffer.from(`png:${address}`), links: this.site[address] ?? [] };
    }
}

/**
 * Oracle whose answer per call is decided by `respond`; a returned Error is thrown.
 */
export class ScriptedOracle implements Oracle {
    readonly contexts: OracleContext[] = [];

    constructor(private readonly respond: (context: OracleContext, source: Buffer, target: Buffer) => Finding[] | Error = () => []) { }

    async compare(source: Buffer, target: Buffer, context: OracleContext): Promise<Finding[]> {
        this.contexts.push(context);
        const answer = this.respond(context, source, target);
        if (answer instanceof Error) throw answer;
        return answer;
    }
}

export const noSleep = async (): Promise<void> => undefined;

export const quietLog = (): void => undefined;
