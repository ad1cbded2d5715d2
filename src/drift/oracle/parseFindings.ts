import { OracleMalformedResponseError } from '../../shared/errors.js';
import { JsonValidator, Validators, createObjectValidator, type Validator } from '../../shared/utils/JsonValidator.js';
import type { Finding } from '../types.js';
import { NO_ISSUES_RESPONSE } from './prompt.js';

const isFinding: Validator<Finding> = createObjectValidator<Finding>({
    location: Validators.nonEmptyString,
    issue: Validators.nonEmptyString,
    remediation: Validators.nonEmptyString
});

const isFindingList = Validators.array(isFinding);

const isFindingEnvelope = createObjectValidator<{ findings: Finding[] }>({
    findings: isFindingList
});

// "- Header: title truncated → allow two lines"
const FINDING_LINE = /^[-*•]\s*(.+?):\s*(.+?)\s*(?:→|->)\s*(.+)$/;

/**
 * Convert raw oracle text into Finding records.
 *
 * Accepted: a JSON array, `{ "findings": [...] }` or a single finding
 * object, each optionally inside a fenced block; a JSON string, read again
 * as oracle text; the literal no-issues sentence; or one
 * `- location: issue → fix` line per finding. Anything else throws
 * OracleMalformedResponseError.
 */
export function parseFindings(raw: string): Finding[] {
    const text = raw.trim();
    if (!text) throw new OracleMalformedResponseError('Oracle returned an empty response', raw);

    if (text === NO_ISSUES_RESPONSE) return [];

    const list = JsonValidator.extract(text, isFindingList);
    if (list.success && list.data) return list.data.map(normalizeFinding);

    const envelope = JsonValidator.extract(text, isFindingEnvelope);
    if (envelope.success && envelope.data) return envelope.data.findings.map(normalizeFinding);

    const single = JsonValidator.extract(text, isFinding);
    if (single.success && single.data) return [normalizeFinding(single.data)];

    // JSON mode can wrap a plain-text answer in a string literal.
    const quoted = JsonValidator.extract(text, Validators.string);
    if (quoted.success && quoted.data !== undefined) return parseFindings(quoted.data);

    const lines = text.split(/\r?\n/).map(line => line.trim()).filter(line => line.length > 0);
    const findings: Finding[] = [];
    for (const line of lines) {
        const match = line.match(FINDING_LINE);
        if (!match) {
            throw new OracleMalformedResponseError(`Unrecognised oracle output: "${truncate(line)}"`, raw);
        }
        findings.push({ location: match[1].trim(), issue: match[2].trim(), remediation: match[3].trim() });
    }
    return findings;
}

function normalizeFinding(finding: Finding): Finding {
    return {
        location: finding.location.trim(),
        issue: finding.issue.trim(),
        remediation: finding.remediation.trim()
    };
}

function truncate(value: string, max: number = 80): string {
    return value.length > max ? `${value.slice(0, max)}...` : value;
}
