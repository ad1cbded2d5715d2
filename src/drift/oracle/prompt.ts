import type { OracleContext } from '../types.js';

export const NO_ISSUES_RESPONSE = 'No localization issues detected.';

/**
 * Instructions sent with every (source, target) screenshot pair.
 * The first image is always the source locale, the second the target.
 */
export const DRIFT_PROMPT = `You review localized user interfaces. You receive two screenshots of the same screen:
the FIRST image is rendered in the source locale, the SECOND in a translated target locale.

Screens may come from automated crawling. Do not report interaction states that are expected:
open keyboards, focused inputs, open menus or pickers, dialogs or sheets, loading spinners,
partially loaded content, scroll positions or screens captured mid-transition.

Report only drift introduced by localization, judged against the source screenshot:
- truncated text that fits in the source
- text overflowing its container or overlapping neighbours
- elements misaligned, resized or broken only in the target
- strings left untranslated in the target language
- icons, buttons or images clipped because the translation is longer
- spacing or alignment changes that point to hard-coded sizes
- right-to-left mirroring mistakes when the target locale is RTL
- content present in the source and absent in the target

Report high-confidence issues only.

Respond with JSON only, an array of objects with exactly these string fields:
[{"location": "<element or screen area>", "issue": "<what is wrong>", "remediation": "<concrete fix a developer can apply>"}]
Respond with [] when there is nothing to report.`;

export function buildPrompt(context: OracleContext, basePrompt: string = DRIFT_PROMPT): string {
    return `${basePrompt}

Source locale: ${context.sourceLocale}
Target locale: ${context.targetLocale}
Screen: ${context.artifactName}`;
}
