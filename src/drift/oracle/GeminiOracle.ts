import { GoogleGenAI } from '@google/genai';
import { ConfigurationError, OracleMalformedResponseError, OracleUnavailableError, errorMessage } from '../../shared/errors.js';
import { DRIFT_DEFAULTS } from '../config/constants.js';
import type { Finding, Oracle, OracleContext } from '../types.js';
import { parseFindings } from './parseFindings.js';
import { DRIFT_PROMPT, buildPrompt } from './prompt.js';

export interface GeminiOracleOptions {
    apiKey: string;
    model?: string;
    /**
     * Replaces the built-in drift instructions. The answer is then requested
     * as plain text (`- location: issue → fix` lines).
     */
    prompt?: string;
}

/**
 * Vision oracle backed by Gemini: both screenshots go inline, the answer is
 * validated before it leaves this class.
 */
export class GeminiOracle implements Oracle {
    private ai: GoogleGenAI;
    private model: string;
    private prompt: string;
    private responseMimeType: string;

    constructor(options: GeminiOracleOptions) {
        if (!options.apiKey) {
            throw new ConfigurationError('GEMINI_API_KEY environment variable is not set');
        }
        this.ai = new GoogleGenAI({ apiKey: options.apiKey });
        this.model = options.model ?? DRIFT_DEFAULTS.MODEL;
        this.prompt = options.prompt ?? DRIFT_PROMPT;
        this.responseMimeType = options.prompt === undefined ? 'application/json' : 'text/plain';
    }

    async compare(source: Buffer, target: Buffer, context: OracleContext): Promise<Finding[]> {
        let text: string | undefined;
        try {
            const response = await this.ai.models.generateContent({
                model: this.model,
                contents: [
                    {
                        role: 'user',
                        parts: [
                            { inlineData: { mimeType: 'image/png', data: source.toString('base64') } },
                            { inlineData: { mimeType: 'image/png', data: target.toString('base64') } },
                            { text: buildPrompt(context, this.prompt) }
                        ]
                    }
                ],
                config: {
                    temperature: 0,
                    responseMimeType: this.responseMimeType
                }
            });
            text = response.text;
        } catch (error) {
            throw new OracleUnavailableError(`Gemini request failed: ${errorMessage(error)}`, { model: this.model });
        }

        if (text === undefined) {
            throw new OracleMalformedResponseError('Gemini response contained no text');
        }
        return parseFindings(text);
    }
}
