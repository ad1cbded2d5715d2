import { describe, it, expect, beforeEach, vi } from 'vitest';

const { generateContent, constructed } = vi.hoisted(() => {
    const constructed: unknown[] = [];
    return { generateContent: vi.fn(), constructed };
});

vi.mock('@google/genai', () => ({
    GoogleGenAI: class MockGoogleGenAI {
        models = { generateContent };

        constructor(options: unknown) {
            constructed.push(options);
        }
    }
}));

import { GeminiOracle } from '../../src/drift/oracle/GeminiOracle.js';
import { buildPrompt } from '../../src/drift/oracle/prompt.js';
import { ConfigurationError, OracleMalformedResponseError, OracleUnavailableError } from '../../src/shared/errors.js';

const context = { sourceLocale: 'en', targetLocale: 'es', artifactName: 'screen_003.png' };

describe('GeminiOracle', () => {
    beforeEach(() => {
        generateContent.mockReset();
        constructed.length = 0;
    });

    it('should require an API key', () => {
        expect(() => new GeminiOracle({ apiKey: '' })).toThrow(ConfigurationError);
        expect(() => new GeminiOracle({ apiKey: '' })).toThrow('GEMINI_API_KEY environment variable is not set');
    });

    it('should send both screenshots inline with the drift prompt', async () => {
        generateContent.mockResolvedValue({ text: '[]' });
        const oracle = new GeminiOracle({ apiKey: 'test-secret' });

        const findings = await oracle.compare(Buffer.from('src'), Buffer.from('tgt'), context);

        expect(findings).toEqual([]);
        expect(constructed).toEqual([{ apiKey: 'test-secret' }]);
        expect(generateContent).toHaveBeenCalledWith({
            model: 'gemini-2.5-flash',
            contents: [
                {
                    role: 'user',
                    parts: [
                        { inlineData: { mimeType: 'image/png', data: 'c3Jj' } },
                        { inlineData: { mimeType: 'image/png', data: 'dGd0' } },
                        { text: buildPrompt(context) }
                    ]
                }
            ],
            config: { temperature: 0, responseMimeType: 'application/json' }
        });
    });

    it('should use the configured model and prompt', async () => {
        generateContent.mockResolvedValue({ text: '[]' });
        const oracle = new GeminiOracle({ apiKey: 'test-secret', model: 'gemini-2.5-pro', prompt: 'Compare.' });

        await oracle.compare(Buffer.from('a'), Buffer.from('b'), context);

        const request = generateContent.mock.calls[0][0];
        expect(request.model).toBe('gemini-2.5-pro');
        expect(request.contents[0].parts[2]).toEqual({ text: buildPrompt(context, 'Compare.') });
        expect(request.config).toEqual({ temperature: 0, responseMimeType: 'text/plain' });
    });

    it('should read plain-text answers to a custom prompt', async () => {
        generateContent.mockResolvedValue({ text: '- Nav: Menu label cut off → Wrap the label\n' });
        const oracle = new GeminiOracle({ apiKey: 'test-secret', prompt: 'Compare.' });

        expect(await oracle.compare(Buffer.from('a'), Buffer.from('b'), context)).toEqual([
            { location: 'Nav', issue: 'Menu label cut off', remediation: 'Wrap the label' }
        ]);
    });

    it('should parse findings from the response text', async () => {
        generateContent.mockResolvedValue({
            text: '[{"location": "Price label", "issue": "Overflows card", "remediation": "Shorten the string"}]'
        });
        const oracle = new GeminiOracle({ apiKey: 'test-secret' });

        expect(await oracle.compare(Buffer.from('a'), Buffer.from('b'), context)).toEqual([
            { location: 'Price label', issue: 'Overflows card', remediation: 'Shorten the string' }
        ]);
    });

    it('should map request failures to OracleUnavailableError', async () => {
        generateContent.mockRejectedValue(new Error('quota exceeded'));
        const oracle = new GeminiOracle({ apiKey: 'test-secret' });

        const result = oracle.compare(Buffer.from('a'), Buffer.from('b'), context);

        await expect(result).rejects.toThrow(OracleUnavailableError);
        await expect(result).rejects.toThrow('Gemini request failed: quota exceeded');
    });

    it('should reject a response without text', async () => {
        generateContent.mockResolvedValue({ text: undefined });
        const oracle = new GeminiOracle({ apiKey: 'test-secret' });

        await expect(oracle.compare(Buffer.from('a'), Buffer.from('b'), context))
            .rejects.toThrow(OracleMalformedResponseError);
    });
});
