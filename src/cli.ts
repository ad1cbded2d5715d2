#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { createProgram } from './drift/cli/program.js';
import { readEnvDefaults } from './drift/config/RunConfig.js';
import { ConfigurationError } from './shared/errors.js';

dotenv.config();

/**
 * Exit 0 when a run completes, whatever it found; exit 1 when it could not
 * start (bad arguments, unreadable input, missing API key).
 */
export async function main(argv: string[] = process.argv): Promise<number> {
    try {
        await createProgram(readEnvDefaults()).parseAsync(argv);
        return 0;
    } catch (error) {
        if (error instanceof ConfigurationError) {
            console.error(`[locale-drift] ${error.message}`);
            return 1;
        }
        throw error;
    }
}

try {
    process.exitCode = await main();
} catch (error) {
    console.error('[locale-drift] Unexpected failure:', error);
    process.exitCode = 1;
}
