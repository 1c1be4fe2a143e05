/**
 * Environment Variable Loader
 *
 * Reads KEY=VALUE pairs from a .env file into process.env. Comments, blank
 * lines, quoted values and inline comments on unquoted values are supported.
 * Variables already present in the environment win unless `override` is set.
 */

import { readFileSync, existsSync } from 'fs';

export interface LoadEnvOptions {
    /** Path to .env file (default: '.env') */
    path?: string;
    /** Override existing env vars (default: false) */
    override?: boolean;
    /** Target environment (default: process.env) */
    env?: NodeJS.ProcessEnv;
}

/**
 * Parse .env file content into ordered key/value entries
 */
export function parseEnv(content: string): Array<[string, string]> {
    const entries: Array<[string, string]> = [];

    for (const line of content.split(/\r?\n/)) {
        const trimmed = line.trim();

        if (!trimmed || trimmed.startsWith('#')) {
            continue;
        }

        const eqIndex = trimmed.indexOf('=');
        if (eqIndex <= 0) {
            continue;
        }

        const key = trimmed.slice(0, eqIndex).trim();
        let value = trimmed.slice(eqIndex + 1).trim();

        const quoted = value.length >= 2 &&
            ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")));

        if (quoted) {
            value = value.slice(1, -1);
        } else {
            const hashIndex = value.indexOf('#');
            if (hashIndex !== -1) {
                value = value.slice(0, hashIndex).trim();
            }
        }

        entries.push([key, value]);
    }

    return entries;
}

/**
 * Load environment variables from a .env file
 *
 * @returns number of variables written
 */
export function loadEnv(options: LoadEnvOptions = {}): number {
    const { path = '.env', override = false, env = process.env } = options;

    if (!existsSync(path)) {
        return 0;
    }

    let loaded = 0;
    for (const [key, value] of parseEnv(readFileSync(path, 'utf-8'))) {
        if (env[key] !== undefined && !override) {
            continue;
        }

        env[key] = value;
        loaded++;
    }

    return loaded;
}
