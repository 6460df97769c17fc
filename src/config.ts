/**
 * Translator configuration read from the environment.
 *
 * Recognised variables:
 *   CLIF_FORMAT     tptp | ladr
 *   CLIF_FFPCNF     true | false | 1 | 0
 *   CLIF_LOG_LEVEL  silent | error | warn | info | debug
 */

import { z } from 'zod';
import { DEFAULTS } from './types/options.js';
import type { TranslatorConfig } from './types/options.js';
import { createConfigError } from './types/errors.js';

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform(value => value === 'true' || value === '1');

const configSchema = z.object({
    CLIF_FORMAT: z.enum(['tptp', 'ladr']).default(DEFAULTS.format),
    CLIF_FFPCNF: booleanFlag.optional(),
    CLIF_LOG_LEVEL: z.enum(['silent', 'error', 'warn', 'info', 'debug']).default(DEFAULTS.logLevel),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TranslatorConfig {
    const parsed = configSchema.safeParse({
        CLIF_FORMAT: env.CLIF_FORMAT || undefined,
        CLIF_FFPCNF: env.CLIF_FFPCNF || undefined,
        CLIF_LOG_LEVEL: env.CLIF_LOG_LEVEL || undefined,
    });

    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw createConfigError(`${issue.path.join('.')}: ${issue.message}`, {
            issues: parsed.error.issues.map(i => ({ path: i.path.join('.'), message: i.message })),
        });
    }

    return {
        format: parsed.data.CLIF_FORMAT,
        ffpcnf: parsed.data.CLIF_FFPCNF ?? DEFAULTS.ffpcnf,
        logLevel: parsed.data.CLIF_LOG_LEVEL,
    };
}
