import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigurationError } from './errors';

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const DEFAULT_RESOURCES_DIR = fileURLToPath(new URL('../resources', import.meta.url));

const EnvironmentSchema = z.object({
    WORDSPLIT_RESOURCES_DIR: z.string().min(1).optional(),
    WORDSPLIT_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export interface Config {
    readonly resourcesDir: string;
    readonly logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const parsed = EnvironmentSchema.safeParse({
        WORDSPLIT_RESOURCES_DIR: env.WORDSPLIT_RESOURCES_DIR,
        WORDSPLIT_LOG_LEVEL: env.WORDSPLIT_LOG_LEVEL,
    });
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`);
    }

    return {
        resourcesDir: path.resolve(parsed.data.WORDSPLIT_RESOURCES_DIR ?? DEFAULT_RESOURCES_DIR),
        logLevel: parsed.data.WORDSPLIT_LOG_LEVEL ?? 'warn',
    };
}
