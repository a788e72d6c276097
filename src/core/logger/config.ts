/**
 * Logger Configuration
 *
 * Zod schema, YAML loading, and the LogConfig wrapper that owns the
 * derived redaction and critical-category caches.
 *
 * Values are frozen once validated. Only the dispatcher's threshold
 * changes at runtime, and it lives on the Logger, not here.
 *
 * @example
 * ```typescript
 * const config = await loadConfigFile('./loglane.yml')
 *
 * config.values.maxFiles          // 5
 * config.criticalCategorySet      // Set { 'Network' }
 * ```
 */
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { parse as parseYaml } from 'yaml';
import { attempt, attemptSync } from '@logosdx/utils';

import { compileRedactionPatterns } from './redact.js';
import { LOG_LEVEL_PRIORITY, type MinLevel } from './types.js';

// ─────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────

const MinLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);

/**
 * Complete logger configuration schema.
 */
export const LogConfigSchema = z.object({
    minLevel: MinLevelSchema.default('info'),
    releaseMinLevel: MinLevelSchema.default('error'),

    enableAsync: z.boolean().default(true),
    queueSize: z.number().int().min(1, 'Queue size must be at least 1').default(1000),

    enableConsole: z.boolean().default(true),
    enableStackTrace: z.boolean().default(true),

    enableFileOutput: z.boolean().default(false),
    logDirectory: z.string().min(1, 'Log directory is required').default('logs'),
    fileNamePrefix: z
        .string()
        .regex(/^[\w-]+$/, 'File name prefix may only contain letters, digits, "_" and "-"')
        .default('app'),
    maxFileSizeMB: z.number().positive('Max file size must be positive').default(10),
    maxFiles: z.number().int().min(1).default(5),
    enableCompression: z.boolean().default(true),
    enableFileStackTrace: z.boolean().default(false),

    criticalCategories: z.array(z.string()).default([]),

    enablePerformanceLogging: z.boolean().default(false),
    performanceLogInterval: z.number().positive().default(1),

    enableSensitiveFilter: z.boolean().default(true),
    sensitiveKeywords: z.array(z.string()).default(['password', 'token', 'key']),
});

/**
 * Validated configuration values.
 */
export type LogConfigValues = z.infer<typeof LogConfigSchema>;

/**
 * Configuration as written by users (every field optional).
 */
export type LogConfigInput = z.input<typeof LogConfigSchema>;

/**
 * Validated values as held by LogConfig, with frozen lists.
 */
export type FrozenConfigValues = Readonly<
    Omit<LogConfigValues, 'criticalCategories' | 'sensitiveKeywords'>
> & {
    readonly criticalCategories: readonly string[];
    readonly sensitiveKeywords: readonly string[];
};

// ─────────────────────────────────────────────────────────────
// Validation Error
// ─────────────────────────────────────────────────────────────

/**
 * Error thrown when configuration validation fails.
 */
export class ConfigValidationError extends Error {

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(message);
        this.name = 'ConfigValidationError';

    }

}

// ─────────────────────────────────────────────────────────────
// LogConfig
// ─────────────────────────────────────────────────────────────

/**
 * Immutable logger configuration plus its lazily derived caches.
 *
 * The caches are rebuilt on first access after `clearCache()`. Because
 * the keyword and category lists are frozen, a rebuilt cache is always
 * identical to the one it replaces.
 */
export class LogConfig {

    readonly values: FrozenConfigValues;

    #redactionPatterns: ReadonlyMap<string, RegExp> | null = null;
    #criticalCategorySet: ReadonlySet<string> | null = null;

    constructor(values: LogConfigValues) {

        this.values = Object.freeze({
            ...values,
            criticalCategories: Object.freeze([...values.criticalCategories]),
            sensitiveKeywords: Object.freeze([...values.sensitiveKeywords]),
        });

    }

    /**
     * Keyword → compiled `keyword=\S+` pattern, in declaration order.
     */
    get redactionPatterns(): ReadonlyMap<string, RegExp> {

        if (!this.#redactionPatterns) {

            this.#redactionPatterns = compileRedactionPatterns(this.values.sensitiveKeywords);

        }

        return this.#redactionPatterns;

    }

    /**
     * Categories exempt from the minimum-level filter.
     */
    get criticalCategorySet(): ReadonlySet<string> {

        if (!this.#criticalCategorySet) {

            this.#criticalCategorySet = new Set(
                this.values.criticalCategories.filter((category) => category.length > 0),
            );

        }

        return this.#criticalCategorySet;

    }

    /**
     * Whether both caches are currently built.
     */
    get isCached(): boolean {

        return this.#redactionPatterns !== null && this.#criticalCategorySet !== null;

    }

    /**
     * Drop both derived caches.
     */
    clearCache(): void {

        this.#redactionPatterns = null;
        this.#criticalCategorySet = null;

    }

    /**
     * Threshold to latch at initialization.
     *
     * Release builds use the stricter of `minLevel` and `releaseMinLevel`.
     */
    effectiveMinLevel(release: boolean): MinLevel {

        const { minLevel, releaseMinLevel } = this.values;

        if (release && LOG_LEVEL_PRIORITY[releaseMinLevel] > LOG_LEVEL_PRIORITY[minLevel]) {

            return releaseMinLevel;

        }

        return minLevel;

    }

    /**
     * Maximum file size in bytes before rotation.
     */
    get maxFileSizeBytes(): number {

        return this.values.maxFileSizeMB * 1024 * 1024;

    }

}

// ─────────────────────────────────────────────────────────────
// Parsing / Loading
// ─────────────────────────────────────────────────────────────

/**
 * Validate raw configuration and wrap it.
 *
 * @throws ConfigValidationError if validation fails
 *
 * @example
 * ```typescript
 * const config = parseConfig({ minLevel: 'debug', enableAsync: false })
 * config.values.queueSize // 1000 (default)
 * ```
 */
export function parseConfig(raw: unknown): LogConfig {

    const result = LogConfigSchema.safeParse(raw ?? {});

    if (!result.success) {

        const firstIssue = result.error.issues[0];

        throw new ConfigValidationError(
            firstIssue?.message ?? 'Logger configuration validation failed',
            firstIssue?.path.join('.') || 'unknown',
            result.error.issues,
        );

    }

    return new LogConfig(applyEnvOverrides(result.data));

}

/**
 * Build a configuration from defaults plus overrides.
 */
export function createConfig(overrides: LogConfigInput = {}): LogConfig {

    return parseConfig(overrides);

}

/**
 * Load configuration from a YAML file.
 *
 * A missing file yields the defaults. Invalid YAML or schema
 * violations throw.
 *
 * @throws ConfigValidationError if the file content is invalid
 */
export async function loadConfigFile(filepath: string): Promise<LogConfig> {

    const [content, readErr] = await attempt(() => readFile(filepath, 'utf-8'));

    if (readErr) {

        if (isMissingFile(readErr)) {

            return parseConfig({});

        }

        throw new Error(`Failed to read logger config ${filepath}: ${readErr.message}`);

    }

    const [parsed, parseErr] = attemptSync((): unknown => parseYaml(content));

    if (parseErr) {

        throw new ConfigValidationError(`Invalid YAML: ${parseErr.message}`, 'unknown', []);

    }

    return parseConfig(parsed);

}

/**
 * Apply `LOGLANE_MIN_LEVEL` when it names a valid threshold.
 */
function applyEnvOverrides(values: LogConfigValues): LogConfigValues {

    const override = MinLevelSchema.safeParse(process.env['LOGLANE_MIN_LEVEL']?.toLowerCase());

    if (!override.success) {

        return values;

    }

    return { ...values, minLevel: override.data };

}

function isMissingFile(err: Error): boolean {

    return 'code' in err && err.code === 'ENOENT';

}
