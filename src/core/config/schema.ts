/**
 * Configuration Zod schemas and validation.
 */
import { z } from 'zod';

export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'verbose']);

/**
 * Twelve-digit cloud account number.
 */
const AccountIdSchema = z
    .string()
    .regex(/^\d{12}$/, 'Account ID must be 12 digits');

/**
 * Region code such as `us-east-1` or `us-gov-west-1`.
 */
const RegionSchema = z
    .string()
    .regex(/^[a-z]{2}(-[a-z]+)+-\d+$/, 'Region must look like us-east-1');

export const LoggingSchema = z.object({
    level: LogLevelSchema.default('info'),
    file: z.string().min(1).nullable().default(null),
});

export const RemoteSchema = z.object({
    endpoint: z.string().url('Endpoint must be a URL').optional(),
    maxAttempts: z.coerce
        .number()
        .int()
        .min(1, 'maxAttempts must be at least 1')
        .max(10, 'maxAttempts must be at most 10')
        .default(3),
});

/**
 * Full resolved configuration.
 *
 * A missing passphrase leaves the file store in plaintext.
 */
export const ConfigSchema = z.object({
    accountId: AccountIdSchema,
    region: RegionSchema,
    stateDir: z.string().min(1, 'State directory is required'),
    passphrase: z.string().min(1, 'Passphrase must not be empty').optional(),
    logging: LoggingSchema.default({}),
    remote: RemoteSchema.default({}),
});

// ─────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────

/**
 * Error thrown when config validation fails.
 *
 * Includes the specific field that failed and all validation issues.
 */
export class ConfigValidationError extends Error {

    override readonly name = 'ConfigValidationError' as const;

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(message);

    }

}

/**
 * Parse and validate config, returning defaults for missing fields.
 *
 * @example
 * ```typescript
 * const config = parseConfig({
 *     accountId: '123456789012',
 *     region: 'us-east-1',
 *     stateDir: '/home/me/.stagecraft',
 * })
 * // config.logging.level === 'info'
 * // config.remote.maxAttempts === 3
 * ```
 */
export function parseConfig(config: unknown): z.infer<typeof ConfigSchema> {

    const result = ConfigSchema.safeParse(config);

    if (!result.success) {

        const firstIssue = result.error.issues[0];
        const field = firstIssue?.path.join('.') || 'unknown';

        throw new ConfigValidationError(
            `Invalid config ${field}: ${firstIssue?.message ?? 'validation failed'}`,
            field,
            result.error.issues,
        );

    }

    return result.data;

}
