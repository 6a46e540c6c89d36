import { parseExpression } from 'cron-parser';
import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z
    .object({
        NODE_ENV: z
            .enum(['development', 'test', 'production'])
            .default('development'),
        LOG_LEVEL: z
            .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
            .optional(),

        // Node identity
        NODE_ID: z.string().min(1).optional(),

        // Coordination store
        DATABASE_URL: z.string().url().optional(),
        CLUSTERPROPS_TABLE: z
            .string()
            .regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/, 'must be a plain SQL identifier')
            .default('clusterprops_nodes'),
        CLUSTERPROPS_DOCUMENT_PATH: z
            .string()
            .startsWith('/', 'must be an absolute node path')
            .default('/clusterprops.json'),

        // Properties client
        CLUSTERPROPS_KNOWN_PROPERTIES: z
            .string()
            .optional()
            .transform((v) =>
                (v ?? '')
                    .split(',')
                    .map((name) => name.trim())
                    .filter((name) => name.length > 0)
            ),
        CLUSTERPROPS_MAX_ATTEMPTS: positiveInt.optional(),
        CLUSTERPROPS_DEADLINE_MS: positiveInt.optional(),

        // Scheduled disruption
        CLUSTERPROPS_GC_CRON: z.string().trim().min(1).optional(),
        CLUSTERPROPS_DISRUPTION_PATH: z
            .string()
            .startsWith('/', 'must be an absolute node path')
            .default('/disruptions'),
    })
    .superRefine((data, ctx) => {
        if (data.CLUSTERPROPS_GC_CRON) {
            try {
                parseExpression(data.CLUSTERPROPS_GC_CRON);
            } catch (err) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `not a valid cron expression (${err instanceof Error ? err.message : String(err)})`,
                    path: ['CLUSTERPROPS_GC_CRON'],
                });
            }
        }

        // Cross-process exclusion of scheduled disruptions needs a shared store
        if (data.NODE_ENV === 'production' && data.CLUSTERPROPS_GC_CRON && !data.DATABASE_URL) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: 'DATABASE_URL is required in production when CLUSTERPROPS_GC_CRON is set',
                path: ['DATABASE_URL'],
            });
        }
    });

export type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * Parses `env` without side effects, for callers that report failures themselves.
 */
export function parseEnv(env: NodeJS.ProcessEnv = process.env) {
    return EnvSchema.safeParse(env);
}

export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
    const result = parseEnv(env);
    if (!result.success) {
        const errors = result.error.issues
            .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
            .join('\n');
        console.error(`Environment validation failed:\n${errors}`);
        process.exit(1);
    }
    return result.data;
}
