// src/config.ts

import { z } from 'zod';
import { SeverityDistribution } from './simulation/sampleWorkloads';

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    LOAD_TEST_SEED: z.coerce.number().int().default(12345),
    LOAD_TEST_DISTRIBUTION: z.nativeEnum(SeverityDistribution).default(SeverityDistribution.UNIFORM)
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Read settings from the environment
 *
 * @throws ZodError when a variable is set to an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    return envSchema.parse(env);
}
