import os from 'os';
import path from 'path';
import { z } from 'zod';

export const INSTANCE_COLUMNS = ['name', 'instance-id', 'private-ip', 'public-ip', 'state', 'type', 'az'] as const;
export type InstanceColumn = typeof INSTANCE_COLUMNS[number];

export const DEFAULT_COLUMNS: InstanceColumn[] = ['name', 'instance-id', 'private-ip', 'state'];

export const DEFAULT_WEIGHTS = {
    'name': 5,
    'instance-id': 4,
    'tag': 3,
    'ip': 2,
    'dns': 1
};

export function defaultConfigDir(home: string = os.homedir()): string {
    return path.join(home, '.aws-ssm');
}

const weightsSchema = z.object({
    'name': z.number().nonnegative().default(DEFAULT_WEIGHTS.name),
    'instance-id': z.number().nonnegative().default(DEFAULT_WEIGHTS['instance-id']),
    'tag': z.number().nonnegative().default(DEFAULT_WEIGHTS.tag),
    'ip': z.number().nonnegative().default(DEFAULT_WEIGHTS.ip),
    'dns': z.number().nonnegative().default(DEFAULT_WEIGHTS.dns)
});

/**
 * Schema of ~/.aws-ssm/config.yaml. Every section is optional and defaulted.
 */
export const configSchema = z.object({
    default: z.object({
        region: z.string().optional(),
        profile: z.string().optional(),
        columns: z.array(z.enum(INSTANCE_COLUMNS)).min(1).default([...DEFAULT_COLUMNS])
    }).default({}),
    cache: z.object({
        enabled: z.boolean().default(true),
        ttl_minutes: z.number().positive().default(5),
        cache_dir: z.string().default(path.join('~', '.aws-ssm', 'cache'))
    }).default({}),
    interactive: z.object({
        max_instances: z.number().int().positive().default(10_000),
        no_color: z.boolean().default(false),
        width: z.number().int().nonnegative().default(0),
        weights: weightsSchema.default({})
    }).default({})
});

export type AppConfig = z.infer<typeof configSchema>;
export type FieldWeights = z.infer<typeof weightsSchema>;

export function defaultConfig(): AppConfig {
    return configSchema.parse({});
}
