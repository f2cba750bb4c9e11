import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { NormalizerDictionaries, ReplacementDictionary, ResolverOptions } from '../types';
import { ConfigurationError } from '../utils/errors';

// Key order is application order; js-yaml keeps it.
const DictionarySchema = z.record(z.string().min(1), z.array(z.string().min(1)).min(1));

const SpecialEndingSchema = z.string().min(1).refine(source => {
    try {
        new RegExp(source);
        return true;
    } catch {
        return false;
    }
}, { message: 'must be a valid regular expression' });

export const ConfigSchema = z.object({
    normalizer: z.object({
        abbreviations: DictionarySchema,
        city_dash: DictionarySchema,
        punctuations: z.array(z.string().length(1)),
    }),
    resolver: z.object({
        special_ending: SpecialEndingSchema,
        sentinel: z.string().min(1).default(','),
        dangling_qualifiers: z.array(z.string().min(1)).default([]),
    }),
    gazetteer: z.object({
        path: z.string().min(1),
    }),
});

export type Config = z.infer<typeof ConfigSchema>;

export const PROJECT_ROOT = path.join(__dirname, '../..');
const DEFAULT_CONFIG_PATH = path.join(PROJECT_ROOT, 'src/config/default.yaml');

let configInstance: Config | null = null;

export const parseConfig = (raw: unknown, source = 'config'): Config => {
    const parsed = ConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
        throw new ConfigurationError(`Invalid ${source}: ${issues.join('; ')}`, { issues });
    }
    return parsed.data;
};

export const loadConfig = (configPath?: string): Config => {
    if (configInstance && !configPath) return configInstance;

    const validPath = configPath || DEFAULT_CONFIG_PATH;
    let fileContents: string;
    try {
        fileContents = fs.readFileSync(validPath, 'utf8');
    } catch (e: unknown) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigurationError(`Cannot read config ${validPath}: ${reason}`, { path: validPath });
    }

    configInstance = parseConfig(yaml.load(fileContents), validPath);
    return configInstance;
};

export const getConfig = (): Config => {
    if (!configInstance) {
        return loadConfig(); // Auto-load default
    }
    return configInstance;
};

export const resetConfig = (): void => {
    configInstance = null;
};

/** Relative paths in the config are relative to the project root, not the cwd. */
export const resolveProjectPath = (p: string): string =>
    path.isAbsolute(p) ? p : path.join(PROJECT_ROOT, p);

const toDictionary = (record: Record<string, string[]>): ReplacementDictionary =>
    Object.entries(record).map(([canonical, variants]) => [canonical, [...variants]] as const);

export const toNormalizerDictionaries = (config: Config): NormalizerDictionaries => ({
    abbreviations: toDictionary(config.normalizer.abbreviations),
    cityDash: toDictionary(config.normalizer.city_dash),
    punctuations: [...config.normalizer.punctuations]
});

export const toResolverOptions = (config: Config): ResolverOptions => ({
    specialEnding: config.resolver.special_ending,
    sentinel: config.resolver.sentinel,
    danglingQualifiers: [...config.resolver.dangling_qualifiers]
});
