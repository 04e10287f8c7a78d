import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import yaml from 'js-yaml';
import type { z } from 'zod';
import { AnalysisCatalogSchema, SystemConfigSchema } from './schema';
import type { AnalysisCatalog } from './types';

export type SystemConfig = z.infer<typeof SystemConfigSchema>;

export const CONFIG_ENV_VAR = 'TABULAR_GUARD_CONFIG';

export const DEFAULT_CONFIG_PATH = 'config/tabular-guard.yaml';
export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../../metadata/analyses.yaml', import.meta.url));

const isMissingFile = (err: unknown): boolean =>
    err instanceof Error && 'code' in err && err.code === 'ENOENT';

export class MetadataLoader {
    async loadConfig(path?: string): Promise<SystemConfig> {
        const target = path ?? (process.env[CONFIG_ENV_VAR] || DEFAULT_CONFIG_PATH);
        let text: string;
        try {
            text = await this.readText(target);
        } catch (e) {
            if (!isMissingFile(e)) throw e;
            console.warn(`[MetadataLoader] Could not find ${target}, using built-in defaults`);
            return SystemConfigSchema.parse({});
        }

        // An empty YAML document loads as undefined
        const data = yaml.load(text) ?? {};
        return SystemConfigSchema.parse(data);
    }

    async loadAnalysisCatalog(path: string = DEFAULT_CATALOG_PATH): Promise<AnalysisCatalog> {
        try {
            const text = await this.readText(path);
            return AnalysisCatalogSchema.parse(yaml.load(text));
        } catch (e) {
            console.error(`[MetadataLoader] Failed to load analysis catalog ${path}`, e);
            throw e;
        }
    }

    protected async readText(path: string): Promise<string> {
        return readFile(path, 'utf-8');
    }
}
