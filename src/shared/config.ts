/**
 * @file src/shared/config.ts
 * @description Handles persistent CLI configuration (.policylensrc.json) and merges it with the
 *              environment and command-line overrides.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_PORT, OPENAI_DEFAULT_ENDPOINT, OPENAI_DEFAULT_MODEL } from './analyzer-config';

export const CONFIG_FILENAME = '.policylensrc.json';

export const CONFIG_PATH = path.join(process.cwd(), CONFIG_FILENAME);

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const ConfigSchema = z
  .object({
    openaiApiKey: z.string().optional(),
    openaiModel: z.string().optional(),
    openaiEndpoint: z.string().optional(),
    port: z.number().int().positive().optional(),
    strict: z.boolean().optional(),
  })
  .strict();

export type PolicyLensConfig = z.infer<typeof ConfigSchema>;

const cleanUrl = (value?: string | null): string | undefined => {
  if (!value) return undefined;
  const trimmed = value.trim().replace(/\/+$/, '');
  return trimmed.length ? trimmed : undefined;
};

const normalizeKey = (value?: string | null): string | undefined => {
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
};

export const parsePort = (value?: string | null): number | undefined => {
  if (!value) return undefined;
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new ConfigError(`Invalid port '${value}'.`);
  }
  return port;
};

export const readConfig = (configPath: string = CONFIG_PATH): PolicyLensConfig => {
  if (!fs.existsSync(configPath)) {
    return {};
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`${configPath} is not valid JSON: ${reason}`);
  }
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`${configPath} is invalid: ${issues}`);
  }
  return parsed.data;
};

export const writeConfig = (
  update: Partial<PolicyLensConfig>,
  configPath: string = CONFIG_PATH,
): PolicyLensConfig => {
  const next: PolicyLensConfig = ConfigSchema.parse({
    ...readConfig(configPath),
    ...update,
  });
  fs.writeFileSync(configPath, JSON.stringify(next, null, 2), 'utf8');
  return next;
};

export interface AnalyzerConfigOverrides {
  apiKey?: string;
  model?: string;
  endpoint?: string;
  port?: number;
  strict?: boolean;
}

export interface ResolvedAnalyzerConfig {
  /** `null` selects the pattern extractor. */
  apiKey: string | null;
  model: string;
  endpoint: string;
  port: number;
  strict: boolean;
}

/**
 * Flags win over the environment, which wins over the config file.
 */
export const resolveAnalyzerConfig = (
  overrides: AnalyzerConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  configPath: string = CONFIG_PATH,
): ResolvedAnalyzerConfig => {
  const cfg = readConfig(configPath);
  return {
    apiKey:
      normalizeKey(overrides.apiKey) ??
      normalizeKey(env.OPENAI_API_KEY) ??
      normalizeKey(cfg.openaiApiKey) ??
      null,
    model:
      normalizeKey(overrides.model) ??
      normalizeKey(env.OPENAI_MODEL) ??
      normalizeKey(cfg.openaiModel) ??
      OPENAI_DEFAULT_MODEL,
    endpoint: cleanUrl(overrides.endpoint) ?? cleanUrl(cfg.openaiEndpoint) ?? OPENAI_DEFAULT_ENDPOINT,
    port: overrides.port ?? parsePort(env.PORT) ?? cfg.port ?? DEFAULT_PORT,
    strict: overrides.strict ?? (env.POLICY_LENS_STRICT === '1' || (cfg.strict ?? false)),
  };
};
