/**
 * Configuration — ~/.deskpilot/config.yml
 *
 * A missing file means defaults. Environment variables override the file.
 * validateConfig() returns every problem at once; callers decide whether
 * to exit.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parse as yamlParse, stringify as yamlStringify } from 'yaml';
import { ConfigError, errorMessage } from './errors.js';

export const CHANNEL_TYPES = ['prompt', 'webhook'] as const;
export const AUDIT_BACKENDS = ['jsonl', 'sqlite'] as const;

export interface PlannerConfig {
  base_url: string;
  model: string;
  /** Name of the environment variable holding the API key. */
  api_key_env: string;
  max_tokens: number;
  temperature: number;
}

export interface AuditConfig {
  backend: string;
  path: string;
  redact: boolean;
}

export interface DeskpilotConfig {
  version: string;
  channel: string;
  webhook?: {
    url: string;
    secret?: string;
  };
  planner: PlannerConfig;
  /** Added to the built-in protected set. */
  protected_apps: string[];
  /** Names of the app hosting deskpilot; protected too. */
  host_apps: string[];
  audit: AuditConfig;
}

type Env = Record<string, string | undefined>;

export function deskpilotHome(env: Env = process.env): string {
  return env.DESKPILOT_HOME || path.join(os.homedir(), '.deskpilot');
}

export function configPath(home: string): string {
  return path.join(home, 'config.yml');
}

export function defaultConfig(home: string): DeskpilotConfig {
  return {
    version: '1',
    channel: 'prompt',
    planner: {
      base_url: 'http://127.0.0.1:1234/v1',
      model: 'gpt-4o-mini',
      api_key_env: 'OPENAI_API_KEY',
      max_tokens: 512,
      temperature: 0,
    },
    protected_apps: [],
    host_apps: [],
    audit: {
      backend: 'jsonl',
      path: path.join(home, 'audit.jsonl'),
      redact: true,
    },
  };
}

export function loadConfig(home: string = deskpilotHome(), env: Env = process.env): DeskpilotConfig {
  const file = configPath(home);
  const config = fs.existsSync(file)
    ? parseConfig(fs.readFileSync(file, 'utf-8'), home)
    : defaultConfig(home);
  return applyEnvOverrides(config, env);
}

/** loadConfig() followed by validateConfig(); throws ConfigError listing every problem. */
export function loadValidConfig(home: string = deskpilotHome(), env: Env = process.env): DeskpilotConfig {
  const config = loadConfig(home, env);
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
  return config;
}

export function parseConfig(content: string, home: string): DeskpilotConfig {
  const defaults = defaultConfig(home);
  let parsed: Partial<DeskpilotConfig>;
  try {
    parsed = (yamlParse(content) ?? {}) as Partial<DeskpilotConfig>;
  } catch (err) {
    throw new ConfigError([`config.yml is not valid YAML: ${errorMessage(err)}`]);
  }

  const config: DeskpilotConfig = {
    ...defaults,
    ...parsed,
    planner: { ...defaults.planner, ...parsed.planner },
    audit: { ...defaults.audit, ...parsed.audit },
    protected_apps: parsed.protected_apps ?? defaults.protected_apps,
    host_apps: parsed.host_apps ?? defaults.host_apps,
  };
  if (typeof config.audit.path === 'string') {
    config.audit.path = expandHome(config.audit.path);
  }
  return config;
}

export function saveConfig(home: string, config: DeskpilotConfig): string {
  fs.mkdirSync(home, { recursive: true });
  const file = configPath(home);
  fs.writeFileSync(file, yamlStringify(config), 'utf-8');
  return file;
}

export function applyEnvOverrides(config: DeskpilotConfig, env: Env): DeskpilotConfig {
  const extraProtected = (env.DESKPILOT_PROTECTED_APPS ?? '')
    .split(',')
    .map((name) => name.trim())
    .filter(Boolean);

  return {
    ...config,
    planner: {
      ...config.planner,
      base_url: env.DESKPILOT_LLM_BASE_URL || config.planner.base_url,
      model: env.DESKPILOT_LLM_MODEL || config.planner.model,
      max_tokens: readPositiveIntEnv(env, 'DESKPILOT_LLM_MAX_TOKENS', config.planner.max_tokens),
    },
    // A malformed file value is left for validateConfig() to report.
    protected_apps: extraProtected.length > 0 && Array.isArray(config.protected_apps)
      ? [...config.protected_apps, ...extraProtected]
      : config.protected_apps,
  };
}

/** A positive integer from the environment, or the fallback. */
export function readPositiveIntEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

export function validateConfig(config: DeskpilotConfig): string[] {
  const errors: string[] = [];

  if (!isOneOf(CHANNEL_TYPES, config.channel)) {
    errors.push(`Invalid channel: "${config.channel}". Must be one of: ${CHANNEL_TYPES.join(', ')}`);
  }
  if (config.channel === 'webhook') {
    if (!config.webhook?.url) {
      errors.push('webhook.url is required for the webhook channel');
    } else if (!isHttpUrl(config.webhook.url)) {
      errors.push(`webhook.url is not an http(s) URL: "${config.webhook.url}"`);
    }
  }

  const { planner } = config;
  if (typeof planner.base_url !== 'string' || !isHttpUrl(planner.base_url)) {
    errors.push(`planner.base_url is not an http(s) URL: "${String(planner.base_url)}"`);
  }
  if (typeof planner.model !== 'string' || !planner.model.trim()) {
    errors.push('planner.model must be a non-empty string');
  }
  if (typeof planner.api_key_env !== 'string') {
    errors.push('planner.api_key_env must be a string');
  }
  if (!Number.isInteger(planner.max_tokens) || planner.max_tokens <= 0) {
    errors.push('planner.max_tokens must be a positive integer');
  }
  if (typeof planner.temperature !== 'number' || planner.temperature < 0 || planner.temperature > 2) {
    errors.push('planner.temperature must be a number between 0 and 2');
  }

  for (const key of ['protected_apps', 'host_apps'] as const) {
    const value: unknown = config[key];
    if (!Array.isArray(value) || !value.every((name) => typeof name === 'string')) {
      errors.push(`"${key}" must be a list of app names`);
    }
  }

  if (!isOneOf(AUDIT_BACKENDS, config.audit.backend)) {
    errors.push(`Invalid audit.backend: "${config.audit.backend}". Must be one of: ${AUDIT_BACKENDS.join(', ')}`);
  }
  if (typeof config.audit.path !== 'string' || !config.audit.path.trim()) {
    errors.push('audit.path must be a non-empty string');
  }
  if (typeof config.audit.redact !== 'boolean') {
    errors.push('audit.redact must be true or false');
  }

  return errors;
}

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return values.some((v) => v === value);
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function expandHome(p: string): string {
  return p === '~' || p.startsWith('~/') ? path.join(os.homedir(), p.slice(1)) : p;
}
