import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import { InvalidArgumentError } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getTubewatchDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  youtube: z
    .object({
      api_key: z.string().default(''),
      api_base: z.string().default('https://www.googleapis.com/youtube/v3'),
      watch_url_template: z.string().default('https://www.youtube.com/watch?v={id}'),
      timeout_ms: z.number().int().positive().default(15000),
    })
    .default({}),

  email: z
    .object({
      smtp_host: z.string().default('smtp.gmail.com'),
      smtp_port: z.number().int().positive().default(587),
      smtp_user: z.string().default(''),
      smtp_pass: z.string().default(''),
      from: z.string().default(''),
      to: z.string().default(''),
      subject: z.string().default('A new video has been uploaded'),
      timeout_ms: z.number().int().positive().default(20000),
    })
    .default({}),

  registry: z
    .object({
      path: z.string().default('~/.tubewatch/data.json'),
    })
    .default({}),

  run: z
    .object({
      concurrency: z.number().int().min(1).max(16).default(1),
    })
    .default({}),

  schedule: z
    .object({
      cron: z.string().default('*/30 * * * *'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

export function defaultConfigPath(): string {
  return path.join(getTubewatchDir(), 'config.yaml');
}

function asRecord(value: unknown): Record<string, unknown> {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

/**
 * Environment variables override the file for credentials and recipient.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const apiKey = env['TUBEWATCH_YOUTUBE_API_KEY'];
  const smtpUser = env['TUBEWATCH_SMTP_USER'];
  const smtpPass = env['TUBEWATCH_SMTP_PASS'];
  const emailTo = env['TUBEWATCH_EMAIL_TO'];

  const merged = { ...rawConfig };

  if (apiKey) {
    merged['youtube'] = { ...asRecord(rawConfig['youtube']), api_key: apiKey };
  }

  if (smtpUser || smtpPass || emailTo) {
    const email = { ...asRecord(rawConfig['email']) };
    if (smtpUser) email['smtp_user'] = smtpUser;
    if (smtpPass) email['smtp_pass'] = smtpPass;
    if (emailTo) email['to'] = emailTo;
    merged['email'] = email;
  }

  return merged;
}

/**
 * commander argument parser for `--concurrency`, bounded like `run.concurrency`.
 */
export function parseConcurrency(value: string): number {
  const parsed = ConfigSchema.shape.run.removeDefault().shape.concurrency.safeParse(Number(value));
  if (!parsed.success) {
    throw new InvalidArgumentError('Expected an integer between 1 and 16.');
  }
  return parsed.data;
}

export function parseConfig(rawConfig: unknown): Config {
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

export async function loadConfig(): Promise<Config> {
  const explorer = cosmiconfig('tubewatch', {
    searchPlaces: [
      'tubewatch.config.yaml',
      'tubewatch.config.yml',
      '.tubewatchrc.yaml',
      '.tubewatchrc.yml',
    ],
  });

  const envConfigPath = process.env['TUBEWATCH_CONFIG'];
  const fallbackPath = defaultConfigPath();

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = asRecord(result?.config);
  } else if (fs.existsSync(fallbackPath)) {
    const result = await explorer.load(fallbackPath);
    rawConfig = asRecord(result?.config);
  } else {
    logger.debug('No config file found, using defaults');
  }

  return parseConfig(applyEnvOverrides(rawConfig));
}
