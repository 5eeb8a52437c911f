import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getScoutDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const DEFAULT_BOILERPLATE_PATTERNS = [
  "Sorry, we're having trouble playing this video\\.?",
  'Learn more',
  'Original audio',
  'View all [0-9]+ replies',
  'View replies',
  'See translation',
  'Hide all replies',
  '\\bMeta\\b.*',
  '\\bPrivacy\\b.*',
  '\\bTerms\\b.*',
  '\\bInstagram Lite\\b.*',
  '\\bThreads\\b.*',
  'Follow [A-Za-z0-9_.]+',
];

export const DEFAULT_CUT_MARKERS = [
  'More posts from',
  'About Blog Jobs Help',
  'Uploading & Non-Users',
  'Privacy Terms',
  'Meta ©',
];

const PaginationModeSchema = z.enum(['bounded', 'exhaustive']);

const ScheduleJobSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('profile'),
    cron: z.string(),
    handle: z.string().min(1),
    posts: z.number().int().positive().optional(),
  }),
  z.object({
    kind: z.literal('trends'),
    cron: z.string(),
    category: z.string().min(1),
    max_reels: z.number().int().positive().optional(),
    max_hours: z.number().positive().optional(),
  }),
]);

export type ScheduleJob = z.infer<typeof ScheduleJobSchema>;

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.number().default(3892),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),

  collector: z
    .object({
      base_url: z.string().default(''),
      profile_path: z.string().default('/{handle}/'),
      tag_path: z.string().default('/explore/tags/{tag}/'),
      link_selector: z.string().default("a[href*='/p/'], a[href*='/reel/']"),
      next_selector: z.string().default("a[rel='next']"),
      timestamp_selector: z.string().default('time[datetime]'),
      text_selector: z.string().default('article'),
      audio_selector: z.string().default("a[href*='/audio/']"),
      user_agent: z.string().default('gridscout/1.0'),
      cookie: z.string().default(''),
      timeout_ms: z.number().default(15000),
      retries: z.number().int().min(0).default(2),
      retry_delay_ms: z.number().default(1000),
    })
    .default({}),

  pagination: z
    .object({
      stagnation_limit: z.number().int().positive().default(5),
      round_cap: z.number().int().positive().default(200),
      concurrency: z.number().int().positive().default(4),
    })
    .default({}),

  profile: z
    .object({
      default_posts: z.number().int().positive().default(30),
      mode: PaginationModeSchema.default('bounded'),
    })
    .default({}),

  trends: z
    .object({
      default_max_reels: z.number().int().positive().default(40),
      default_max_hours: z.number().positive().default(72),
      target_new: z.number().int().positive().default(200),
      mode: PaginationModeSchema.default('exhaustive'),
    })
    .default({}),

  normalize: z
    .object({
      boilerplate_patterns: z.array(z.string()).default(DEFAULT_BOILERPLATE_PATTERNS),
    })
    .default({}),

  handoff: z
    .object({
      max_len: z.number().int().positive().default(4000),
      cut_markers: z.array(z.string()).default(DEFAULT_CUT_MARKERS),
      truncation_marker: z.string().default(' ... [TRUNCATED]'),
    })
    .default({}),

  output: z
    .object({
      data_dir: z.string().default('~/.gridscout/data'),
    })
    .default({}),

  schedule: z
    .object({
      jobs: z.array(ScheduleJobSchema).default([]),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.gridscout/gridscout.db'),
    })
    .default({}),

  categories_file: z.string().default(''),
});

export type Config = z.infer<typeof ConfigSchema>;
export type PaginationMode = z.infer<typeof PaginationModeSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  const yaml = generateDefaultConfigYaml();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml, 'utf-8');
}

function asRecord(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
    ? (value as Record<string, unknown>)
    : {};
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('gridscout', {
    searchPlaces: [
      'gridscout.config.yaml',
      'gridscout.config.yml',
      '.gridscoutrc.yaml',
      '.gridscoutrc.yml',
    ],
  });

  const envConfigPath = process.env['GRIDSCOUT_CONFIG'];
  const defaultConfigPath = path.join(getScoutDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = asRecord(result?.config);
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    rawConfig = asRecord(result?.config);
  } else {
    logger.debug('No config file found, using defaults');
  }

  applyEnvOverrides(rawConfig);

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

/**
 * Collector settings that are usually kept out of config files.
 */
export function applyEnvOverrides(rawConfig: Record<string, unknown>): void {
  const envBaseUrl = process.env['GRIDSCOUT_BASE_URL'];
  const envCookie = process.env['GRIDSCOUT_COOKIE'];

  if (envBaseUrl || envCookie) {
    const collector = asRecord(rawConfig['collector']);
    if (envBaseUrl) collector['base_url'] = envBaseUrl;
    if (envCookie) collector['cookie'] = envCookie;
    rawConfig['collector'] = collector;
  }
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
