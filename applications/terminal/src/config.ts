/**
 * Configuration: defaults, then `<dataDir>/config.json`, then environment,
 * then command-line flags. The merged result is validated once with zod.
 */

import { readFile, stat } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { SUPPORTED_LANGUAGES } from '@riffline/shared';

export const configSchema = z.object({
  musicDir: z.string().min(1),
  dataDir: z.string().min(1),
  backend: z.enum(['mpv', 'simulated']),
  mpvPath: z.string().min(1),
  tickMs: z.number().int().min(16).max(1000),
  volume: z.number().int().min(0).max(100),
  volumeStep: z.number().int().min(1).max(50),
  seekStepSeconds: z.number().positive().max(600),
  pageSize: z.number().int().min(1).max(200),
  shuffleSeed: z.number().int().optional(),
  exportM3u: z.boolean(),
  language: z.enum(SUPPORTED_LANGUAGES),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
});

export type RifflineConfig = z.infer<typeof configSchema>;

/** Unvalidated values from one source */
export type ConfigOverrides = { [K in keyof RifflineConfig]?: unknown };

const fileConfigSchema = configSchema.partial();

export const USAGE = `Usage: riffline [options]

Options:
  --music-dir <dir>    Folder to scan for audio files
  --data-dir <dir>     Where playlists, config.json and the log live
  --backend <name>     mpv or simulated
  --volume <0-100>     Initial volume
  --seed <int>         Shuffle seed
  --log-level <level>  debug, info, warn, error or silent
  -h, --help           Show this help
`;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface ConfigEnvironment {
  env: Record<string, string | undefined>;
  home: string;
  cwd: string;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function defined(values: ConfigOverrides): ConfigOverrides {
  const result: ConfigOverrides = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

export function defaultConfig({ env, home }: Pick<ConfigEnvironment, 'env' | 'home'>): RifflineConfig {
  const configHome = env.XDG_CONFIG_HOME ? env.XDG_CONFIG_HOME : join(home, '.config');
  return {
    musicDir: join(home, 'Music'),
    dataDir: join(configHome, 'riffline'),
    backend: 'mpv',
    mpvPath: 'mpv',
    tickMs: 100,
    volume: 80,
    volumeStep: 5,
    seekStepSeconds: 5,
    pageSize: 10,
    exportM3u: true,
    language: 'en-US',
    logLevel: 'info',
  };
}

export interface CliArguments {
  help: boolean;
  overrides: ConfigOverrides;
}

function readFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      'music-dir': { type: 'string' },
      'data-dir': { type: 'string' },
      backend: { type: 'string' },
      volume: { type: 'string' },
      seed: { type: 'string' },
      'log-level': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
    allowPositionals: false,
  }).values;
}

export function parseCliArgs(argv: string[]): CliArguments {
  let values: ReturnType<typeof readFlags>;
  try {
    values = readFlags(argv);
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }

  return {
    help: values.help ?? false,
    overrides: defined({
      musicDir: values['music-dir'],
      dataDir: values['data-dir'],
      backend: values.backend,
      volume: toNumber(values.volume),
      shuffleSeed: toNumber(values.seed),
      logLevel: values['log-level'],
    }),
  };
}

export function envOverrides(env: Record<string, string | undefined>): ConfigOverrides {
  return defined({
    musicDir: env.RIFFLINE_MUSIC_DIR || undefined,
    logLevel: env.RIFFLINE_LOG_LEVEL || undefined,
  });
}

async function readConfigFile(path: string): Promise<ConfigOverrides> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigError(`Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = fileConfigSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigError(`Invalid ${path}: ${formatIssues(result.error)}`);
  }
  return defined(result.data);
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export interface LoadedConfig {
  config: RifflineConfig;
  help: boolean;
}

export async function loadConfig(
  argv: string[],
  environment: ConfigEnvironment = { env: process.env, home: homedir(), cwd: process.cwd() }
): Promise<LoadedConfig> {
  const cli = parseCliArgs(argv);
  const env = envOverrides(environment.env);
  const defaults = defaultConfig(environment);

  const dataDirOverride = cli.overrides.dataDir;
  const dataDir = resolve(environment.cwd, typeof dataDirOverride === 'string' ? dataDirOverride : defaults.dataDir);
  const file = await readConfigFile(join(dataDir, 'config.json'));

  const result = configSchema.safeParse({ ...defaults, ...file, ...env, ...cli.overrides, dataDir });
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }

  const config = { ...result.data, musicDir: resolve(environment.cwd, result.data.musicDir) };
  const musicDirChosen = 'musicDir' in file || 'musicDir' in env || 'musicDir' in cli.overrides;
  if (!musicDirChosen && !(await isDirectory(config.musicDir))) {
    config.musicDir = environment.cwd;
  }

  return { config, help: cli.help };
}
