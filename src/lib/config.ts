/**
 * Command-line and environment configuration for the walkthrough CLI.
 * Environment variables set the defaults; flags override them. Both pass the
 * same validators.
 */
import { DEFAULT_BASE_URL } from './client';
import { ConfigError } from './errors';
import type { WalkthroughConfig } from './walkthrough';

export type CliConfig = WalkthroughConfig & { baseUrl: string; timeoutMs: number };

/** With `help` set, `config` holds the defaults rather than the parsed flags. */
export type CliCommand = { help: boolean; config: CliConfig };

type Env = Record<string, string | undefined>;

export const isPositiveInt = (v: number) => Number.isInteger(v) && v >= 1;
export const isNonNegativeInt = (v: number) => Number.isInteger(v) && v >= 0;
export const isGrayLevel = (v: number) => v >= 0 && v <= 255;

function readNumber(raw: string, option: string, valid: (value: number) => boolean): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value) || !valid(value)) {
    throw new ConfigError(option, `Invalid value for ${option}: ${raw}`);
  }
  return value;
}

function envString(env: Env, name: string, fallback: string): string {
  return env[name] || fallback;
}

function envNumber(env: Env, name: string, fallback: number, valid: (value: number) => boolean): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  return readNumber(raw, name, valid);
}

export function defaultsFromEnv(env: Env): CliConfig {
  return {
    baseUrl: envString(env, 'IDR_BASE_URL', DEFAULT_BASE_URL),
    timeoutMs: envNumber(env, 'HTTP_TIMEOUT_MS', 0, isNonNegativeInt),
    outDir: envString(env, 'OUTPUT_DIR', 'output'),
    project: { by: 'index', index: envNumber(env, 'PROJECT_INDEX', 87, isPositiveInt) },
    datasetIndex: envNumber(env, 'DATASET_INDEX', 8, isPositiveInt),
    imageIndex: envNumber(env, 'IMAGE_INDEX', 4, isPositiveInt),
    threshold: envNumber(env, 'THRESHOLD', 90, isGrayLevel),
    minPixelCount: envNumber(env, 'MIN_PIXEL_COUNT', 200, isNonNegativeInt),
    smoothingWindow: envNumber(env, 'SMOOTHING_WINDOW', 31, isPositiveInt),
    thumbConcurrency: envNumber(env, 'THUMB_CONCURRENCY', 4, isPositiveInt),
  };
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (!value || value.startsWith('-')) {
    throw new ConfigError(flag, `Missing value for ${flag}`);
  }
  return value;
}

/**
 * Parse `args` (without the node and script paths) on top of the defaults
 * from `env`. Throws ConfigError on a missing or invalid value.
 */
export function parseArgs(args: string[], env: Env = {}): CliCommand {
  const config = defaultsFromEnv(env);
  let experiment: string | undefined;

  const number = (i: number, flag: string, valid: (value: number) => boolean) =>
    readNumber(requireValue(args, i, flag), flag, valid);

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--base-url':
        config.baseUrl = requireValue(args, i, arg);
        i++;
        break;
      case '--out-dir':
        config.outDir = requireValue(args, i, arg);
        i++;
        break;
      case '--project':
        config.project = { by: 'id', id: number(i, arg, isPositiveInt) };
        i++;
        break;
      case '--project-index':
        config.project = { by: 'index', index: number(i, arg, isPositiveInt) };
        i++;
        break;
      case '--project-title':
        config.project = { by: 'title', title: requireValue(args, i, arg) };
        i++;
        break;
      case '--experiment':
        experiment = requireValue(args, i, arg);
        i++;
        break;
      case '--dataset-index':
        config.datasetIndex = number(i, arg, isPositiveInt);
        i++;
        break;
      case '--image-index':
        config.imageIndex = number(i, arg, isPositiveInt);
        i++;
        break;
      case '--threshold':
        config.threshold = number(i, arg, isGrayLevel);
        i++;
        break;
      case '--min-pixel-count':
        config.minPixelCount = number(i, arg, isNonNegativeInt);
        i++;
        break;
      case '--smoothing':
        config.smoothingWindow = number(i, arg, isPositiveInt);
        i++;
        break;
      case '--thumb-concurrency':
        config.thumbConcurrency = number(i, arg, isPositiveInt);
        i++;
        break;
      case '--timeout':
        config.timeoutMs = number(i, arg, isNonNegativeInt);
        i++;
        break;
      case '-h':
      case '--help':
        return { help: true, config: defaultsFromEnv(env) };
      default:
        console.warn(`⚠️ Unknown argument ignored: ${arg}`);
    }
  }

  if (experiment !== undefined) {
    if (config.project.by === 'id') {
      console.warn(`⚠️ --experiment ignored when --project selects by id`);
    } else {
      config.project = { ...config.project, experiment };
    }
  }

  return { help: false, config };
}
