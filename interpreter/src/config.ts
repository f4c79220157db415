/**
 * Configuration for the aki CLI and REPL.
 *
 * Layers, later wins: built-in defaults, `aki.config.json` in the working
 * directory, AKI_* environment variables, command-line flags. Every layer
 * is validated with the same zod schema before it is merged.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { AkiConfigError } from './errors';
import { LOG_LEVELS } from './logger';
import { DEFAULT_MAX_CALL_DEPTH } from './interpreter';

export const CONFIG_FILE_NAME = 'aki.config.json';

const logLevelSchema = z.enum(LOG_LEVELS);

export const configSchema = z
  .object({
    logLevel: logLevelSchema,
    scopeWrites: z.enum(['shadow', 'outer']),
    autoInvokeMain: z.boolean(),
    printResults: z.boolean(),
    maxCallDepth: z.number().int().positive(),
  })
  .strict();

export type AkiConfig = z.infer<typeof configSchema>;

const layerSchema = configSchema.partial();

type ConfigLayer = z.infer<typeof layerSchema>;

export const DEFAULT_CONFIG: AkiConfig = {
  logLevel: 'warn',
  scopeWrites: 'shadow',
  autoInvokeMain: true,
  printResults: true,
  maxCallDepth: DEFAULT_MAX_CALL_DEPTH,
};

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Raw overrides, typically from `parseConfigFlags`. */
  overrides?: Record<string, unknown>;
}

/**
 * Resolve the effective configuration. Throws AkiConfigError listing
 * every problem found across all layers.
 */
export function loadConfig(options: LoadConfigOptions = {}): AkiConfig {
  const cwd = options.cwd ?? process.cwd();
  const layers: Array<[string, unknown]> = [
    [CONFIG_FILE_NAME, readConfigFile(cwd)],
    ['environment', configFromEnv(options.env ?? process.env)],
    ['flags', options.overrides ?? {}],
  ];

  const issues: string[] = [];
  let config: AkiConfig = { ...DEFAULT_CONFIG };

  for (const [label, raw] of layers) {
    const result = layerSchema.safeParse(raw);
    if (!result.success) {
      for (const issue of result.error.issues) {
        const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        issues.push(`${label}: ${where}: ${issue.message}`);
      }
      continue;
    }
    config = mergeLayer(config, result.data);
  }

  if (issues.length > 0) {
    throw new AkiConfigError(issues);
  }
  return config;
}

function mergeLayer(base: AkiConfig, layer: ConfigLayer): AkiConfig {
  return {
    logLevel: layer.logLevel ?? base.logLevel,
    scopeWrites: layer.scopeWrites ?? base.scopeWrites,
    autoInvokeMain: layer.autoInvokeMain ?? base.autoInvokeMain,
    printResults: layer.printResults ?? base.printResults,
    maxCallDepth: layer.maxCallDepth ?? base.maxCallDepth,
  };
}

/**
 * Read `aki.config.json` from `dir`. A missing file is an empty layer.
 */
export function readConfigFile(dir: string): unknown {
  const file = path.join(dir, CONFIG_FILE_NAME);
  if (!fs.existsSync(file)) return {};
  const text = fs.readFileSync(file, 'utf-8');
  try {
    return JSON.parse(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new AkiConfigError([`${CONFIG_FILE_NAME}: invalid JSON: ${reason}`]);
  }
}

/**
 * Pick up AKI_LOG_LEVEL, AKI_SCOPE_WRITES, AKI_AUTO_MAIN and
 * AKI_MAX_CALL_DEPTH. Values that do not convert are passed through as-is
 * so the schema reports them.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const layer: Record<string, unknown> = {};
  if (env.AKI_LOG_LEVEL !== undefined) layer.logLevel = env.AKI_LOG_LEVEL;
  if (env.AKI_SCOPE_WRITES !== undefined) layer.scopeWrites = env.AKI_SCOPE_WRITES;
  if (env.AKI_AUTO_MAIN !== undefined) layer.autoInvokeMain = parseBooleanish(env.AKI_AUTO_MAIN);
  if (env.AKI_MAX_CALL_DEPTH !== undefined) layer.maxCallDepth = parseNumberish(env.AKI_MAX_CALL_DEPTH);
  return layer;
}

function parseNumberish(value: string): unknown {
  return /^\d+$/.test(value) ? Number(value) : value;
}

function parseBooleanish(value: string): unknown {
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      return value;
  }
}

export interface ParsedFlags {
  overrides: Record<string, unknown>;
  rest: string[];
}

/**
 * Split config flags out of an argument list. Unknown arguments are left
 * in `rest`, in order.
 */
export function parseConfigFlags(args: readonly string[]): ParsedFlags {
  const overrides: Record<string, unknown> = {};
  const rest: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--log-level':
        overrides.logLevel = requireValue(args, ++i, arg);
        break;
      case '--scope-writes':
        overrides.scopeWrites = requireValue(args, ++i, arg);
        break;
      case '--max-call-depth':
        overrides.maxCallDepth = parseNumberish(requireValue(args, ++i, arg));
        break;
      case '--no-auto-main':
        overrides.autoInvokeMain = false;
        break;
      case '--quiet':
        overrides.printResults = false;
        break;
      default:
        rest.push(arg);
    }
  }

  return { overrides, rest };
}

function requireValue(args: readonly string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined) {
    throw new AkiConfigError([`flags: ${flag} requires a value`]);
  }
  return value;
}
