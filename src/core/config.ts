/**
 * xcsync.config.json loading
 *
 * Precedence, lowest first: defaults, the config file, explicit options.
 */
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_SOURCE_EXTENSIONS } from './file-types.js';

export const CONFIG_FILE_NAME = 'xcsync.config.json';

const configSchema = z
  .object({
    sourceRoot: z.string().min(1).optional(),
    target: z.string().min(1).optional(),
    createGroups: z.boolean().optional(),
    extensions: z.array(z.string().min(1)).nonempty().optional(),
    exclude: z.array(z.string()).optional(),
  })
  .strict();

export type XcsyncConfig = z.infer<typeof configSchema>;

/**
 * Fully resolved settings for a sync run
 */
export interface Settings {
  /** Absolute directory that discovery walks */
  sourceRoot: string;
  target?: string;
  createGroups: boolean;
  /** Lower-case, dot-prefixed */
  extensions: string[];
  exclude: string[];
}

export type SettingsOverrides = Partial<Pick<Settings, 'sourceRoot' | 'target' | 'createGroups'>>;

/**
 * Parse and validate config file content
 *
 * @throws ConfigError
 */
export function parseConfig(content: string, configPath: string): XcsyncConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(configPath, error instanceof Error ? error.message : 'invalid JSON');
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigError(configPath, `${field}: ${issue.message}`);
  }
  return parsed.data;
}

/**
 * Load the config file: `configPath` when given (must exist), else
 * xcsync.config.json in the project directory when present
 */
export function loadConfig(projectDir: string, configPath?: string): { config: XcsyncConfig; path?: string } {
  const candidate = configPath ? path.resolve(configPath) : path.join(projectDir, CONFIG_FILE_NAME);
  if (!fs.existsSync(candidate)) {
    if (configPath) {
      throw new ConfigError(candidate, 'file does not exist');
    }
    return { config: {} };
  }
  return { config: parseConfig(fs.readFileSync(candidate, 'utf-8'), candidate), path: candidate };
}

export function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

/**
 * Merge defaults, file values and overrides. Relative paths in the file are
 * relative to the project directory; relative overrides to the cwd.
 */
export function resolveSettings(
  projectDir: string,
  config: XcsyncConfig,
  overrides: SettingsOverrides = {}
): Settings {
  const sourceRoot = overrides.sourceRoot !== undefined
    ? path.resolve(overrides.sourceRoot)
    : path.resolve(projectDir, config.sourceRoot ?? '.');

  return {
    sourceRoot,
    target: overrides.target ?? config.target,
    createGroups: overrides.createGroups ?? config.createGroups ?? true,
    extensions: [...new Set((config.extensions ?? DEFAULT_SOURCE_EXTENSIONS).map(normalizeExtension))],
    exclude: config.exclude ?? [],
  };
}
