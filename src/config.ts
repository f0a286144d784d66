import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'smol-toml';
import { homedir } from 'node:os';
import { join, isAbsolute } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Config {
  notes: {
    path: string;        // absolute path, ~ expanded
    recursive: boolean;
  };
  notebook: {
    path: string;        // absolute path, ~ expanded
    store: string;       // namespace holding managed pages
    journal: string;     // namespace of the journal plugin
    section: string;     // journal section collecting backlinks
    timezone: string;    // IANA zone, empty = process local zone
  };
  converter: {
    command: string;
    timeoutMs: number;   // 0 = no timeout
  };
  log: {
    level: LogLevel;
    file: string;        // empty = console only
  };
}

/** Values given on the command line. They win over every other source. */
export interface ConfigOverrides {
  notesPath?: string;
  notebookPath?: string;
  recursive?: boolean;
  timezone?: string;
  converterCommand?: string;
  logLevel?: string;
  logFile?: string;
}

export interface LoadConfigOptions {
  cwd?: string;
  home?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

const tomlSchema = z
  .object({
    notes: z
      .object({
        path: z.string().optional(),
        recursive: z.boolean().optional(),
      })
      .partial()
      .optional(),
    notebook: z
      .object({
        path: z.string(),
        store: z.string(),
        journal: z.string(),
        section: z.string(),
        timezone: z.string(),
      })
      .partial()
      .optional(),
    converter: z
      .object({
        command: z.string(),
        timeout_ms: z.number().int().nonnegative(),
      })
      .partial()
      .optional(),
    log: z
      .object({
        level: z.enum(LOG_LEVELS),
        file: z.string(),
      })
      .partial()
      .optional(),
  })
  .passthrough();

type TomlConfig = z.infer<typeof tomlSchema>;

/**
 * Load and validate a TOML config file.
 * A missing file yields an empty object; a broken one is a configuration error.
 */
function loadTomlFile(filePath: string): TomlConfig {
  if (!existsSync(filePath)) return {};
  let raw: unknown;
  try {
    raw = parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot parse config file ${filePath}`, { cause: error });
  }
  const result = tomlSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid config file ${filePath}: ${issues}`);
  }
  return result.data;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function resolvePath(value: string, cwd: string, home: string): string {
  if (!value) return value;
  const expanded = value.startsWith('~') ? value.replace(/^~/, home) : value;
  return isAbsolute(expanded) ? expanded : join(cwd, expanded);
}

/**
 * Load configuration with priority:
 *   1. Command-line overrides (highest)
 *   2. Environment variables (NOTEZIM_*)
 *   3. Local notezim.toml (in CWD)
 *   4. Global ~/.config/notezim/config.toml
 *   5. Defaults (lowest)
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();
  const home = options.home ?? homedir();
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  const defaults: Config = {
    notes: { path: '', recursive: false },
    notebook: {
      path: '',
      store: 'raw_ai_notes',
      journal: 'Journal',
      section: 'AI Notes',
      timezone: '',
    },
    converter: { command: 'pandoc', timeoutMs: 0 },
    log: { level: 'info', file: '' },
  };

  const globalConfig = loadTomlFile(join(home, '.config', 'notezim', 'config.toml'));
  const localConfig = loadTomlFile(join(cwd, 'notezim.toml'));

  // Merge: defaults ← global ← local
  const merged: Config = {
    notes: {
      path: localConfig.notes?.path || globalConfig.notes?.path || defaults.notes.path,
      recursive: localConfig.notes?.recursive ?? globalConfig.notes?.recursive ?? defaults.notes.recursive,
    },
    notebook: {
      path: localConfig.notebook?.path || globalConfig.notebook?.path || defaults.notebook.path,
      store: localConfig.notebook?.store || globalConfig.notebook?.store || defaults.notebook.store,
      journal: localConfig.notebook?.journal || globalConfig.notebook?.journal || defaults.notebook.journal,
      section: localConfig.notebook?.section || globalConfig.notebook?.section || defaults.notebook.section,
      timezone: localConfig.notebook?.timezone || globalConfig.notebook?.timezone || defaults.notebook.timezone,
    },
    converter: {
      command: localConfig.converter?.command || globalConfig.converter?.command || defaults.converter.command,
      timeoutMs: localConfig.converter?.timeout_ms ?? globalConfig.converter?.timeout_ms ?? defaults.converter.timeoutMs,
    },
    log: {
      level: localConfig.log?.level ?? globalConfig.log?.level ?? defaults.log.level,
      file: localConfig.log?.file || globalConfig.log?.file || defaults.log.file,
    },
  };

  // Environment variable overrides
  if (env.NOTEZIM_NOTES_DIR) merged.notes.path = env.NOTEZIM_NOTES_DIR;
  if (env.NOTEZIM_NOTEBOOK_DIR) merged.notebook.path = env.NOTEZIM_NOTEBOOK_DIR;
  if (env.NOTEZIM_TIMEZONE) merged.notebook.timezone = env.NOTEZIM_TIMEZONE;
  if (env.NOTEZIM_PANDOC) merged.converter.command = env.NOTEZIM_PANDOC;
  if (env.NOTEZIM_LOG_FILE) merged.log.file = env.NOTEZIM_LOG_FILE;
  const envRecursive = parseBoolean(env.NOTEZIM_RECURSIVE);
  if (envRecursive !== undefined) merged.notes.recursive = envRecursive;
  const envLevel = env.NOTEZIM_LOG_LEVEL;
  if (envLevel) {
    if (!isLogLevel(envLevel)) {
      throw new ConfigurationError(`Invalid NOTEZIM_LOG_LEVEL "${envLevel}" (expected one of ${LOG_LEVELS.join(', ')})`);
    }
    merged.log.level = envLevel;
  }

  // Command-line overrides (highest priority)
  if (overrides.notesPath) merged.notes.path = overrides.notesPath;
  if (overrides.notebookPath) merged.notebook.path = overrides.notebookPath;
  if (overrides.recursive !== undefined) merged.notes.recursive = overrides.recursive;
  if (overrides.timezone) merged.notebook.timezone = overrides.timezone;
  if (overrides.converterCommand) merged.converter.command = overrides.converterCommand;
  if (overrides.logFile) merged.log.file = overrides.logFile;
  const cliLevel = overrides.logLevel;
  if (cliLevel) {
    if (!isLogLevel(cliLevel)) {
      throw new ConfigurationError(`Invalid log level "${cliLevel}" (expected one of ${LOG_LEVELS.join(', ')})`);
    }
    merged.log.level = cliLevel;
  }

  merged.notes.path = resolvePath(merged.notes.path, cwd, home);
  merged.notebook.path = resolvePath(merged.notebook.path, cwd, home);
  merged.log.file = resolvePath(merged.log.file, cwd, home);

  return merged;
}
