import { Command } from 'commander';
import fs from 'node:fs';
import { loadConfig, type Config, type ConfigOverrides } from '../config.js';
import type { MarkupConverter } from '../convert/converter.js';
import { PandocConverter } from '../convert/pandoc.js';
import { openLedger } from '../core/db.js';
import { assertTimeZone } from '../core/time.js';
import { ConfigurationError, ConversionError, errorMessage } from '../errors.js';
import { runImport } from '../import/orchestrator.js';
import { createLogging, type LoggingContext } from '../logger.js';

export interface ImportCommandOptions {
  notesDir?: string;
  notebook?: string;
  logFile?: string;
  logLevel?: string;
  dryRun?: boolean;
  recursive?: boolean;
  timezone?: string;
  pandoc?: string;
}

export interface ImportCommandDeps {
  cwd?: string;
  home?: string;
  env?: NodeJS.ProcessEnv;
  /** Used instead of pandoc; no availability probe is made. */
  converter?: MarkupConverter;
  /** Used instead of a console/file logging context built from the config. */
  logging?: LoggingContext;
}

function assertDirectory(label: string, dirPath: string, flag: string): void {
  if (!dirPath) {
    throw new ConfigurationError(`No ${label} given (use ${flag} or the config file)`);
  }
  if (!fs.existsSync(dirPath) || !fs.statSync(dirPath).isDirectory()) {
    throw new ConfigurationError(`${label[0].toUpperCase()}${label.slice(1)} ${dirPath} is not a directory`);
  }
}

/** Load and check everything the run needs before any note is touched. */
export function resolveImportConfig(options: ImportCommandOptions, deps: ImportCommandDeps = {}): Config {
  const overrides: ConfigOverrides = {
    notesPath: options.notesDir,
    notebookPath: options.notebook,
    recursive: options.recursive,
    timezone: options.timezone,
    converterCommand: options.pandoc,
    logLevel: options.logLevel,
    logFile: options.logFile,
  };
  const config = loadConfig({ cwd: deps.cwd, home: deps.home, env: deps.env, overrides });

  assertDirectory('notes directory', config.notes.path, '--notes-dir');
  assertDirectory('notebook directory', config.notebook.path, '--notebook');
  if (config.notebook.timezone) {
    try {
      assertTimeZone(config.notebook.timezone);
    } catch (error) {
      throw new ConfigurationError(`Unknown time zone "${config.notebook.timezone}"`, { cause: error });
    }
  }
  return config;
}

/**
 * Run the `import` command. Resolves with the process exit code: 0 once the
 * batch ran (even with failed notes), 1 on a configuration problem.
 */
export async function runImportCommand(options: ImportCommandOptions, deps: ImportCommandDeps = {}): Promise<number> {
  const dryRun = options.dryRun ?? false;

  let config: Config;
  try {
    config = resolveImportConfig(options, deps);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  const logging =
    deps.logging ??
    createLogging({
      level: config.log.level,
      // A dry run leaves no trace on disk, log file included.
      file: dryRun ? undefined : config.log.file || undefined,
    });
  const { logger } = logging;

  try {
    let converter = deps.converter;
    if (!converter) {
      const pandoc = new PandocConverter({ command: config.converter.command, timeoutMs: config.converter.timeoutMs });
      const version = await pandoc.probe();
      logger.debug({ converter: pandoc.command }, `Using ${version}`);
      converter = pandoc;
    }

    const ledger = openLedger(config.notebook.path, { dryRun });
    try {
      await runImport(
        {
          notesPath: config.notes.path,
          notebookPath: config.notebook.path,
          recursive: config.notes.recursive,
          store: config.notebook.store,
          journal: config.notebook.journal,
          section: config.notebook.section,
          timeZone: config.notebook.timezone || undefined,
          dryRun,
        },
        { converter, logger, ledger }
      );
    } finally {
      ledger.close();
    }
    return 0;
  } catch (error) {
    if (error instanceof ConfigurationError || (error instanceof ConversionError && error.unavailable)) {
      logger.fatal({ code: error.code }, errorMessage(error));
      return 1;
    }
    logger.fatal({ err: error }, `Import aborted: ${errorMessage(error)}`);
    throw error;
  } finally {
    await logging.close();
  }
}

export const importCommand = new Command('import')
  .description('Convert Markdown notes into Zim pages and link them from journal pages')
  .option('--notes-dir <dir>', 'directory containing the Markdown notes')
  .option('--notebook <dir>', 'root directory of the Zim notebook')
  .option('--log-file <file>', 'also write a debug-level log to this file')
  .option('--log-level <level>', 'console log level (trace, debug, info, warn, error, fatal)')
  .option('--dry-run', 'decide and log everything, write nothing', false)
  .option('--recursive', 'descend into subdirectories of the notes directory')
  .option('--timezone <iana>', 'time zone for journal dates (default: system zone)')
  .option('--pandoc <path>', 'pandoc executable to use')
  .action(async (options: ImportCommandOptions) => {
    process.exitCode = await runImportCommand(options);
  });
