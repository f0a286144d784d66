import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig } from '../config.js';
import { ConfigurationError } from '../errors.js';

describe('loadConfig', () => {
  let cwd: string;
  let home: string;

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'notezim-cwd-'));
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'notezim-home-'));
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
    fs.rmSync(home, { recursive: true, force: true });
  });

  function writeGlobal(content: string): void {
    const dir = path.join(home, '.config', 'notezim');
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, 'config.toml'), content);
  }

  function writeLocal(content: string): void {
    fs.writeFileSync(path.join(cwd, 'notezim.toml'), content);
  }

  it('should fall back to defaults', () => {
    const config = loadConfig({ cwd, home, env: {} });
    expect(config).toEqual({
      notes: { path: '', recursive: false },
      notebook: { path: '', store: 'raw_ai_notes', journal: 'Journal', section: 'AI Notes', timezone: '' },
      converter: { command: 'pandoc', timeoutMs: 0 },
      log: { level: 'info', file: '' },
    });
  });

  it('should let the local file win over the global one', () => {
    writeGlobal('[notebook]\nstore = "global_store"\njournal = "Diary"\n');
    writeLocal('[notebook]\nstore = "local_store"\n[converter]\ntimeout_ms = 5000\n');

    const config = loadConfig({ cwd, home, env: {} });
    expect(config.notebook.store).toBe('local_store');
    expect(config.notebook.journal).toBe('Diary');
    expect(config.converter.timeoutMs).toBe(5000);
  });

  it('should apply environment variables over files and flags over both', () => {
    writeLocal('[notebook]\ntimezone = "UTC"\n[log]\nlevel = "warn"\n');
    const env = { NOTEZIM_TIMEZONE: 'Etc/GMT+5', NOTEZIM_LOG_LEVEL: 'debug', NOTEZIM_RECURSIVE: 'true' };

    const fromEnv = loadConfig({ cwd, home, env });
    expect(fromEnv.notebook.timezone).toBe('Etc/GMT+5');
    expect(fromEnv.log.level).toBe('debug');
    expect(fromEnv.notes.recursive).toBe(true);

    const fromFlags = loadConfig({ cwd, home, env, overrides: { timezone: 'Europe/Paris', logLevel: 'error', recursive: false } });
    expect(fromFlags.notebook.timezone).toBe('Europe/Paris');
    expect(fromFlags.log.level).toBe('error');
    expect(fromFlags.notes.recursive).toBe(false);
  });

  it('should resolve relative and home paths', () => {
    const config = loadConfig({
      cwd,
      home,
      env: { NOTEZIM_LOG_FILE: 'logs/import.log' },
      overrides: { notesPath: '~/notes', notebookPath: 'notebook' },
    });
    expect(config.notes.path).toBe(path.join(home, 'notes'));
    expect(config.notebook.path).toBe(path.join(cwd, 'notebook'));
    expect(config.log.file).toBe(path.join(cwd, 'logs', 'import.log'));
  });

  it('should reject unreadable or invalid config files', () => {
    writeLocal('[notebook\nstore = ');
    expect(() => loadConfig({ cwd, home, env: {} })).toThrow(ConfigurationError);

    writeLocal('[converter]\ntimeout_ms = -1\n');
    expect(() => loadConfig({ cwd, home, env: {} })).toThrow(/converter\.timeout_ms/);
  });

  it('should reject unknown log levels', () => {
    expect(() => loadConfig({ cwd, home, env: { NOTEZIM_LOG_LEVEL: 'loud' } })).toThrow(ConfigurationError);
    expect(() => loadConfig({ cwd, home, env: {}, overrides: { logLevel: 'loud' } })).toThrow(/Invalid log level "loud"/);
  });
});
