/**
 * pandoc as the markup converter.
 *
 * Uses spawn/execFile with an argument array, never a shell, so note content
 * and paths are not interpreted.
 */

import { spawn, execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { ConversionError } from '../errors.js';
import { ZIM_PROFILE, profileLabel, type ConversionProfile, type MarkupConverter } from './converter.js';

const execFileAsync = promisify(execFile);

export interface PandocOptions {
  command?: string;
  /** Kill the process after this many ms. 0 or absent: wait indefinitely. */
  timeoutMs?: number;
  /** Arguments placed before the profile's, e.g. a script for a wrapper. */
  prefixArgs?: readonly string[];
}

export function pandocArgs(profile: ConversionProfile): string[] {
  return ['-f', profile.from, '-t', profile.to, ...profile.extraArgs];
}

function isMissingExecutable(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EACCES');
}

export class PandocConverter implements MarkupConverter {
  readonly command: string;
  private readonly timeoutMs: number;
  private readonly prefixArgs: readonly string[];

  constructor(options: PandocOptions = {}) {
    this.command = options.command ?? 'pandoc';
    this.timeoutMs = options.timeoutMs ?? 0;
    this.prefixArgs = options.prefixArgs ?? [];
  }

  /** First line of `pandoc --version`. Rejects when pandoc cannot be run. */
  async probe(): Promise<string> {
    try {
      const { stdout } = await execFileAsync(this.command, [...this.prefixArgs, '--version'], { encoding: 'utf-8' });
      return stdout.split('\n')[0].trim();
    } catch (error) {
      throw new ConversionError(`Converter "${this.command}" is not available`, {
        cause: error,
        unavailable: true,
      });
    }
  }

  convert(body: string, profile: ConversionProfile = ZIM_PROFILE): Promise<string> {
    const args = [...this.prefixArgs, ...pandocArgs(profile)];

    return new Promise<string>((resolve, reject) => {
      const child = spawn(this.command, args, {
        timeout: this.timeoutMs > 0 ? this.timeoutMs : undefined,
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;
      let stdinError: Error | undefined;

      const fail = (error: ConversionError) => {
        if (settled) return;
        settled = true;
        reject(error);
      };

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (error) => {
        fail(
          new ConversionError(
            isMissingExecutable(error)
              ? `Converter "${this.command}" not found`
              : `Failed to run converter "${this.command}": ${error.message}`,
            { cause: error, unavailable: isMissingExecutable(error) }
          )
        );
      });

      child.on('close', (code, signal) => {
        if (settled) return;
        const errText = [Buffer.concat(stderr).toString('utf-8').trim(), stdinError ? `stdin: ${stdinError.message}` : '']
          .filter(Boolean)
          .join('\n');
        if (code !== 0) {
          const how = signal ? `was killed by ${signal}` : `exited with code ${code}`;
          fail(
            new ConversionError(`Converter ${how} (profile ${profileLabel(profile)})`, {
              stderr: errText,
              exitCode: code,
            })
          );
          return;
        }
        settled = true;
        resolve(Buffer.concat(stdout).toString('utf-8'));
      });

      // EPIPE when the process exits before reading its input; reported on 'close'.
      child.stdin.on('error', (error) => {
        stdinError = error;
      });
      child.stdin.end(body, 'utf-8');
    });
  }
}
