import { execFile } from 'child_process';

import { DepprobeError, ErrorCodes, type CommandErrorDetails } from '../types/index.js';
import { logger } from './logger.js';

export interface RunCommandOptions {
  /** Parse stdout as JSON into `json` */
  json?: boolean;
  /** Throw CommandError on a non-zero exit (default: true) */
  raiseOnError?: boolean;
  timeout?: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface ExecResult {
  command: string;
  stdout: string;
  stderr: string;
  /** null when the process was killed by a signal or never started */
  returnCode: number | null;
  timedOut: boolean;
  /** Parsed stdout, present when RunCommandOptions.json was set */
  json?: unknown;
}

/**
 * Anything able to run a process. The default is execRunner; tests pass scripted fakes.
 */
export interface CommandRunner {
  run(file: string, args: readonly string[], options?: RunCommandOptions): Promise<ExecResult>;
}

/**
 * A command exited with a non-zero status, timed out, or printed output that
 * could not be parsed.
 */
export class CommandError extends DepprobeError {
  readonly command: string;
  readonly returnCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;

  constructor(result: ExecResult, reason?: string) {
    const message = reason
      ?? (result.timedOut
        ? `Command timed out: ${result.command}`
        : `Command failed with exit code ${result.returnCode ?? 'unknown'}: ${result.command}`);
    super(message, ErrorCodes.COMMAND_FAILED);
    this.name = 'CommandError';
    this.command = result.command;
    this.returnCode = result.returnCode;
    this.stdout = result.stdout;
    this.stderr = result.stderr;
    this.timedOut = result.timedOut;
    this.details = this.toDetails();
  }

  toDetails(): CommandErrorDetails {
    return {
      command: this.command,
      return_code: this.returnCode,
      stdout: this.stdout,
      stderr: this.stderr,
      timeout: this.timedOut,
      message: this.message
    };
  }
}

export function formatCommand(file: string, args: readonly string[]): string {
  return [file, ...args].map((part) => (/[\s"'$]/.test(part) ? JSON.stringify(part) : part)).join(' ');
}

/**
 * Run a command without a shell and capture its output.
 */
export function runCommand(file: string, args: readonly string[], options: RunCommandOptions = {}): Promise<ExecResult> {
  const command = formatCommand(file, args);
  logger.debug(`Running command: ${command}`);

  return new Promise((resolve, reject) => {
    execFile(file, [...args], {
      cwd: options.cwd,
      env: options.env,
      timeout: options.timeout ?? 0,
      encoding: 'utf8',
      maxBuffer: 64 * 1024 * 1024
    }, (error, stdout, stderr) => {
      const result: ExecResult = {
        command,
        stdout,
        stderr: error && !stderr ? error.message : stderr,
        returnCode: error ? (typeof error.code === 'number' ? error.code : null) : 0,
        timedOut: Boolean(error?.killed && error.signal === 'SIGTERM' && options.timeout)
      };

      if (error && options.raiseOnError !== false) {
        reject(new CommandError(result));
        return;
      }

      if (options.json && result.returnCode === 0) {
        try {
          result.json = JSON.parse(stdout);
        } catch (parseError) {
          reject(new CommandError(result, `Command printed invalid JSON: ${command}: ${String(parseError)}`));
          return;
        }
      }

      resolve(result);
    });
  });
}

export const execRunner: CommandRunner = {
  run: runCommand
};
