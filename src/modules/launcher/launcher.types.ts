/**
 * LAUNCHER — Types
 *
 * The launcher resolves the installation environment, checks Spark's
 * version, computes a classpath and runs a JVM class with it.
 */

// ═══════════════════════════════════════════════════════════════
// HOST DEPENDENCIES
// ═══════════════════════════════════════════════════════════════

export interface LauncherFs {
  exists(path: string): boolean;
  isExecutable(path: string): boolean;
  readFile(path: string): string;
}

export interface CommandResult {
  status: number;
  stdout: string;
  stderr: string;
}

export interface ProcessRunner {
  /** Runs a command to completion and captures its output */
  capture(cmd: string, args: string[], env: NodeJS.ProcessEnv): Promise<CommandResult>;
  /** Runs a command attached to this terminal and resolves with its exit status */
  run(cmd: string, args: string[], env: NodeJS.ProcessEnv): Promise<number>;
}

export interface LauncherDeps {
  env: NodeJS.ProcessEnv;
  /** Installation root used when ENGINE_HOME is not set */
  defaultHome: string;
  fs: LauncherFs;
  runner: ProcessRunner;
  stderr: (line: string) => void;
}

// ═══════════════════════════════════════════════════════════════
// RESOLVED ENVIRONMENT
// ═══════════════════════════════════════════════════════════════

export interface LauncherEnv {
  home: string;
  confDir: string;
  sparkHome?: string;
  minSparkVersion: string;
  /** Environment handed to the helper and to the runtime */
  env: NodeJS.ProcessEnv;
}

export const DEFAULT_MIN_SPARK_VERSION = '1.3.0';
export const LAUNCHER_NAME = 'engine-class';
export const USAGE = `Usage: ${LAUNCHER_NAME} <class> [<args>]`;

// ═══════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════

export type LauncherErrorCode =
  | 'USAGE'
  | 'RUNTIME_NOT_FOUND'
  | 'VERSION_UNMET'
  | 'CLASSPATH_FAILED'
  | 'EXEC_FAILED';

export class LauncherError extends Error {
  readonly code: LauncherErrorCode;
  /** Lines forwarded verbatim to stderr after the message */
  readonly output: string[];

  constructor(code: LauncherErrorCode, message: string, output: string[] = []) {
    super(message);
    this.name = 'LauncherError';
    this.code = code;
    this.output = output;
  }
}
