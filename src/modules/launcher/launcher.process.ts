/**
 * Node implementations of the launcher's host dependencies
 */

import fs from 'fs';
import os from 'os';
import { execFile, spawn } from 'child_process';
import { LauncherError, type CommandResult, type LauncherFs, type ProcessRunner } from './launcher.types.js';

export const nodeFs: LauncherFs = {
  exists: (p) => fs.existsSync(p),
  isExecutable: (p) => {
    try {
      fs.accessSync(p, fs.constants.X_OK);
      return fs.statSync(p).isFile();
    } catch {
      return false;
    }
  },
  readFile: (p) => fs.readFileSync(p, 'utf-8'),
};

function capture(cmd: string, args: string[], env: NodeJS.ProcessEnv): Promise<CommandResult> {
  return new Promise((resolve) => {
    execFile(cmd, args, { env, maxBuffer: 10 * 1024 * 1024 }, (err, stdout, stderr) => {
      if (err) {
        const status = typeof err.code === 'number' ? err.code : 127;
        resolve({ status, stdout: String(stdout), stderr: String(stderr) || err.message });
        return;
      }
      resolve({ status: 0, stdout: String(stdout), stderr: String(stderr) });
    });
  });
}

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(os.constants.signals));

const FORWARDED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/**
 * Node cannot replace its own process image, so the child inherits the
 * terminal, receives the signals sent to the launcher, and its status
 * becomes the launcher's.
 */
function run(cmd: string, args: string[], env: NodeJS.ProcessEnv): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(cmd, args, { env, stdio: 'inherit' });

    const forward = (signal: NodeJS.Signals) => child.kill(signal);
    FORWARDED_SIGNALS.forEach((signal) => process.on(signal, forward));
    const detach = () => FORWARDED_SIGNALS.forEach((signal) => process.off(signal, forward));

    child.on('error', (err) => {
      detach();
      reject(new LauncherError('EXEC_FAILED', `Failed to run ${cmd}: ${err.message}`));
    });

    child.on('close', (code, signal) => {
      detach();
      if (code !== null) {
        resolve(code);
      } else if (signal) {
        resolve(128 + (SIGNAL_NUMBERS.get(signal) ?? 0));
      } else {
        resolve(1);
      }
    });
  });
}

export const nodeRunner: ProcessRunner = { capture, run };
