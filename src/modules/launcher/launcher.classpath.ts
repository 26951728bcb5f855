/**
 * Classpath computation through $ENGINE_HOME/bin/compute-classpath.sh
 */

import path from 'path';
import { LauncherError, type ProcessRunner } from './launcher.types.js';

export const CLASSPATH_HELPER = path.join('bin', 'compute-classpath.sh');

function nonEmptyLines(...chunks: string[]): string[] {
  return chunks
    .flatMap((chunk) => chunk.split(/\r?\n/))
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0);
}

export async function computeClasspath(
  home: string,
  env: NodeJS.ProcessEnv,
  runner: ProcessRunner
): Promise<string> {
  const helper = path.join(home, CLASSPATH_HELPER);
  const result = await runner.capture(helper, [], env);

  if (result.status !== 0) {
    throw new LauncherError(
      'CLASSPATH_FAILED',
      `${helper} exited with status ${result.status}`,
      nonEmptyLines(result.stderr, result.stdout)
    );
  }

  return result.stdout.trim();
}
