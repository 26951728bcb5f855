/**
 * Runtime and Spark checks
 */

import path from 'path';
import { isVersionBelow } from './launcher.version.js';
import { LauncherError, type LauncherFs } from './launcher.types.js';

const RUNTIME_BINARY = 'java';

/**
 * $JAVA_HOME/bin/java when JAVA_HOME is set, otherwise the first
 * executable `java` on PATH.
 */
export function resolveRuntime(env: NodeJS.ProcessEnv, fs: LauncherFs): string {
  if (env.JAVA_HOME) {
    return path.join(env.JAVA_HOME, 'bin', RUNTIME_BINARY);
  }

  const dirs = (env.PATH ?? '').split(path.delimiter).filter(Boolean);
  for (const dir of dirs) {
    const candidate = path.join(dir, RUNTIME_BINARY);
    if (fs.isExecutable(candidate)) return candidate;
  }

  throw new LauncherError(
    'RUNTIME_NOT_FOUND',
    `JAVA_HOME is not set and no ${RUNTIME_BINARY} executable was found on PATH`
  );
}

/**
 * Version from the first line of $SPARK_HOME/RELEASE, e.g.
 * "Spark 1.3.0 built for Hadoop 2.4.0" gives "1.3.0".
 * Null when there is no readable RELEASE file (a source checkout).
 */
export function readSparkVersion(sparkHome: string, fs: LauncherFs): string | null {
  const releaseFile = path.join(sparkHome, 'RELEASE');
  if (!fs.exists(releaseFile)) return null;

  let content: string;
  try {
    content = fs.readFile(releaseFile);
  } catch {
    return null;
  }

  const firstLine = content.split(/\r?\n/, 1)[0] ?? '';
  const token = firstLine.split(' ')[1];
  return token ? token.trim() : null;
}

export function checkSparkVersion(
  sparkHome: string | undefined,
  minimum: string,
  fs: LauncherFs
): string | null {
  if (!sparkHome) return null;

  const version = readSparkVersion(sparkHome, fs);
  if (version === null) return null;

  if (isVersionBelow(version, minimum)) {
    throw new LauncherError(
      'VERSION_UNMET',
      `You have Apache Spark ${version} at ${sparkHome} which does not meet the minimum version requirement of ${minimum}.`,
      ['Aborting.']
    );
  }
  return version;
}
