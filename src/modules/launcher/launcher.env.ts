/**
 * Launcher environment resolution
 *
 * ENGINE_HOME defaults to the installation root and is exported for the
 * scripts run downstream. $ENGINE_CONF_DIR/engine-env is read in dotenv
 * format; variables already present in the environment win.
 */

import path from 'path';
import dotenv from 'dotenv';
import { DEFAULT_MIN_SPARK_VERSION, type LauncherEnv, type LauncherFs } from './launcher.types.js';

export const ENV_FILE_NAME = 'engine-env';

export function resolveLauncherEnv(
  source: NodeJS.ProcessEnv,
  defaultHome: string,
  fs: LauncherFs
): LauncherEnv {
  const home = source.ENGINE_HOME || path.resolve(defaultHome);
  const confDir = source.ENGINE_CONF_DIR || path.join(home, 'conf');

  const env: NodeJS.ProcessEnv = { ...source, ENGINE_HOME: home, ENGINE_CONF_DIR: confDir };

  const envFile = path.join(confDir, ENV_FILE_NAME);
  if (fs.exists(envFile)) {
    const parsed = dotenv.parse(fs.readFile(envFile));
    for (const [key, value] of Object.entries(parsed)) {
      if (env[key] === undefined) env[key] = value;
    }
  }

  return {
    home,
    confDir,
    sparkHome: env.SPARK_HOME || undefined,
    minSparkVersion: env.ENGINE_MIN_SPARK_VERSION || DEFAULT_MIN_SPARK_VERSION,
    env,
  };
}
