/**
 * LAUNCHER — Service
 *
 * launch() checks, in order: a class argument, a runtime, Spark's
 * version, the classpath. Any failure is written to stderr and yields
 * status 1 without running the runtime.
 */

import { resolveLauncherEnv } from './launcher.env.js';
import { resolveRuntime, checkSparkVersion } from './launcher.runtime.js';
import { computeClasspath } from './launcher.classpath.js';
import { LauncherError, USAGE, type LauncherDeps } from './launcher.types.js';

export interface LaunchPlan {
  runtime: string;
  args: string[];
  env: NodeJS.ProcessEnv;
}

export async function planLaunch(argv: string[], deps: LauncherDeps): Promise<LaunchPlan> {
  if (argv.length === 0 || !argv[0]) {
    throw new LauncherError('USAGE', USAGE);
  }

  const resolved = resolveLauncherEnv(deps.env, deps.defaultHome, deps.fs);
  const runtime = resolveRuntime(resolved.env, deps.fs);
  checkSparkVersion(resolved.sparkHome, resolved.minSparkVersion, deps.fs);
  const classpath = await computeClasspath(resolved.home, resolved.env, deps.runner);

  return {
    runtime,
    args: ['-cp', classpath, ...argv],
    env: { ...resolved.env, CLASSPATH: classpath },
  };
}

export async function launch(argv: string[], deps: LauncherDeps): Promise<number> {
  try {
    const plan = await planLaunch(argv, deps);
    return await deps.runner.run(plan.runtime, plan.args, plan.env);
  } catch (err) {
    if (err instanceof LauncherError) {
      deps.stderr(err.message);
      err.output.forEach((line) => deps.stderr(line));
      return 1;
    }
    throw err;
  }
}
