#!/usr/bin/env node
/**
 * dase — engine command line
 *
 * Usage:
 *   dase train  [--engine-json <path>] [--skip-sanity-check]
 *   dase deploy [--engine-json <path>] [--port <port>] [--host <host>]
 *   dase eval   [--engine-json <path>] [--lambdas 10,100,1000]
 */

import 'dotenv/config';
import { env } from './config/env.js';
import { createContext, createEngineService, createStores, readEngineParams } from './bootstrap.js';
import { startServer } from './engine-server.js';
import { disconnectMongo } from './db/mongoose.js';
import { evaluateEngine } from './modules/engine/index.js';
import {
  AccuracyMetric,
  EVAL_LAMBDAS,
  buildEngineParamsList,
  classificationEngine,
  parseLambdaList,
} from './modules/classification/index.js';
import { errorMessage } from './common/errors.js';

type Command = 'train' | 'deploy' | 'eval' | 'help' | 'version';

interface CliArgs {
  command: Command;
  enginePath: string;
  port?: number;
  host?: string;
  skipSanityCheck: boolean;
  lambdas: number[];
}

function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = {
    command: 'help',
    enginePath: env.ENGINE_JSON,
    skipSanityCheck: false,
    lambdas: EVAL_LAMBDAS,
  };

  const [first, ...rest] = argv;
  switch (first) {
    case 'train':
    case 'deploy':
    case 'eval':
      result.command = first;
      break;
    case '--version':
    case '-v':
      result.command = 'version';
      break;
    default:
      result.command = 'help';
  }

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];

    switch (arg) {
      case '--engine-json':
        result.enginePath = rest[++i] ?? result.enginePath;
        break;
      case '--port':
      case '-p':
        result.port = parseInt(rest[++i] ?? '', 10) || undefined;
        break;
      case '--host':
        result.host = rest[++i];
        break;
      case '--skip-sanity-check':
        result.skipSanityCheck = true;
        break;
      case '--lambdas':
        result.lambdas = parseLambdaList(rest[++i] ?? '');
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return result;
}

function printHelp(): void {
  console.log(`
dase — Naive Bayes classification engine

Usage: dase <command> [options]

Commands:
  train                 Train the engine and record a new engine instance
  deploy                Serve the latest completed engine instance over HTTP
  eval                  Score candidate smoothing values with k-fold accuracy

Options:
      --engine-json <path>  Engine params file (default: ENGINE_JSON or engine.json)
      --skip-sanity-check   Train even if the training data fails its sanity check
  -p, --port <port>         Server port for deploy (default: PORT or 8000)
      --host <host>         Server host for deploy (default: HOST or 0.0.0.0)
      --lambdas <list>      Comma-separated smoothing values for eval (default: ${EVAL_LAMBDAS.join(',')})
  -v, --version             Show version

Environment Variables:
  STORAGE               mongo (default) or memory; memory keeps nothing between commands
  MONGO_URL             MongoDB connection string
  LOG_LEVEL             Server log level
`);
}

async function runTrain(args: CliArgs): Promise<void> {
  const stores = await createStores();
  const params = readEngineParams(args.enginePath);
  const service = createEngineService(params, stores, createContext(stores, 'Train'));
  const instance = await service.train({ skipSanityCheck: args.skipSanityCheck });
  console.log(`[Train] Engine instance ${instance.id} is ${instance.status}`);
}

async function runEval(args: CliArgs): Promise<void> {
  const stores = await createStores();
  const params = readEngineParams(args.enginePath);

  const result = await evaluateEngine(
    classificationEngine,
    buildEngineParamsList(params, args.lambdas),
    new AccuracyMetric(),
    createContext(stores, 'Eval')
  );

  for (const { params: candidate, score } of result.scores) {
    console.log(`[Eval] ${result.metric} ${score.toFixed(4)}  ${JSON.stringify(candidate.algorithms)}`);
  }
  console.log(`[Eval] Best: ${result.best.score.toFixed(4)}  ${JSON.stringify(result.best.params.algorithms)}`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  switch (args.command) {
    case 'help':
      printHelp();
      return;
    case 'version':
      console.log('dase v0.1.0');
      return;
    case 'deploy':
      await startServer({ enginePath: args.enginePath, port: args.port, host: args.host });
      return;
    case 'train':
      await runTrain(args);
      break;
    case 'eval':
      await runEval(args);
      break;
  }
  await disconnectMongo();
}

main().catch((err) => {
  console.error(`[CLI] ${errorMessage(err)}`);
  process.exit(1);
});
