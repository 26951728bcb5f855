#!/usr/bin/env node
/**
 * engine-class — runs a JVM class on the engine's classpath
 *
 * Usage:
 *   engine-class <class> [<args>]
 */

import path from 'path';
import { fileURLToPath } from 'url';
import { launch } from './launcher.service.js';
import { nodeFs, nodeRunner } from './launcher.process.js';

// src/modules/launcher and dist/modules/launcher both sit three levels below the root
const defaultHome = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../..');

launch(process.argv.slice(2), {
  env: process.env,
  defaultHome,
  fs: nodeFs,
  runner: nodeRunner,
  stderr: (line) => console.error(line),
})
  .then((status) => process.exit(status))
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
