#!/usr/bin/env node

import { createRootLogger, resolveConfig } from '@wires/core';
import type { WiresConfig } from '@wires/core';
import { createProcessContext } from './context.js';
import { createProgram } from './program.js';
import * as out from './output.js';

function loadConfig(): WiresConfig {
  try {
    return resolveConfig(process.env);
  } catch (err: unknown) {
    out.printError(err, process.stdout.isTTY ? 'table' : 'json');
    process.exit(1);
  }
}

const config = loadConfig();
createRootLogger(config);
const ctx = createProcessContext(config);

try {
  createProgram(ctx).parse();
} finally {
  ctx.close();
}
