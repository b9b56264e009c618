#!/usr/bin/env node

import 'reflect-metadata';
import { createContainer, loadConfig, TYPES, type IDependencyService } from '@linear-deps/core';
import { createProgram } from './program.js';

const program = createProgram(({ verbose }) => {
  const config = loadConfig();
  const container = createContainer(verbose ? { ...config, logLevel: 'debug' } : config);
  return container.get<IDependencyService>(TYPES.IDependencyService);
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
