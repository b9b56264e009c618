#!/usr/bin/env node

import 'reflect-metadata';
import { createContainer, loadConfig, TYPES, type IDependencyService } from '@linear-deps/core';
import { DepsMCPServer } from './server.js';

try {
  const container = createContainer(loadConfig());
  const server = new DepsMCPServer(container.get<IDependencyService>(TYPES.IDependencyService));
  server.start().catch((error: unknown) => {
    console.error('Failed to start MCP server:', error);
    process.exitCode = 1;
  });
} catch (error) {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
}
