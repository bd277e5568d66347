#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { resolveDataDir } from './config.js';
import { createStderrLogger } from './logger.js';
import { runScan } from './pipeline.js';
import { ScanRunner } from './run-state.js';
import { createClockServer } from './server.js';

const dataDir = resolveDataDir();
// stdout carries the protocol
const logger = createStderrLogger(process.env.CLOCK_VERBOSE === '1');
const runner = new ScanRunner(scanLogger => runScan({ dataDir, logger: scanLogger }), { logger });
const server = createClockServer({ dataDir, runner, logger });

// --- Start server ---
async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  console.error('MCP server error:', err);
  process.exit(1);
});
