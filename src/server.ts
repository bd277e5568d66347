import { join } from 'node:path';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { HISTORY_FILE, loadHistory } from './analysis/history.js';
import { loadConfig, REDACTED, trustedRoot, updateConfigFile } from './config.js';
import { formatError } from './errors.js';
import type { Logger } from './logger.js';
import type { ScanRunner } from './run-state.js';
import type { ClockConfig } from './types.js';

export interface ClockServerOptions {
  dataDir: string;
  runner: ScanRunner;
  logger: Logger;
  trustedRoot?: string;
  version?: string;
}

type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

function json(value: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

function failure(message: string): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify({ error: message }) }], isError: true };
}

/** The config as shown to clients; the API key never leaves the process. */
export function redactConfig(config: ClockConfig): ClockConfig {
  const { apiKey, ...enrich } = config.enrich;
  return { ...config, enrich: apiKey ? { ...enrich, apiKey: REDACTED } : enrich };
}

export function createClockServer(opts: ClockServerOptions): McpServer {
  const { dataDir, runner, logger } = opts;
  const server = new McpServer({
    name: 'capability-clock',
    version: opts.version ?? '0.1.0',
  });

  // --- Tool: clock_scan ---
  server.tool(
    'clock_scan',
    'Start a background scan of all configured repositories. Returns immediately; poll clock_status for the outcome.',
    async () => json({ ...runner.trigger(), data_dir: dataDir }),
  );

  // --- Tool: clock_status ---
  server.tool(
    'clock_status',
    'Whether a scan is running, how the last one ended, and the latest convergence snapshot.',
    async () => {
      const history = loadHistory(join(dataDir, HISTORY_FILE), logger);
      return json({
        ...runner.status(),
        latest: history.length > 0 ? history[history.length - 1] : null,
      });
    },
  );

  // --- Tool: clock_log ---
  server.tool(
    'clock_log',
    'Log lines captured from the current or most recent scan.',
    {
      tail: z.number().int().positive().optional().describe('Only return the last N lines'),
    },
    async ({ tail }) => {
      const lines = runner.log();
      return json({ lines: tail ? lines.slice(-tail) : lines });
    },
  );

  // --- Tool: clock_get_config ---
  server.tool(
    'clock_get_config',
    'The effective configuration (defaults merged with clock.config.json).',
    async () => {
      try {
        return json(redactConfig(loadConfig(dataDir, logger)));
      } catch (err) {
        return failure(formatError(err));
      }
    },
  );

  // --- Tool: clock_set_config ---
  server.tool(
    'clock_set_config',
    'Merge settings into clock.config.json. Rejected when invalid, when scan locations fall outside the trusted root, or when it changes enrich.apiUrl or enrich.apiKey.',
    {
      config: z.record(z.unknown()).describe('Partial configuration to merge, e.g. {"repos": {"scanDirs": ["~/code"]}}'),
    },
    async ({ config }) => {
      try {
        const effective = updateConfigFile(dataDir, config, opts.trustedRoot ?? trustedRoot(), logger, {
          lockCredentials: true,
        });
        return json(redactConfig(effective));
      } catch (err) {
        return failure(formatError(err));
      }
    },
  );

  return server;
}
