import type { Command } from 'commander';
import { startServer } from '../../api/server.js';
import { parseNumber, requireCompiler } from '../cli-shared.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the local compile API server')
    .option('--host <host>', 'Bind host (default from config: 127.0.0.1)')
    .option('--port <port>', 'Port (default from config: 7900)', parseNumber)
    .action(async (opts: { host?: string; port?: number }) => {
      const { config, registry } = requireCompiler(program);
      const host = opts.host ?? config.api.host;
      const port = opts.port ?? config.api.port;

      console.error('Starting skillc API...');
      console.error(`  Host: ${host}:${port}`);
      console.error(`  API:  http://${host}:${port}/v1`);
      console.error('\nPress Ctrl+C to stop\n');

      await startServer({ host, port, config, registry });
    });
}
