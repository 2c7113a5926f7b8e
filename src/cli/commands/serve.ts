import { Command } from 'commander';
import { setLogLevel } from '../../logger';
import { createAppContext, startServer } from '../../server';

export const serveCommand = new Command('serve')
  .description('Start the HTTP service (workflow registry, runs, GitHub webhooks)')
  .option('-p, --port <port>', 'port to listen on')
  .action(async (options: { port?: string }) => {
    const ctx = createAppContext();
    setLogLevel(ctx.config.logLevel);
    const port = options.port === undefined ? ctx.config.port : Number(options.port);
    if (!Number.isInteger(port) || port < 0) {
      throw new Error(`Invalid port "${options.port}"`);
    }
    await startServer(ctx, port);
  });
