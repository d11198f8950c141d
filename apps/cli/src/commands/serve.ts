import { Command } from 'commander';
import { closeDb, createLogger, setLogLevel } from '@caseflow/core';
import { ApiServer, createApp, loadConfig } from '@caseflow/api';
import * as out from '../output.js';
import { openStore, $tryAsync } from '../helpers.js';
import type { GlobalOptions } from '../helpers.js';

const log = createLogger('Serve');

type ServeOptions = GlobalOptions & {
  port?: string;
  host?: string;
  logLevel?: string;
};

/** Receives the shutdown routine once the server is up */
export type ShutdownRegistrar = (shutdown: () => Promise<void>) => void;

/** Stop on the first SIGINT or SIGTERM */
export const onProcessSignals: ShutdownRegistrar = (shutdown) => {
  const handle = (signal: NodeJS.Signals): void => {
    log.info(`Received ${signal}, shutting down`);
    shutdown().catch((err: unknown) => {
      log.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', handle);
  process.once('SIGTERM', handle);
};

export function createServeCommand(registerShutdown: ShutdownRegistrar = onProcessSignals): Command {
  return new Command('serve')
    .description('Start the task REST API')
    .option('--port <port>', 'Port to listen on (env CASEFLOW_PORT, default 8080)')
    .option('--host <host>', 'Address to bind (env CASEFLOW_HOST, default 0.0.0.0)')
    .option('--log-level <level>', 'debug, info, warn, error or silent (env CASEFLOW_LOG_LEVEL)')
    .action((_opts: unknown, cmd: Command) => $tryAsync(async () => {
      const g = cmd.optsWithGlobals<ServeOptions>();
      const config = loadConfig(process.env, {
        port: g.port,
        host: g.host,
        dbPath: g.db,
        logLevel: g.logLevel,
      });
      setLogLevel(config.logLevel);

      const store = openStore(config.dbPath);
      const server = new ApiServer({ port: config.port, host: config.host }, createApp(store.service));
      let url: string;
      try {
        ({ url } = await server.start());
      } catch (err: unknown) {
        closeDb(store.db);
        throw err;
      }

      out.success(`Caseflow API listening on ${url} (database: ${config.dbPath})`);
      registerShutdown(async () => {
        await server.stop();
        closeDb(store.db);
      });
    }));
}
