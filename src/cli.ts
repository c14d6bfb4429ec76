#!/usr/bin/env node
import { Command } from "commander";

import { readConfigFromEnv } from "./config";
import { startOracleRelay } from "./index";

async function main(): Promise<void> {
  const program = new Command();

  program
    .name("oracle-relay")
    .option("--port <port>", "RPC port (overrides PORT)")
    .option("--data-dir <dir>", "State directory (overrides DATA_DIR)");
  program.parse(process.argv);

  const opts = program.opts<{ port?: string; dataDir?: string }>();
  if (opts.port) process.env.PORT = opts.port;
  if (opts.dataDir) process.env.DATA_DIR = opts.dataDir;

  const config = readConfigFromEnv();
  const relay = await startOracleRelay(config);

  // eslint-disable-next-line no-console
  console.log(`Oracle relay listening on ${relay.server.url}/rpc`);

  const shutdown = (): void => {
    relay.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        // eslint-disable-next-line no-console
        console.error(err);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

void main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
