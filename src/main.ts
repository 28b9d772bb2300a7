#!/usr/bin/env node
import { CommanderError } from 'commander';
import { loadConfig } from './config';
import { createAppContext } from './context';
import { makeLogger } from './logger';
import { createHttpServer } from './server';

async function main() {
  const config = loadConfig(process.argv.slice(2));
  const log = makeLogger(config.logLevel, config.logFormat);

  const ctx = await createAppContext(config, { log });
  const http = createHttpServer(ctx);
  const httpPort = await http.listen(config.httpPort);
  log.info({ host: config.host, port: httpPort }, 'HTTP API listening');

  const bootstrap = await ctx.node.start();
  log.info({ node: ctx.node.nodeId, bootstrap: bootstrap.status, length: ctx.chain.length }, 'Node ready');

  // periodic miner
  let miner: NodeJS.Timeout | undefined;
  const minerAddress = config.minerAddress;
  if (minerAddress) {
    let busy = false;
    miner = setInterval(() => {
      if (busy) return;
      busy = true;
      ctx.chain.minePendingTransactions(minerAddress)
        .then(block => (block ? ctx.node.broadcastBlock(block) : 0))
        .catch(err => log.error({ err }, 'Periodic mining failed'))
        .finally(() => {
          busy = false;
        });
    }, config.chain.targetBlockTime * 1000);
    log.info({ miner: minerAddress, every: config.chain.targetBlockTime }, 'Periodic mining enabled');
  }

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, 'Shutting down');
    if (miner) clearInterval(miner);
    http.close()
      .then(() => ctx.close())
      .then(() => process.exit(0))
      .catch(err => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(e => {
  if (e instanceof CommanderError) process.exit(e.exitCode);
  console.error(e);
  process.exit(1);
});
