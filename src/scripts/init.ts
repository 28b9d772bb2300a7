import { Blockchain } from '../blockchain';
import { loadConfig } from '../config';
import { ChainStore, openDatabase } from '../db';
import { makeLogger } from '../logger';

/** Write the genesis block into an empty store; a populated store is left alone. */
async function main() {
  const config = loadConfig(process.argv.slice(2));
  const log = makeLogger(config.logLevel, config.logFormat);
  const store = new ChainStore(openDatabase(config.dbPath), log);
  await store.open();
  try {
    const stored = await store.getBlocks();
    if (stored.length > 0) {
      log.info({ db: config.dbPath, length: stored.length, genesis: stored[0].hash }, 'Store already initialized');
      return;
    }
    const genesis = Blockchain.createGenesisBlock(config.chain.difficulty);
    if (!(await store.saveBlock(genesis))) throw new Error('Could not write genesis block');
    log.info({ db: config.dbPath, hash: genesis.hash, difficulty: config.chain.difficulty }, 'Genesis created');
  } finally {
    await store.close();
  }
}

main().catch(e => {
  console.error(e);
  process.exit(1);
});
