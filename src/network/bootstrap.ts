import { setTimeout as sleep } from 'timers/promises';
import { Logger, logger as rootLogger } from '../logger';

export type BootstrapState =
  | { status: 'idle' }
  | { status: 'attempting'; attempt: number }
  | { status: 'waiting'; attempt: number }
  | { status: 'synced'; address: string }
  | { status: 'fallback' };

export interface BootstrapOptions {
  attempts: number;
  delayMs: number;
  log?: Logger;
  onTransition?: (state: BootstrapState) => void;
}

/**
 * Walk the bootstrap addresses in order, up to `attempts` rounds with
 * `delayMs` between them. Stops at the first address `trySync` accepts.
 * Ends in `fallback` when every round fails, leaving the local chain as is.
 */
export async function runBootstrap(
  addresses: readonly string[],
  trySync: (address: string) => Promise<boolean>,
  { attempts, delayMs, log = rootLogger, onTransition }: BootstrapOptions
): Promise<BootstrapState> {
  const enter = (state: BootstrapState): BootstrapState => {
    log.debug({ state }, 'Bootstrap state');
    onTransition?.(state);
    return state;
  };

  if (addresses.length === 0) {
    log.info('No bootstrap nodes configured, starting with local chain');
    return enter({ status: 'fallback' });
  }

  for (let attempt = 1; attempt <= attempts; attempt++) {
    enter({ status: 'attempting', attempt });
    for (const address of addresses) {
      let ok = false;
      try {
        ok = await trySync(address);
      } catch (err) {
        log.warn({ err, address }, 'Bootstrap node failed');
      }
      if (ok) {
        log.info({ address, attempt }, 'Synchronized with bootstrap node');
        return enter({ status: 'synced', address });
      }
    }
    if (attempt < attempts) {
      enter({ status: 'waiting', attempt });
      log.info({ attempt, attempts, delayMs }, 'Bootstrap attempt failed, retrying');
      await sleep(delayMs);
    }
  }

  log.warn({ attempts }, 'Could not reach any bootstrap node, keeping local chain');
  return enter({ status: 'fallback' });
}
