import { Command, Option } from 'commander';
import path from 'path';
import type { LogFormat } from './logger';

export interface ChainParams {
  /** Leading hex zeros required in a block hash; also used to mine genesis. */
  difficulty: number;
  miningReward: number;
  /** Retarget every N blocks. */
  adjustmentInterval: number;
  /** Seconds. */
  targetBlockTime: number;
  maxPoolSize: number;
}

export interface RateLimitRule {
  limit: number;
  windowMs: number;
}

/** Per-client request budgets for the HTTP API. */
export interface RateLimits {
  /** Every rule applies to each route that has no budget of its own. */
  default: RateLimitRule[];
  chain: RateLimitRule;
  submitTransaction: RateLimitRule;
  mine: RateLimitRule;
}

export interface AppConfig {
  host: string;
  /** Address other peers use to reach this node. */
  advertisedHost: string;
  httpPort: number;
  p2pPort: number;
  bootstrap: string[];
  dbPath: string;
  chain: ChainParams;
  minerAddress?: string;
  requestTimeoutMs: number;
  bootstrapAttempts: number;
  bootstrapDelayMs: number;
  logLevel: string;
  logFormat: LogFormat;
  /** Hostnames whose browser origins may call the HTTP API. */
  allowedHosts: string[];
  /** null turns rate limiting off. */
  rateLimits: RateLimits | null;
}

export const DEFAULT_CHAIN_PARAMS: ChainParams = {
  difficulty: 4,
  miningReward: 10,
  adjustmentInterval: 10,
  targetBlockTime: 10,
  maxPoolSize: 1000
};

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

export const DEFAULT_RATE_LIMITS: RateLimits = {
  default: [
    { limit: 200, windowMs: DAY },
    { limit: 50, windowMs: HOUR },
    { limit: 5, windowMs: MINUTE }
  ],
  chain: { limit: 10, windowMs: MINUTE },
  submitTransaction: { limit: 20, windowMs: MINUTE },
  mine: { limit: 5, windowMs: MINUTE }
};

export const DEFAULT_ALLOWED_HOSTS = ['localhost', '127.0.0.1'];

const DEFAULT_LOG_FORMAT: LogFormat = 'pretty';

export const DEFAULTS = {
  host: '0.0.0.0',
  httpPort: 5000,
  requestTimeoutMs: 5000,
  bootstrapAttempts: 5,
  bootstrapDelayMs: 2000,
  logLevel: 'info',
  logFormat: DEFAULT_LOG_FORMAT
};

function int(name: string, raw: string | undefined, fallback: number, min = 0): number {
  if (raw === undefined || raw === '') return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) throw new Error(`Invalid ${name}: ${raw}`);
  return n;
}

function num(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) throw new Error(`Invalid ${name}: ${raw}`);
  return n;
}

export function parseAddressList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw.split(',').map(s => s.trim()).filter(Boolean);
}

/**
 * Build the node configuration from CLI flags, falling back to the
 * environment and then to defaults.
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): AppConfig {
  const program = new Command();
  program
    .name('chainlet')
    .description('Proof-of-work blockchain node')
    .exitOverride()
    .option('--host <host>', 'Interface to bind', env.HOST)
    .option('--advertised-host <host>', 'Host announced to peers', env.ADVERTISED_HOST)
    .option('-p, --port <number>', 'HTTP API port', env.PORT)
    .option('--p2p-port <number>', 'Peer protocol port (defaults to port+1000)', env.P2P_PORT)
    .option('-b, --bootstrap <addresses>', 'Comma-separated host:port bootstrap peers', env.BOOTSTRAP)
    .option('--db <path>', 'LevelDB directory', env.CHAINLET_DB)
    .option('-d, --difficulty <number>', 'Initial difficulty', env.DIFFICULTY)
    .option('--reward <amount>', 'Mining reward', env.MINING_REWARD)
    .option('--pool-size <number>', 'Transaction pool capacity', env.MAX_POOL_SIZE)
    .option('--block-time <seconds>', 'Target block time', env.TARGET_BLOCK_TIME)
    .option('--mine <address>', 'Mine periodically, paying rewards to this address', env.MINER_ADDRESS)
    .option('--allowed-hosts <hosts>', 'Comma-separated hostnames added to the CORS allowlist', env.ALLOWED_HOSTS)
    .addOption(
      new Option('--rate-limit <mode>', 'Per-client HTTP rate limits')
        .choices(['on', 'off'])
        .default(env.RATE_LIMIT || 'on')
    )
    .addOption(
      new Option('--log-level <level>', 'Log level')
        .choices(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
        .default(env.LOG_LEVEL || DEFAULTS.logLevel)
    )
    .addOption(
      new Option('--log-format <format>', 'Log output')
        .choices(['pretty', 'json'])
        .default(env.LOG_FORMAT || DEFAULTS.logFormat)
    )
    .parse(argv, { from: 'user' });

  const opts = program.opts<Record<string, string | undefined>>();

  const httpPort = int('port', opts.port, DEFAULTS.httpPort);
  const host = opts.host || DEFAULTS.host;
  const logFormat: LogFormat = opts.logFormat === 'json' ? 'json' : 'pretty';

  return {
    host,
    advertisedHost: opts.advertisedHost || (host === '0.0.0.0' ? '127.0.0.1' : host),
    httpPort,
    p2pPort: int('p2p port', opts.p2pPort, httpPort + 1000),
    bootstrap: parseAddressList(opts.bootstrap),
    dbPath: opts.db || path.join(process.cwd(), 'data', 'leveldb'),
    chain: {
      difficulty: int('difficulty', opts.difficulty, DEFAULT_CHAIN_PARAMS.difficulty, 1),
      miningReward: num('reward', opts.reward, DEFAULT_CHAIN_PARAMS.miningReward),
      adjustmentInterval: DEFAULT_CHAIN_PARAMS.adjustmentInterval,
      targetBlockTime: num('block time', opts.blockTime, DEFAULT_CHAIN_PARAMS.targetBlockTime),
      maxPoolSize: int('pool size', opts.poolSize, DEFAULT_CHAIN_PARAMS.maxPoolSize, 1)
    },
    minerAddress: opts.mine || undefined,
    requestTimeoutMs: DEFAULTS.requestTimeoutMs,
    bootstrapAttempts: DEFAULTS.bootstrapAttempts,
    bootstrapDelayMs: DEFAULTS.bootstrapDelayMs,
    logLevel: opts.logLevel || DEFAULTS.logLevel,
    logFormat,
    allowedHosts: [...new Set([...DEFAULT_ALLOWED_HOSTS, ...parseAddressList(opts.allowedHosts)])],
    rateLimits: opts.rateLimit === 'off' ? null : DEFAULT_RATE_LIMITS
  };
}
