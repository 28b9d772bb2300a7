import net from 'net';
import { setTimeout as sleep } from 'timers/promises';
import { v4 as uuidv4 } from 'uuid';
import { Block } from '../block';
import { Blockchain } from '../blockchain';
import { Logger, logger as rootLogger } from '../logger';
import { Transaction } from '../transaction';
import { ChainSnapshot, PeerAddress } from '../types';
import { sha256Hex } from '../utils/crypto';
import { BootstrapState, runBootstrap } from './bootstrap';
import {
  INVALID_JSON,
  JoinAck,
  NO_CHAIN,
  Request,
  Response,
  ack,
  decodeRequest,
  decodeResponse,
  encode,
  errorMessage
} from './protocol';
import {
  DEFAULT_TIMEOUT_MS,
  closeServer,
  createMessageServer,
  exchange,
  formatAddress,
  listen,
  parseAddress
} from './transport';

export interface PeerInfo extends PeerAddress {
  nodeId: string;
}

export interface PeerEvents {
  peerAdded?(peer: PeerInfo, trusted: boolean): void;
  peerRemoved?(nodeId: string): void;
}

export interface PeerNodeOptions {
  /** Interface to bind. */
  host: string;
  /** 0 picks an ephemeral port. */
  port: number;
  /** Host announced in join requests; defaults to `host`. */
  advertisedHost?: string;
  bootstrap?: string[];
  chain?: Blockchain;
  requestTimeoutMs?: number;
  /** Pause between listening and bootstrapping. */
  readyDelayMs?: number;
  bootstrapAttempts?: number;
  bootstrapDelayMs?: number;
  events?: PeerEvents;
  log?: Logger;
}

/**
 * A participant in the gossip network. Serves the chain to joining peers,
 * applies gossiped blocks and transactions to the attached chain, and pushes
 * local ones to every known peer. Peers that fail to answer are evicted.
 */
export class PeerNode {
  readonly nodeId: string;
  readonly host: string;
  readonly advertisedHost: string;
  readonly bootstrapNodes: readonly string[];
  chain: Blockchain | null;

  private _port: number;
  private routing = new Map<string, PeerAddress>();
  private server: net.Server | null = null;
  private _running = false;
  private _bootstrapState: BootstrapState = { status: 'idle' };
  private syncing = false;
  private timeoutMs: number;
  private readyDelayMs: number;
  private attempts: number;
  private delayMs: number;
  private events: PeerEvents;
  private log: Logger;

  constructor(options: PeerNodeOptions) {
    this.host = options.host;
    this._port = options.port;
    this.advertisedHost = options.advertisedHost || options.host;
    this.bootstrapNodes = options.bootstrap ?? [];
    this.chain = options.chain ?? null;
    this.timeoutMs = options.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.readyDelayMs = options.readyDelayMs ?? 1000;
    this.attempts = options.bootstrapAttempts ?? 5;
    this.delayMs = options.bootstrapDelayMs ?? 2000;
    this.events = options.events ?? {};
    this.nodeId = sha256Hex(`${this.host}:${this._port}:${uuidv4()}`).slice(0, 16);
    this.log = (options.log ?? rootLogger).child({ module: 'p2p', node: this.nodeId });
  }

  get port(): number {
    return this._port;
  }

  get running(): boolean {
    return this._running;
  }

  get bootstrapState(): BootstrapState {
    return this._bootstrapState;
  }

  /** Where other peers reach this node. */
  get address(): PeerAddress {
    return { host: this.advertisedHost, port: this._port };
  }

  attachChain(chain: Blockchain): void {
    this.chain = chain;
  }

  /** Listen, then bootstrap. Resolves with the terminal bootstrap state. */
  async start(): Promise<BootstrapState> {
    if (this._running) return this._bootstrapState;

    const server = createMessageServer(raw => this.handleMessage(raw), {
      timeoutMs: this.timeoutMs,
      log: this.log,
      onHandlerError: err => encode(errorMessage(err instanceof Error ? err.message : String(err)))
    });
    this._port = await listen(server, this._port, this.host);
    this.server = server;
    this._running = true;
    this.log.info({ host: this.host, port: this._port }, 'Peer node listening');

    if (this.readyDelayMs > 0) await sleep(this.readyDelayMs);

    return runBootstrap(this.bootstrapNodes, address => this.syncFrom(address), {
      attempts: this.attempts,
      delayMs: this.delayMs,
      log: this.log,
      onTransition: state => {
        this._bootstrapState = state;
      }
    });
  }

  async stop(): Promise<void> {
    if (!this._running || !this.server) return;
    this._running = false;
    const server = this.server;
    this.server = null;
    await closeServer(server);
    this.log.info('Peer node stopped');
  }

  addPeer(nodeId: string, address: PeerAddress, trusted = false): boolean {
    if (nodeId === this.nodeId) return false;
    if (address.host === this.advertisedHost && address.port === this._port) return false;
    const known = this.routing.get(nodeId);
    this.routing.set(nodeId, { host: address.host, port: address.port });
    if (!known || known.host !== address.host || known.port !== address.port) {
      this.log.info({ peer: nodeId, address: formatAddress(address) }, 'Peer added');
      this.events.peerAdded?.({ nodeId, ...address }, trusted);
    }
    return true;
  }

  removePeer(nodeId: string): boolean {
    const removed = this.routing.delete(nodeId);
    if (removed) this.events.peerRemoved?.(nodeId);
    return removed;
  }

  getPeers(): PeerInfo[] {
    return [...this.routing].map(([nodeId, address]) => ({ nodeId, ...address }));
  }

  /** Serve one raw inbound message; always produces a reply. */
  async handleMessage(raw: string): Promise<string> {
    const decoded = decodeRequest(raw);
    if (decoded.kind === 'reply') {
      this.log.debug({ error: decoded.reply.error }, 'Rejected inbound message');
      return encode(decoded.reply);
    }
    this.log.debug({ type: decoded.request.type }, 'Handling message');
    return encode(this.handleRequest(decoded.request));
  }

  private handleRequest(request: Request): Response {
    switch (request.type) {
      case 'join': {
        this.addPeer(request.node_id, { host: request.host, port: request.port });
        if (!this.chain) return { type: 'join_ack', error: NO_CHAIN };
        return { type: 'join_ack', chain: this.chain.toJSON(), node_id: this.nodeId };
      }
      case 'get_chain':
        if (!this.chain) return errorMessage(NO_CHAIN);
        return { type: 'chain_response', chain: this.chain.toJSON() };
      case 'new_block':
        this.receiveBlock(request.block, request.node_id);
        return ack();
      case 'new_transaction':
        this.receiveTransaction(request.transaction);
        return ack();
    }
  }

  private receiveBlock(data: unknown, from: string | undefined) {
    const chain = this.chain;
    if (!chain) return;
    let block: Block;
    try {
      block = Block.fromJSON(data);
    } catch (err) {
      this.log.warn({ err: err instanceof Error ? err.message : err }, 'Discarding malformed block');
      return;
    }
    if (chain.addBlock(block)) return;

    if (from && block.index >= chain.length) {
      const peer = this.routing.get(from);
      if (!peer) {
        this.log.debug({ peer: from }, 'Behind an unknown peer, cannot pull its chain');
        return;
      }
      this.pullChain(peer).catch(err => this.log.error({ err }, 'Chain pull failed'));
    }
  }

  private receiveTransaction(data: unknown) {
    const chain = this.chain;
    if (!chain) return;
    try {
      chain.addTransaction(Transaction.fromJSON(data));
    } catch (err) {
      this.log.warn({ err: err instanceof Error ? err.message : err }, 'Discarding malformed transaction');
    }
  }

  private async pullChain(peer: PeerAddress): Promise<void> {
    const chain = this.chain;
    if (this.syncing || !chain) return;
    this.syncing = true;
    try {
      const blocks = await this.requestChain(peer);
      if (blocks && chain.replaceChain(blocks)) {
        this.log.info({ peer: formatAddress(peer), length: blocks.length }, 'Caught up with peer');
      }
    } finally {
      this.syncing = false;
    }
  }

  async broadcastBlock(block: Block): Promise<number> {
    return this.broadcast({ type: 'new_block', block: block.toJSON(), node_id: this.nodeId }, 'Block');
  }

  async broadcastTransaction(tx: Transaction): Promise<number> {
    return this.broadcast({ type: 'new_transaction', transaction: tx.toJSON(), node_id: this.nodeId }, 'Transaction');
  }

  /** Number of peers that acknowledged. Unreachable peers are evicted. */
  private async broadcast(message: Request, what: string): Promise<number> {
    const targets = [...this.routing].filter(([nodeId]) => nodeId !== this.nodeId);
    const payload = encode(message);

    const results = await Promise.all(targets.map(async ([nodeId, address]) => {
      const raw = await exchange(address, payload, this.timeoutMs, this.log);
      if (raw === null) {
        this.log.warn({ peer: nodeId, address: formatAddress(address) }, 'Peer unreachable, evicting');
        this.removePeer(nodeId);
        return false;
      }
      const reply = decodeResponse(raw);
      if (reply?.type !== 'ack') {
        this.log.warn({ peer: nodeId, address: formatAddress(address) }, 'Peer did not acknowledge');
        return false;
      }
      return true;
    }));

    const reached = results.filter(Boolean).length;
    this.log.info({ reached, peers: targets.length }, `${what} broadcast complete`);
    return reached;
  }

  async send(address: PeerAddress, message: Request): Promise<Response | null> {
    const raw = await exchange(address, encode(message), this.timeoutMs, this.log);
    if (raw === null) return null;
    const reply = decodeResponse(raw);
    if (!reply) this.log.warn({ peer: formatAddress(address) }, INVALID_JSON);
    return reply;
  }

  async sendJoin(address: PeerAddress): Promise<JoinAck | null> {
    const reply = await this.send(address, {
      type: 'join',
      node_id: this.nodeId,
      host: this.advertisedHost,
      port: this._port
    });
    return reply?.type === 'join_ack' ? reply : null;
  }

  async requestChain(address: PeerAddress): Promise<Block[] | null> {
    const reply = await this.send(address, { type: 'get_chain' });
    if (reply?.type !== 'chain_response') return null;
    return this.toBlocks(reply.chain);
  }

  private toBlocks(snapshot: ChainSnapshot): Block[] | null {
    try {
      return snapshot.chain.map(data => Block.fromData(data));
    } catch (err) {
      this.log.warn({ err: err instanceof Error ? err.message : err }, 'Peer sent a malformed chain');
      return null;
    }
  }

  /**
   * Join, then fall back to get_chain. Synced when the peer's chain was
   * adopted, or when it shares our genesis and is no longer than ours.
   */
  private async syncFrom(address: string): Promise<boolean> {
    const peer = parseAddress(address);
    if (!peer) {
      this.log.warn({ address }, 'Invalid bootstrap address');
      return false;
    }

    const joined = await this.sendJoin(peer);
    if (joined?.node_id) this.addPeer(joined.node_id, peer, true);
    if (joined?.chain) {
      const blocks = this.toBlocks(joined.chain);
      if (blocks && this.adopt(blocks)) return true;
    }

    const blocks = await this.requestChain(peer);
    return blocks !== null && this.adopt(blocks);
  }

  private adopt(blocks: Block[]): boolean {
    const chain = this.chain;
    if (!chain || blocks.length === 0) return false;
    if (chain.replaceChain(blocks)) return true;
    return blocks[0].hash === chain.chain[0].hash && blocks.length <= chain.length;
  }
}
