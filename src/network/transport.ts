import net from 'net';
import { Logger, logger as rootLogger } from '../logger';
import { PeerAddress } from '../types';

export const DEFAULT_TIMEOUT_MS = 5000;
/** Upper bound on a single message; a full chain snapshot fits comfortably. */
export const MAX_MESSAGE_BYTES = 32 * 1024 * 1024;

export function parseAddress(address: string): PeerAddress | null {
  const idx = address.lastIndexOf(':');
  if (idx <= 0) return null;
  const host = address.slice(0, idx).trim();
  const port = Number(address.slice(idx + 1));
  if (!host || !Number.isInteger(port) || port < 1 || port > 65535) return null;
  return { host, port };
}

export const formatAddress = ({ host, port }: PeerAddress): string => `${host}:${port}`;

/**
 * Open a connection, write `payload`, half-close, and collect the reply until
 * the remote closes. Resolves null on connection error, timeout, an oversized
 * or empty reply. Never rejects.
 */
export function exchange(
  address: PeerAddress,
  payload: string,
  timeoutMs = DEFAULT_TIMEOUT_MS,
  log: Logger = rootLogger
): Promise<string | null> {
  return new Promise(resolve => {
    const chunks: Buffer[] = [];
    let size = 0;
    let settled = false;

    const socket = net.connect({ host: address.host, port: address.port });

    const finish = (reply: string | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      resolve(reply);
    };

    const timer = setTimeout(() => {
      log.debug({ peer: formatAddress(address), timeoutMs }, 'Peer request timed out');
      finish(null);
    }, timeoutMs);

    socket.on('connect', () => {
      socket.end(payload);
    });
    socket.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_MESSAGE_BYTES) {
        log.warn({ peer: formatAddress(address), size }, 'Peer reply too large');
        finish(null);
        return;
      }
      chunks.push(chunk);
    });
    socket.on('end', () => {
      const reply = Buffer.concat(chunks).toString('utf8');
      finish(reply.length > 0 ? reply : null);
    });
    socket.on('error', err => {
      log.debug({ peer: formatAddress(address), err: err.message }, 'Peer connection failed');
      finish(null);
    });
    socket.on('close', () => finish(null));
  });
}

export type RawHandler = (raw: string, remote: string) => Promise<string> | string;

/** True once `raw` holds a whole JSON object. */
function isCompleteObject(raw: string): boolean {
  if (!raw.trimEnd().endsWith('}')) return false;
  try {
    JSON.parse(raw);
    return true;
  } catch (e) {
    return false;
  }
}

/**
 * A listener that reads one request per connection, passes it to `handler`
 * and writes the reply before closing. A request is dispatched as soon as the
 * bytes received form a complete JSON object, so clients that keep their
 * write side open are answered too. Anything else is dispatched when the
 * client half-closes.
 */
export function createMessageServer(
  handler: RawHandler,
  { timeoutMs = DEFAULT_TIMEOUT_MS, log = rootLogger, onHandlerError }: {
    timeoutMs?: number;
    log?: Logger;
    onHandlerError: (err: unknown) => string;
  }
): net.Server {
  return net.createServer({ allowHalfOpen: true }, socket => {
    const remote = `${socket.remoteAddress ?? '?'}:${socket.remotePort ?? '?'}`;
    const chunks: Buffer[] = [];
    let size = 0;
    let dispatched = false;

    socket.setTimeout(timeoutMs, () => {
      log.debug({ remote }, 'Inbound connection idle, closing');
      socket.destroy();
    });

    const dispatch = (raw: string) => {
      dispatched = true;
      Promise.resolve()
        .then(() => handler(raw, remote))
        .catch(err => {
          log.error({ err, remote }, 'Error handling peer message');
          return onHandlerError(err);
        })
        .then(reply => {
          if (!socket.destroyed) socket.end(reply);
        })
        .catch(err => {
          log.error({ err, remote }, 'Failed to write peer reply');
          socket.destroy();
        });
    };

    socket.on('data', (chunk: Buffer) => {
      if (dispatched) return;
      size += chunk.length;
      if (size > MAX_MESSAGE_BYTES) {
        log.warn({ remote, size }, 'Inbound message too large');
        socket.destroy();
        return;
      }
      chunks.push(chunk);
      const raw = Buffer.concat(chunks).toString('utf8');
      if (isCompleteObject(raw)) dispatch(raw);
    });

    socket.on('end', () => {
      if (!dispatched) dispatch(Buffer.concat(chunks).toString('utf8'));
    });

    socket.on('error', err => {
      log.debug({ remote, err: err.message }, 'Inbound connection error');
    });
  });
}

export function listen(server: net.Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      const bound = server.address();
      resolve(bound !== null && typeof bound === 'object' ? bound.port : port);
    });
  });
}

export function closeServer(server: net.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
  });
}
