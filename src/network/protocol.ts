import { z } from 'zod';
import { ChainSnapshotSchema } from '../types';

/*
Wire protocol: one UTF-8 JSON object per direction per connection.

  join{node_id,host,port}        -> join_ack{chain,node_id} | join_ack{error}
  get_chain{}                    -> chain_response{chain}
  new_block{block,node_id?}      -> ack
  new_transaction{transaction,node_id?} -> ack
  anything else                  -> error{error}
*/

export const JoinSchema = z.object({
  type: z.literal('join'),
  node_id: z.string().min(1),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535)
});

export const GetChainSchema = z.object({
  type: z.literal('get_chain')
});

export const NewBlockSchema = z.object({
  type: z.literal('new_block'),
  block: z.unknown(),
  node_id: z.string().optional()
});

export const NewTransactionSchema = z.object({
  type: z.literal('new_transaction'),
  transaction: z.unknown(),
  node_id: z.string().optional()
});

export const JoinAckSchema = z.object({
  type: z.literal('join_ack'),
  chain: ChainSnapshotSchema.optional(),
  node_id: z.string().optional(),
  error: z.string().optional()
});

export const ChainResponseSchema = z.object({
  type: z.literal('chain_response'),
  chain: ChainSnapshotSchema
});

export const AckSchema = z.object({
  type: z.literal('ack')
});

export const ErrorMessageSchema = z.object({
  type: z.literal('error'),
  error: z.string()
});

export const ResponseSchema = z.discriminatedUnion('type', [
  JoinAckSchema,
  ChainResponseSchema,
  AckSchema,
  ErrorMessageSchema
]);

export type JoinRequest = z.infer<typeof JoinSchema>;
export type GetChainRequest = z.infer<typeof GetChainSchema>;
export type NewBlockRequest = z.infer<typeof NewBlockSchema>;
export type NewTransactionRequest = z.infer<typeof NewTransactionSchema>;
export type Request = JoinRequest | GetChainRequest | NewBlockRequest | NewTransactionRequest;

export type JoinAck = z.infer<typeof JoinAckSchema>;
export type ChainResponse = z.infer<typeof ChainResponseSchema>;
export type Ack = z.infer<typeof AckSchema>;
export type ErrorMessage = z.infer<typeof ErrorMessageSchema>;
export type Response = z.infer<typeof ResponseSchema>;

export const INVALID_JSON = 'Invalid JSON';
export const UNKNOWN_TYPE = 'Unknown message type';
export const INVALID_JOIN = 'Invalid join request';
export const NO_CHAIN = 'No blockchain available';

export const ack = (): Ack => ({ type: 'ack' });
export const errorMessage = (error: string): ErrorMessage => ({ type: 'error', error });

export type Decoded =
  | { kind: 'request'; request: Request }
  | { kind: 'reply'; reply: ErrorMessage };

export function encode(message: Request | Response): string {
  return JSON.stringify(message);
}

function parseJson(raw: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (e) {
    return { ok: false };
  }
}

/**
 * Decode an inbound request. Anything that cannot be served becomes the
 * error reply to send back.
 */
export function decodeRequest(raw: string): Decoded {
  const json = parseJson(raw);
  if (!json.ok) return { kind: 'reply', reply: errorMessage(INVALID_JSON) };

  const envelope = z.object({ type: z.string() }).safeParse(json.value);
  if (!envelope.success) return { kind: 'reply', reply: errorMessage(UNKNOWN_TYPE) };

  switch (envelope.data.type) {
    case 'join': {
      const parsed = JoinSchema.safeParse(json.value);
      return parsed.success ? { kind: 'request', request: parsed.data } : { kind: 'reply', reply: errorMessage(INVALID_JOIN) };
    }
    case 'get_chain':
      return { kind: 'request', request: { type: 'get_chain' } };
    case 'new_block': {
      const parsed = NewBlockSchema.safeParse(json.value);
      return parsed.success ? { kind: 'request', request: parsed.data } : { kind: 'reply', reply: errorMessage('Invalid new_block request') };
    }
    case 'new_transaction': {
      const parsed = NewTransactionSchema.safeParse(json.value);
      return parsed.success ? { kind: 'request', request: parsed.data } : { kind: 'reply', reply: errorMessage('Invalid new_transaction request') };
    }
    default:
      return { kind: 'reply', reply: errorMessage(UNKNOWN_TYPE) };
  }
}

/** Decode a reply; null when it is not JSON or not a known response. */
export function decodeResponse(raw: string): Response | null {
  const json = parseJson(raw);
  if (!json.ok) return null;
  const parsed = ResponseSchema.safeParse(json.value);
  return parsed.success ? parsed.data : null;
}
