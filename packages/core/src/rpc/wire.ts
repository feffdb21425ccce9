import { z } from "zod";

/**
 * Shapes of protowire messages as @grpc/proto-loader hands them over
 * (keepCase, longs as String, enums as String, defaults, oneofs).
 *
 * A sub-message the node left out decodes to `null`, never to a
 * zero-valued object.
 */

/** 64-bit integers travel as decimal strings. */
const u64 = z
  .union([z.string(), z.number(), z.bigint()])
  .transform((value) => String(value))
  .default("0");

const str = z.string().default("");
const u32 = z.number().int().default(0);
const bool = z.boolean().default(false);
const double = z.number().default(0);
const strings = z.array(z.string()).default([]);

function optionalMessage<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value): z.output<T> | null => value ?? null);
}

function repeated<T extends z.ZodTypeAny>(schema: T) {
  return z.array(schema).default([]);
}

export const RpcErrorSchema = z.object({ message: str });

export const RpcScriptPublicKeySchema = z.object({
  version: u32,
  scriptPublicKey: str,
});

export const RpcOutpointSchema = z.object({
  transactionId: str,
  index: u32,
});

export const RpcUtxoEntrySchema = z.object({
  amount: u64,
  scriptPublicKey: optionalMessage(RpcScriptPublicKeySchema),
  blockDaaScore: u64,
  isCoinbase: bool,
});

export const RpcUtxosByAddressesEntrySchema = z.object({
  address: str,
  outpoint: optionalMessage(RpcOutpointSchema),
  utxoEntry: optionalMessage(RpcUtxoEntrySchema),
});

export const RpcBlockHeaderSchema = z.object({
  version: u32,
  parents: repeated(z.object({ parentHashes: strings })),
  hashMerkleRoot: str,
  acceptedIdMerkleRoot: str,
  utxoCommitment: str,
  timestamp: u64,
  bits: u32,
  nonce: u64,
  daaScore: u64,
  blueWork: str,
  pruningPoint: str,
  blueScore: u64,
  hash: str,
});

export const RpcTransactionInputSchema = z.object({
  previousOutpoint: optionalMessage(RpcOutpointSchema),
  signatureScript: str,
  sequence: u64,
  sigOpCount: u32,
});

export const RpcTransactionOutputSchema = z.object({
  amount: u64,
  scriptPublicKey: optionalMessage(RpcScriptPublicKeySchema),
});

export const RpcTransactionSchema = z.object({
  version: u32,
  inputs: repeated(RpcTransactionInputSchema),
  outputs: repeated(RpcTransactionOutputSchema),
  lockTime: u64,
  subnetworkId: str,
  gas: u64,
  payload: str,
  mass: u64,
  verboseData: optionalMessage(
    z.object({
      transactionId: str,
      hash: str,
      computeMass: u64,
      blockHash: str,
      blockTime: u64,
    }),
  ),
});

export const RpcBlockVerboseDataSchema = z.object({
  hash: str,
  difficulty: double,
  selectedParentHash: str,
  transactionIds: strings,
  isHeaderOnly: bool,
  blueScore: u64,
  childrenHashes: strings,
  isChainBlock: bool,
});

export const RpcBlockSchema = z.object({
  header: optionalMessage(RpcBlockHeaderSchema),
  transactions: repeated(RpcTransactionSchema),
  verboseData: optionalMessage(RpcBlockVerboseDataSchema),
});

const nodeError = optionalMessage(RpcErrorSchema);

export const GetBlockResponseSchema = z.object({
  block: optionalMessage(RpcBlockSchema),
  error: nodeError,
});

export const SubmitTransactionResponseSchema = z.object({
  transactionId: str,
  error: nodeError,
});

export const GetBlockDagInfoResponseSchema = z.object({
  networkName: str,
  blockCount: u64,
  headerCount: u64,
  tipHashes: strings,
  difficulty: double,
  pastMedianTime: u64,
  virtualParentHashes: strings,
  pruningPointHash: str,
  virtualDaaScore: u64,
  sink: str,
  error: nodeError,
});

export const GetUtxosByAddressesResponseSchema = z.object({
  entries: repeated(RpcUtxosByAddressesEntrySchema),
  error: nodeError,
});

export const NotifyUtxosChangedResponseSchema = z.object({
  error: nodeError,
});

export const UtxosChangedNotificationSchema = z.object({
  added: repeated(RpcUtxosByAddressesEntrySchema),
  removed: repeated(RpcUtxosByAddressesEntrySchema),
});

export type RpcError = z.output<typeof RpcErrorSchema>;
export type RpcScriptPublicKey = z.output<typeof RpcScriptPublicKeySchema>;
export type RpcOutpoint = z.output<typeof RpcOutpointSchema>;
export type RpcUtxoEntry = z.output<typeof RpcUtxoEntrySchema>;
export type RpcUtxosByAddressesEntry = z.output<typeof RpcUtxosByAddressesEntrySchema>;
export type RpcBlockHeader = z.output<typeof RpcBlockHeaderSchema>;
export type RpcBlock = z.output<typeof RpcBlockSchema>;
export type RpcTransaction = z.output<typeof RpcTransactionSchema>;
export type GetBlockResponseMessage = z.output<typeof GetBlockResponseSchema>;
export type SubmitTransactionResponseMessage = z.output<typeof SubmitTransactionResponseSchema>;
export type GetBlockDagInfoResponseMessage = z.output<typeof GetBlockDagInfoResponseSchema>;
export type GetUtxosByAddressesResponseMessage = z.output<typeof GetUtxosByAddressesResponseSchema>;
export type NotifyUtxosChangedResponseMessage = z.output<typeof NotifyUtxosChangedResponseSchema>;
export type UtxosChangedNotificationMessage = z.output<typeof UtxosChangedNotificationSchema>;

// --- outbound ---

export interface RpcTransactionInputMessage {
  previousOutpoint: { transactionId: string; index: number };
  signatureScript: string;
  sequence: string;
  sigOpCount: number;
}

export interface RpcTransactionOutputMessage {
  amount: string;
  scriptPublicKey: { scriptPublicKey: string; version: number };
}

/** Transaction as submitted; the node fills in mass and verbose data. */
export interface RpcTransactionMessage {
  version: number;
  inputs: RpcTransactionInputMessage[];
  outputs: RpcTransactionOutputMessage[];
  lockTime: string;
  subnetworkId: string;
  gas: string;
  payload: string;
  mass: string;
}

export interface KaspadRequestMessage {
  id: string;
  getBlockRequest?: { hash: string; includeTransactions: boolean };
  submitTransactionRequest?: {
    transaction: RpcTransactionMessage;
    allowOrphan: boolean;
  };
  getBlockDagInfoRequest?: Record<string, never>;
  getUtxosByAddressesRequest?: { addresses: string[] };
  notifyUtxosChangedRequest?: {
    addresses: string[];
    command: "NOTIFY_START" | "NOTIFY_STOP";
  };
}

/** Names of the reply fields inside KaspadResponse's `payload` oneof. */
export const RESPONSE_FIELDS = [
  "getBlockResponse",
  "submitTransactionResponse",
  "getBlockDagInfoResponse",
  "getUtxosByAddressesResponse",
  "notifyUtxosChangedResponse",
  "utxosChangedNotification",
] as const;

export type ResponseField = (typeof RESPONSE_FIELDS)[number];
