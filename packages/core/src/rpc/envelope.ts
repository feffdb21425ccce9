import type {
  GetBlockDagInfoResponseMessage,
  GetBlockResponseMessage,
  GetUtxosByAddressesResponseMessage,
  NotifyUtxosChangedResponseMessage,
  RpcTransactionMessage,
  SubmitTransactionResponseMessage,
  UtxosChangedNotificationMessage,
} from "./wire.js";

/**
 * Logical request and reply envelopes exchanged with the node. Exactly one
 * payload variant is set per envelope; `kind` is the tag.
 */

export type RequestPayload =
  | { kind: "getBlock"; hash: string; includeTransactions: boolean }
  | {
      kind: "submitTransaction";
      transaction: RpcTransactionMessage;
      allowOrphan: boolean;
    }
  | { kind: "getBlockDagInfo" }
  | { kind: "getUtxosByAddresses"; addresses: string[] }
  | { kind: "notifyUtxosChanged"; addresses: string[] };

export type RequestKind = RequestPayload["kind"];

/** Request kinds answered by exactly one reply on their own stream. */
export type UnaryRequestKind = Exclude<RequestKind, "notifyUtxosChanged">;

export type UnaryRequestPayload = Extract<RequestPayload, { kind: UnaryRequestKind }>;

export type RequestParams<K extends RequestKind> = Omit<
  Extract<RequestPayload, { kind: K }>,
  "kind"
>;

export interface RequestEnvelope {
  /** Correlation ID; 0n until the adapter stamps it. */
  id: bigint;
  payload: RequestPayload;
}

export type ResponsePayload =
  | { kind: "getBlock"; message: GetBlockResponseMessage }
  | { kind: "submitTransaction"; message: SubmitTransactionResponseMessage }
  | { kind: "getBlockDagInfo"; message: GetBlockDagInfoResponseMessage }
  | { kind: "getUtxosByAddresses"; message: GetUtxosByAddressesResponseMessage }
  | { kind: "notifyUtxosChanged"; message: NotifyUtxosChangedResponseMessage }
  | { kind: "utxosChanged"; message: UtxosChangedNotificationMessage }
  /** A variant the gateway does not model, or one that failed to decode. */
  | { kind: "unknown"; field: string | null };

export type ResponseKind = ResponsePayload["kind"];

export type ResponseFor<K extends RequestKind> = Extract<ResponsePayload, { kind: K }>;

export interface ResponseEnvelope {
  id: string;
  payload: ResponsePayload;
}

/** Operation names used for latency metrics, matching the HTTP routes. */
export const OPERATION_NAMES: Record<RequestKind, string> = {
  getBlock: "get_block",
  submitTransaction: "submit_transaction",
  getBlockDagInfo: "get_dag_tips",
  getUtxosByAddresses: "get_utxos_by_addresses",
  notifyUtxosChanged: "subscribe_utxo",
};
