/**
 * JSON shapes returned by the gateway. HTTP bodies use camelCase keys;
 * WebSocket frames use snake_case keys. 64-bit integers are decimal strings.
 */

/** Envelope of every successful RPC route response. */
export type RpcResponse<T> = {
  success: boolean;
  data: T | null;
  error: string | null;
  latency_ms: number;
};

/** Body of every failed HTTP response. `code` repeats the HTTP status. */
export type ErrorBody = {
  error: string;
  code: number;
  kind: string;
};

export type BlockHeader = {
  version: number;
  hashMerkleRoot: string;
  acceptedIdMerkleRoot: string;
  utxoCommitment: string;
  timestamp: string;
  bits: number;
  nonce: string;
  daaScore: string;
  blueWork: string;
  blueScore: string;
  pruningPoint: string;
};

export type Outpoint = {
  transactionId: string;
  index: number;
};

export type Transaction = {
  transactionId: string;
  hash: string;
  mass: string;
  inputs: Array<{
    previousOutpoint: Outpoint;
    signatureScript: string;
    sequence: string;
  }>;
  outputs: Array<{
    amount: string;
    scriptPublicKey: string;
  }>;
};

export type BlockVerboseData = {
  hash: string;
  difficulty: number;
  selectedParentHash: string;
  transactionIds: string[];
  isHeaderOnly: boolean;
  blueScore: string;
  isChainBlock: boolean;
};

export type BlockResponse = {
  hash: string;
  header: BlockHeader;
  transactions: Transaction[];
  verboseData: BlockVerboseData | null;
};

export type SubmitTransactionResponse = {
  transactionId: string;
};

export type DagTipsResponse = {
  networkName: string;
  tipHashes: string[];
  blockCount: string;
  headerCount: string;
  difficulty: number;
  pastMedianTime: string;
  virtualParentHashes: string[];
  pruningPointHash: string;
  virtualDaaScore: string;
  sink: string;
};

export type UtxoEntry = {
  amount: string;
  scriptPublicKey: string | null;
  blockDaaScore: string;
  isCoinbase: boolean;
};

export type UtxosByAddressesResponse = {
  entries: Array<{
    address: string;
    outpoint: Outpoint | null;
    utxoEntry: UtxoEntry | null;
  }>;
};

// --- WebSocket frames ---

export type SubscribedFrame = {
  status: "subscribed";
  addresses: string[];
};

export type UtxoChangedFrame = {
  type: "utxo_changed";
  added: Array<{
    address: string;
    outpoint: { transaction_id: string; index: number } | null;
    utxo_entry: {
      amount: string;
      script_public_key: string | null;
      block_daa_score: string;
      is_coinbase: boolean;
    } | null;
  }>;
  removed: Array<{
    address: string;
    outpoint: { transaction_id: string; index: number } | null;
  }>;
};

export type ErrorFrame = {
  error: string;
};

export type GatewayFrame = SubscribedFrame | UtxoChangedFrame | ErrorFrame;
