import { DecodeError } from "../../infra/errors.js";
import { err, ok, type Result } from "../../infra/result.js";
import type {
  GetBlockDagInfoResponseMessage,
  GetBlockResponseMessage,
  GetUtxosByAddressesResponseMessage,
  RpcOutpoint,
  RpcTransaction,
  RpcTransactionMessage,
  RpcUtxoEntry,
  RpcUtxosByAddressesEntry,
  SubmitTransactionResponseMessage,
  UtxosChangedNotificationMessage,
} from "../../rpc/wire.js";
import type { TransactionInput } from "./schema.js";
import type {
  BlockResponse,
  DagTipsResponse,
  Outpoint,
  SubmitTransactionResponse,
  Transaction,
  UtxoChangedFrame,
  UtxoEntry,
  UtxosByAddressesResponse,
} from "./types.js";

/**
 * Conversions between the node's wire messages and the gateway's JSON.
 */

export function toWireTransaction(tx: TransactionInput): RpcTransactionMessage {
  return {
    version: tx.version,
    inputs: tx.inputs.map((input) => ({
      previousOutpoint: {
        transactionId: input.previousOutpoint.transactionId,
        index: input.previousOutpoint.index,
      },
      signatureScript: input.signatureScript,
      sequence: input.sequence,
      sigOpCount: input.sigOpCount,
    })),
    outputs: tx.outputs.map((output) => ({
      amount: output.amount,
      scriptPublicKey: {
        scriptPublicKey: output.scriptPublicKey.scriptPublicKey,
        version: output.scriptPublicKey.version,
      },
    })),
    lockTime: tx.lockTime,
    subnetworkId: tx.subnetworkId,
    gas: tx.gas,
    payload: tx.payload,
    // Computed by the node
    mass: "0",
  };
}

export function toBlockResponse(
  message: GetBlockResponseMessage,
): Result<BlockResponse, DecodeError> {
  const { block } = message;
  if (!block) return err(new DecodeError("Block data missing"));
  const { header } = block;
  if (!header) return err(new DecodeError("Block header missing"));

  return ok({
    hash: header.hash,
    header: {
      version: header.version,
      hashMerkleRoot: header.hashMerkleRoot,
      acceptedIdMerkleRoot: header.acceptedIdMerkleRoot,
      utxoCommitment: header.utxoCommitment,
      timestamp: header.timestamp,
      bits: header.bits,
      nonce: header.nonce,
      daaScore: header.daaScore,
      blueWork: header.blueWork,
      blueScore: header.blueScore,
      pruningPoint: header.pruningPoint,
    },
    transactions: block.transactions.map(toTransaction),
    verboseData: block.verboseData && {
      hash: block.verboseData.hash,
      difficulty: block.verboseData.difficulty,
      selectedParentHash: block.verboseData.selectedParentHash,
      transactionIds: block.verboseData.transactionIds,
      isHeaderOnly: block.verboseData.isHeaderOnly,
      blueScore: block.verboseData.blueScore,
      isChainBlock: block.verboseData.isChainBlock,
    },
  });
}

function toTransaction(tx: RpcTransaction): Transaction {
  return {
    transactionId: tx.verboseData?.transactionId ?? "",
    hash: tx.verboseData?.hash ?? "",
    mass: tx.mass,
    inputs: tx.inputs.map((input) => ({
      previousOutpoint: toOutpoint(input.previousOutpoint) ?? { transactionId: "", index: 0 },
      signatureScript: input.signatureScript,
      sequence: input.sequence,
    })),
    outputs: tx.outputs.map((output) => ({
      amount: output.amount,
      scriptPublicKey: output.scriptPublicKey?.scriptPublicKey ?? "",
    })),
  };
}

export function toSubmitTransactionResponse(
  message: SubmitTransactionResponseMessage,
): SubmitTransactionResponse {
  return { transactionId: message.transactionId };
}

export function toDagTipsResponse(message: GetBlockDagInfoResponseMessage): DagTipsResponse {
  return {
    networkName: message.networkName,
    tipHashes: message.tipHashes,
    blockCount: message.blockCount,
    headerCount: message.headerCount,
    difficulty: message.difficulty,
    pastMedianTime: message.pastMedianTime,
    virtualParentHashes: message.virtualParentHashes,
    pruningPointHash: message.pruningPointHash,
    virtualDaaScore: message.virtualDaaScore,
    sink: message.sink,
  };
}

export function toUtxosByAddressesResponse(
  message: GetUtxosByAddressesResponseMessage,
): UtxosByAddressesResponse {
  return {
    entries: message.entries.map((entry) => ({
      address: entry.address,
      outpoint: toOutpoint(entry.outpoint),
      utxoEntry: toUtxoEntry(entry.utxoEntry),
    })),
  };
}

function toOutpoint(outpoint: RpcOutpoint | null): Outpoint | null {
  return outpoint && { transactionId: outpoint.transactionId, index: outpoint.index };
}

function toUtxoEntry(entry: RpcUtxoEntry | null): UtxoEntry | null {
  return (
    entry && {
      amount: entry.amount,
      scriptPublicKey: entry.scriptPublicKey?.scriptPublicKey ?? null,
      blockDaaScore: entry.blockDaaScore,
      isCoinbase: entry.isCoinbase,
    }
  );
}

// --- WebSocket ---

export function toUtxoChangedFrame(
  notification: UtxosChangedNotificationMessage,
): UtxoChangedFrame {
  return {
    type: "utxo_changed",
    added: notification.added.map((entry) => ({
      address: entry.address,
      outpoint: toFrameOutpoint(entry),
      utxo_entry: entry.utxoEntry && {
        amount: entry.utxoEntry.amount,
        script_public_key: entry.utxoEntry.scriptPublicKey?.scriptPublicKey ?? null,
        block_daa_score: entry.utxoEntry.blockDaaScore,
        is_coinbase: entry.utxoEntry.isCoinbase,
      },
    })),
    removed: notification.removed.map((entry) => ({
      address: entry.address,
      outpoint: toFrameOutpoint(entry),
    })),
  };
}

function toFrameOutpoint(
  entry: RpcUtxosByAddressesEntry,
): { transaction_id: string; index: number } | null {
  return entry.outpoint && { transaction_id: entry.outpoint.transactionId, index: entry.outpoint.index };
}
