import { z } from "zod";
import type {
  RequestEnvelope,
  ResponseEnvelope,
  ResponsePayload,
} from "./envelope.js";
import {
  GetBlockDagInfoResponseSchema,
  GetBlockResponseSchema,
  GetUtxosByAddressesResponseSchema,
  NotifyUtxosChangedResponseSchema,
  RESPONSE_FIELDS,
  SubmitTransactionResponseSchema,
  UtxosChangedNotificationSchema,
  type KaspadRequestMessage,
  type RpcError,
} from "./wire.js";

/**
 * Translate a logical request envelope into the KaspadRequest wire object.
 */
export function encodeRequest(envelope: RequestEnvelope): KaspadRequestMessage {
  const id = envelope.id.toString();
  const { payload } = envelope;

  switch (payload.kind) {
    case "getBlock":
      return {
        id,
        getBlockRequest: {
          hash: payload.hash,
          includeTransactions: payload.includeTransactions,
        },
      };
    case "submitTransaction":
      return {
        id,
        submitTransactionRequest: {
          transaction: payload.transaction,
          allowOrphan: payload.allowOrphan,
        },
      };
    case "getBlockDagInfo":
      return { id, getBlockDagInfoRequest: {} };
    case "getUtxosByAddresses":
      return { id, getUtxosByAddressesRequest: { addresses: payload.addresses } };
    case "notifyUtxosChanged":
      return {
        id,
        notifyUtxosChangedRequest: {
          addresses: payload.addresses,
          command: "NOTIFY_START",
        },
      };
  }
}

const EnvelopeHeaderSchema = z
  .object({
    id: z
      .union([z.string(), z.number(), z.bigint()])
      .transform((value) => String(value))
      .default("0"),
    payload: z.string().nullish(),
  })
  .passthrough();

/**
 * Translate a KaspadResponse wire object into a tagged reply. Never fails:
 * anything unrecognised or malformed becomes the `unknown` variant so the
 * caller decides whether that is a protocol violation.
 */
export function decodeResponse(raw: unknown): ResponseEnvelope {
  const header = EnvelopeHeaderSchema.safeParse(raw);
  if (!header.success) {
    return { id: "0", payload: { kind: "unknown", field: null } };
  }

  const fields = header.data;
  const field =
    fields.payload ??
    RESPONSE_FIELDS.find((name) => fields[name] !== undefined && fields[name] !== null) ??
    null;

  return {
    id: fields.id,
    payload: field === null ? { kind: "unknown", field } : parsePayload(field, fields[field]),
  };
}

function parsePayload(field: string, body: unknown): ResponsePayload {
  switch (field) {
    case "getBlockResponse": {
      const parsed = GetBlockResponseSchema.safeParse(body);
      if (parsed.success) return { kind: "getBlock", message: parsed.data };
      break;
    }
    case "submitTransactionResponse": {
      const parsed = SubmitTransactionResponseSchema.safeParse(body);
      if (parsed.success) return { kind: "submitTransaction", message: parsed.data };
      break;
    }
    case "getBlockDagInfoResponse": {
      const parsed = GetBlockDagInfoResponseSchema.safeParse(body);
      if (parsed.success) return { kind: "getBlockDagInfo", message: parsed.data };
      break;
    }
    case "getUtxosByAddressesResponse": {
      const parsed = GetUtxosByAddressesResponseSchema.safeParse(body);
      if (parsed.success) return { kind: "getUtxosByAddresses", message: parsed.data };
      break;
    }
    case "notifyUtxosChangedResponse": {
      const parsed = NotifyUtxosChangedResponseSchema.safeParse(body);
      if (parsed.success) return { kind: "notifyUtxosChanged", message: parsed.data };
      break;
    }
    case "utxosChangedNotification": {
      const parsed = UtxosChangedNotificationSchema.safeParse(body);
      if (parsed.success) return { kind: "utxosChanged", message: parsed.data };
      break;
    }
  }
  return { kind: "unknown", field };
}

/**
 * The node-reported error carried by a reply, if any. Notifications and
 * unknown variants never carry one.
 */
export function remoteErrorOf(payload: ResponsePayload): RpcError | null {
  switch (payload.kind) {
    case "getBlock":
    case "submitTransaction":
    case "getBlockDagInfo":
    case "getUtxosByAddresses":
    case "notifyUtxosChanged":
      return payload.message.error;
    case "utxosChanged":
    case "unknown":
      return null;
  }
}

/** Label of a reply variant for error messages. */
export function describePayload(payload: ResponsePayload): string {
  if (payload.kind === "unknown") {
    return payload.field ? `unrecognised ${payload.field}` : "an empty payload";
  }
  return payload.kind;
}
