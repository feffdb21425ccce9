import { describe, expect, it } from "vitest";
import { decodeResponse, describePayload, encodeRequest, remoteErrorOf } from "./codec.js";

const HASH = "a".repeat(64);

describe("encodeRequest", () => {
  it("stamps the ID as a decimal string", () => {
    expect(
      encodeRequest({
        id: 18446744073709551615n,
        payload: { kind: "getBlock", hash: HASH, includeTransactions: false },
      }),
    ).toEqual({
      id: "18446744073709551615",
      getBlockRequest: { hash: HASH, includeTransactions: false },
    });
  });

  it("encodes DAG info requests with an empty body", () => {
    expect(encodeRequest({ id: 7n, payload: { kind: "getBlockDagInfo" } })).toEqual({
      id: "7",
      getBlockDagInfoRequest: {},
    });
  });

  it("encodes subscriptions as NOTIFY_START", () => {
    expect(
      encodeRequest({
        id: 1n,
        payload: { kind: "notifyUtxosChanged", addresses: ["kaspa:a", "kaspa:b"] },
      }),
    ).toEqual({
      id: "1",
      notifyUtxosChangedRequest: {
        addresses: ["kaspa:a", "kaspa:b"],
        command: "NOTIFY_START",
      },
    });
  });

  it("encodes UTXO lookups", () => {
    expect(
      encodeRequest({ id: 3n, payload: { kind: "getUtxosByAddresses", addresses: ["kaspa:a"] } }),
    ).toEqual({ id: "3", getUtxosByAddressesRequest: { addresses: ["kaspa:a"] } });
  });
});

describe("decodeResponse", () => {
  it("uses the oneof discriminator when present", () => {
    const decoded = decodeResponse({
      id: "9",
      payload: "submitTransactionResponse",
      submitTransactionResponse: { transactionId: "ff", error: null },
    });
    expect(decoded).toEqual({
      id: "9",
      payload: {
        kind: "submitTransaction",
        message: { transactionId: "ff", error: null },
      },
    });
  });

  it("falls back to the first populated reply field", () => {
    const decoded = decodeResponse({
      id: 2,
      getBlockDagInfoResponse: { networkName: "kaspa-testnet", tipHashes: ["t1"], blockCount: 12 },
    });
    expect(decoded.id).toBe("2");
    expect(decoded.payload.kind).toBe("getBlockDagInfo");
    if (decoded.payload.kind !== "getBlockDagInfo") return;
    expect(decoded.payload.message.networkName).toBe("kaspa-testnet");
    expect(decoded.payload.message.blockCount).toBe("12");
    expect(decoded.payload.message.virtualDaaScore).toBe("0");
    expect(decoded.payload.message.error).toBeNull();
  });

  it("keeps absent sub-messages as null", () => {
    const decoded = decodeResponse({
      payload: "utxosChangedNotification",
      utxosChangedNotification: {
        added: [{ address: "kaspa:a", outpoint: { transactionId: "ab", index: 1 }, utxoEntry: null }],
      },
    });
    expect(decoded.payload).toEqual({
      kind: "utxosChanged",
      message: {
        added: [
          {
            address: "kaspa:a",
            outpoint: { transactionId: "ab", index: 1 },
            utxoEntry: null,
          },
        ],
        removed: [],
      },
    });
  });

  it("reports unmodelled variants by field name", () => {
    const decoded = decodeResponse({ id: "4", payload: "getInfoResponse", getInfoResponse: {} });
    expect(decoded.payload).toEqual({ kind: "unknown", field: "getInfoResponse" });
  });

  it("reports malformed bodies as unknown", () => {
    const decoded = decodeResponse({ getBlockResponse: { block: "not-a-block" } });
    expect(decoded).toEqual({ id: "0", payload: { kind: "unknown", field: "getBlockResponse" } });
  });

  it("reports an empty envelope as unknown with no field", () => {
    expect(decodeResponse({ id: "5" }).payload).toEqual({ kind: "unknown", field: null });
    expect(decodeResponse(null)).toEqual({ id: "0", payload: { kind: "unknown", field: null } });
  });
});

describe("remoteErrorOf", () => {
  it("returns the node error of a reply", () => {
    const decoded = decodeResponse({
      getBlockResponse: { block: null, error: { message: "Block not found" } },
    });
    expect(remoteErrorOf(decoded.payload)).toEqual({ message: "Block not found" });
  });

  it("returns null for notifications and unknown variants", () => {
    expect(remoteErrorOf({ kind: "utxosChanged", message: { added: [], removed: [] } })).toBeNull();
    expect(remoteErrorOf({ kind: "unknown", field: null })).toBeNull();
  });
});

describe("describePayload", () => {
  it("labels each variant", () => {
    expect(describePayload({ kind: "unknown", field: "getInfoResponse" })).toBe(
      "unrecognised getInfoResponse",
    );
    expect(describePayload({ kind: "unknown", field: null })).toBe("an empty payload");
    expect(describePayload({ kind: "utxosChanged", message: { added: [], removed: [] } })).toBe(
      "utxosChanged",
    );
  });
});
