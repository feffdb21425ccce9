import { performance } from "node:perf_hooks";
import type { AppError, GatewayError } from "../../infra/errors.js";
import { ok, type Result } from "../../infra/result.js";
import type { ResponseFor, UnaryRequestPayload } from "../../rpc/envelope.js";
import {
  toBlockResponse,
  toDagTipsResponse,
  toSubmitTransactionResponse,
  toUtxosByAddressesResponse,
  toWireTransaction,
} from "../protocol/convert.js";
import { parseParams } from "../protocol/frames.js";
import {
  GetBlockRequestSchema,
  GetDagTipsRequestSchema,
  GetUtxosByAddressesRequestSchema,
  SubmitTransactionRequestSchema,
} from "../protocol/schema.js";

/** The slice of `UnaryCallAdapter` the routes depend on. */
export interface UnaryCaller {
  call<P extends UnaryRequestPayload>(
    payload: P,
  ): Promise<Result<ResponseFor<P["kind"]>, GatewayError>>;
}

export type RouteSuccess = { data: unknown; latencyMs: number };

/** Handles one POST route. `body` is the parsed JSON body. */
export type RouteHandler = (body: unknown) => Promise<Result<RouteSuccess, AppError>>;

async function timed<T>(run: () => Promise<T>): Promise<{ value: T; latencyMs: number }> {
  const startedAt = performance.now();
  const value = await run();
  return { value, latencyMs: performance.now() - startedAt };
}

export function createGetBlockHandler(adapter: UnaryCaller): RouteHandler {
  return async (body) => {
    const params = parseParams(GetBlockRequestSchema, body);
    if (!params.ok) return params;

    const { value: reply, latencyMs } = await timed(() =>
      adapter.call({
        kind: "getBlock",
        hash: params.value.hash,
        includeTransactions: params.value.includeTransactions,
      }),
    );
    if (!reply.ok) return reply;

    const block = toBlockResponse(reply.value.message);
    if (!block.ok) return block;
    return ok({ data: block.value, latencyMs });
  };
}

export function createSubmitTransactionHandler(adapter: UnaryCaller): RouteHandler {
  return async (body) => {
    const params = parseParams(SubmitTransactionRequestSchema, body);
    if (!params.ok) return params;

    const { value: reply, latencyMs } = await timed(() =>
      adapter.call({
        kind: "submitTransaction",
        transaction: toWireTransaction(params.value.transaction),
        allowOrphan: params.value.allowOrphan,
      }),
    );
    if (!reply.ok) return reply;
    return ok({ data: toSubmitTransactionResponse(reply.value.message), latencyMs });
  };
}

export function createGetDagTipsHandler(adapter: UnaryCaller): RouteHandler {
  return async (body) => {
    const params = parseParams(GetDagTipsRequestSchema, body);
    if (!params.ok) return params;

    const { value: reply, latencyMs } = await timed(() =>
      adapter.call({ kind: "getBlockDagInfo" }),
    );
    if (!reply.ok) return reply;
    return ok({ data: toDagTipsResponse(reply.value.message), latencyMs });
  };
}

export function createGetUtxosByAddressesHandler(adapter: UnaryCaller): RouteHandler {
  return async (body) => {
    const params = parseParams(GetUtxosByAddressesRequestSchema, body);
    if (!params.ok) return params;

    const { value: reply, latencyMs } = await timed(() =>
      adapter.call({ kind: "getUtxosByAddresses", addresses: params.value.addresses }),
    );
    if (!reply.ok) return reply;
    return ok({ data: toUtxosByAddressesResponse(reply.value.message), latencyMs });
  };
}

/** POST routes keyed by path. */
export function createRpcRoutes(adapter: UnaryCaller): Map<string, RouteHandler> {
  return new Map<string, RouteHandler>([
    ["/rpc/getBlock", createGetBlockHandler(adapter)],
    ["/rpc/submitTransaction", createSubmitTransactionHandler(adapter)],
    ["/rpc/getDAGTips", createGetDagTipsHandler(adapter)],
    ["/rpc/getUtxosByAddresses", createGetUtxosByAddressesHandler(adapter)],
  ]);
}
