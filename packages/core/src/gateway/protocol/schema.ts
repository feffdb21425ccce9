import { z } from "zod";

/**
 * Zod schemas for the JSON bodies accepted by the RPC routes. Field names
 * are camelCase; 64-bit integers may be sent as numbers or decimal strings
 * and come out as decimal strings.
 */

const U64_MAX = (1n << 64n) - 1n;

const u64 = z
  .union([
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
    z.string().regex(/^\d{1,20}$/, "Expected a decimal integer"),
  ])
  .transform((value) => String(value))
  .refine((value) => BigInt(value) <= U64_MAX, "Value does not fit in 64 bits");

const u32 = z.number().int().nonnegative().max(0xffff_ffff);

export const BlockHashSchema = z
  .string()
  .regex(/^[0-9a-fA-F]{64}$/, "Invalid block hash format");

export const GetBlockRequestSchema = z.object({
  hash: BlockHashSchema,
  includeTransactions: z.boolean().default(true),
});

export const OutpointSchema = z.object({
  transactionId: z.string(),
  index: u32,
});

export const TransactionInputSchema = z.object({
  previousOutpoint: OutpointSchema,
  signatureScript: z.string(),
  sequence: u64,
  sigOpCount: u32.default(0),
});

export const TransactionOutputSchema = z.object({
  amount: u64,
  scriptPublicKey: z.object({
    scriptPublicKey: z.string(),
    version: z.number().int().min(0).max(0xffff),
  }),
});

export const TransactionSchema = z.object({
  version: u32.default(0),
  inputs: z.array(TransactionInputSchema),
  outputs: z.array(TransactionOutputSchema),
  lockTime: u64.default("0"),
  subnetworkId: z.string().default(""),
  gas: u64.default("0"),
  payload: z.string().default(""),
});

export const SubmitTransactionRequestSchema = z.object({
  transaction: TransactionSchema,
  allowOrphan: z.boolean().default(false),
});

/** getDAGTips takes no parameters; any object (or no body) is accepted. */
export const GetDagTipsRequestSchema = z.object({});

export const GetUtxosByAddressesRequestSchema = z.object({
  addresses: z.array(z.string().trim().min(1, "Addresses must not be blank")).min(1, "No addresses provided"),
});

export type GetBlockRequest = z.output<typeof GetBlockRequestSchema>;
export type SubmitTransactionRequest = z.output<typeof SubmitTransactionRequestSchema>;
export type TransactionInput = z.output<typeof TransactionSchema>;
export type GetUtxosByAddressesRequest = z.output<typeof GetUtxosByAddressesRequestSchema>;
