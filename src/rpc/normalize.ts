// src/rpc/normalize.ts
/**
 * Validates Ethereum JSON-RPC payloads and turns them into native records:
 * hex quantities become `bigint`, absent optional fields become `null`.
 */
import { z } from 'zod';
import { hexToBigInt, type Hex } from 'viem';
import type { EthBlock, EthLog } from '../eth/types.js';
import { formatZodError } from '../config/validate.js';

const HEX_RE = /^0x[0-9a-fA-F]*$/;

const hex = z.custom<Hex>((v) => typeof v === 'string' && HEX_RE.test(v), { message: 'expected 0x-prefixed hex' });
const quantity = hex.transform((v) => hexToBigInt(v));
const nullableQuantity = quantity.nullish().transform((v) => v ?? null);
const nullableHex = hex.nullish().transform((v) => v ?? null);

const RpcTransactionSchema = z.object({
  hash: hex,
  nonce: quantity,
  blockHash: nullableHex,
  blockNumber: nullableQuantity,
  transactionIndex: nullableQuantity,
  from: hex,
  to: nullableHex,
  value: quantity,
  gas: quantity,
  gasPrice: nullableQuantity,
  input: hex,
});

const RpcBlockSchema = z.object({
  number: nullableQuantity,
  hash: nullableHex,
  parentHash: hex,
  nonce: nullableHex,
  sha3Uncles: hex,
  logsBloom: nullableHex,
  transactionsRoot: hex,
  stateRoot: hex,
  miner: hex,
  difficulty: quantity,
  totalDifficulty: nullableQuantity,
  size: quantity,
  extraData: hex,
  gasLimit: quantity,
  gasUsed: quantity,
  timestamp: quantity,
  transactions: z.array(z.union([hex, RpcTransactionSchema])),
  uncles: z.array(hex).default([]),
});

const RpcLogSchema = z.object({
  address: hex,
  topics: z.array(hex),
  data: hex,
  blockNumber: nullableQuantity,
  transactionHash: nullableHex,
  logIndex: nullableQuantity.transform((v) => (v === null ? null : Number(v))),
});

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, json: unknown, what: string): T {
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Malformed ${what} from node\n${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

export function normalizeBlock(json: unknown): EthBlock {
  return parseOrThrow(RpcBlockSchema, json, 'block');
}

export function normalizeLogs(json: unknown): EthLog[] {
  return parseOrThrow(z.array(RpcLogSchema), json, 'logs');
}

export function normalizeQuantity(json: unknown): bigint {
  return parseOrThrow(quantity, json, 'quantity');
}
