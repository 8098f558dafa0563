// src/erc20/transfer.ts
/**
 * ERC-20 `Transfer(address,address,uint256)` decoding from raw logs.
 *
 * A conforming log carries three topics (signature, from, to) and the amount
 * in its data. Some contracts emit the same signature with `from`/`to` left
 * unindexed, so those words live at the front of the data payload instead;
 * they are moved back into topic positions before the fields are read.
 */
import { hexToBigInt, type Address, type Hash, type Hex } from 'viem';
import type { EthLog } from '../eth/types.js';
import { tokenLabel } from './tokens.js';
import { getLogger } from '../utils/logger.js';

const log = getLogger('erc20/transfer');

/** keccak256("Transfer(address,address,uint256)") */
export const TRANSFER_EVENT_TOPIC: Hash = '0xddf252ad1be2c89b69c2b068fc378daa952ba7f163c4a11628f55a4df523b3ef';

// String lengths of 0x-prefixed hex values.
export const H20_BYTE_HASH_STRING_LENGTH = 2 + 20 * 2;
export const H32_BYTE_HASH_STRING_LENGTH = 2 + 32 * 2;

const WORD_HEX_LENGTH = 64;

/**
 * A log that matched the transfer signature, with its fields aligned:
 * `topics` holds signature, from and to; `data` holds the amount word.
 */
export type TransferLog = {
  log: EthLog;
  topics: Hex[];
  data: Hex;
};

/**
 * Low 20 bytes of a 32-byte hex word, as an address.
 */
export function h32ToH20(h32: string): Address {
  return `0x${h32.substring(H32_BYTE_HASH_STRING_LENGTH - H20_BYTE_HASH_STRING_LENGTH + 2)}`;
}

/**
 * Hex quantity → double. Values past 2^53 lose precision the usual way.
 */
export function hexToDouble(hex: Hex): number | null {
  if (hex.length <= 2) return null;
  return Number(hexToBigInt(hex));
}

export function isTransferTopic(topic: string | undefined): boolean {
  return topic !== undefined && topic.toLowerCase() === TRANSFER_EVENT_TOPIC;
}

/**
 * Topics and data after unindexed `from`/`to` words were moved into topic
 * positions, or `null` when the log does not have exactly four fields in
 * total and so cannot be a transfer.
 */
export function alignTransferFields(topics: readonly Hex[], data: Hex): { topics: Hex[]; data: Hex } | null {
  if (topics.length >= 3) return { topics: [...topics], data };

  const fieldCount = topics.length + Math.trunc((data.length - 2) / WORD_HEX_LENGTH);
  if (fieldCount !== 4) return null;

  const aligned: Hex[] = [...topics];
  const payload = data.substring(2);
  let offset = 0;
  const nextWord = (): string => {
    const word = payload.substring(offset, offset + WORD_HEX_LENGTH);
    offset += WORD_HEX_LENGTH;
    return word;
  };
  while (aligned.length < 3) {
    aligned.push(`0x${nextWord()}`);
  }
  return { topics: aligned, data: `0x${nextWord()}` };
}

/**
 * Matches a log against the ERC-20 transfer event. Returns `null` for logs of
 * other events and for non-conforming logs that share the transfer signature.
 */
export function matchTransferLog(raw: EthLog): TransferLog | null {
  if (!isTransferTopic(raw.topics[0])) return null;

  const aligned = alignTransferFields(raw.topics, raw.data);
  if (!aligned) {
    log.debug('skipping non-conforming transfer log', {
      address: raw.address,
      topics: raw.topics.length,
      dataLength: raw.data.length,
      transactionHash: raw.transactionHash,
    });
    return null;
  }
  return { log: raw, topics: aligned.topics, data: aligned.data };
}

/** Token label of the emitting contract. */
export function transferToken(t: TransferLog): string {
  return tokenLabel(t.log.address);
}

export function transferFrom(t: TransferLog): Address {
  return h32ToH20(t.topics[1] ?? '0x');
}

export function transferTo(t: TransferLog): Address {
  return h32ToH20(t.topics[2] ?? '0x');
}

/** Amount as a double; `null` when the data payload is empty. */
export function transferAmount(t: TransferLog): number | null {
  return hexToDouble(t.data);
}
