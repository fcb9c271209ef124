import { bytesToHex, hexToBytes, isHex, size } from 'viem';

import { ACCOUNT_ID_SIZE, CODE_HASH_SIZE } from './constant';
import {
  InvalidAccountIdLengthError,
  InvalidCodeHashLengthError,
  InvalidHexInputError,
  InvalidNumberInputError,
} from './error';
import type { CodeHash, HexData } from './type';

const UNSIGNED_INTEGER = /^[0-9]+$/;

/**
 * Accepts bare hex digits (no `0x` prefix), normalized to lowercase `0x` form.
 */
export const parseHexData = (input: string, field = 'data'): HexData => {
  const hex = `0x${input}`;
  if (input.startsWith('0x') || !isHex(hex, { strict: true }) || hex.length % 2 !== 0) {
    throw new InvalidHexInputError(field, input);
  }
  return bytesToHex(hexToBytes(hex));
};

export const parseCodeHash = (input: string): CodeHash => {
  const hex = parseHexData(input, 'code-hash');
  const length = size(hex);
  if (length !== CODE_HASH_SIZE) {
    throw new InvalidCodeHashLengthError(length, CODE_HASH_SIZE);
  }
  return hex;
};

export const checkAccountIdBytes = (hex: HexData): HexData => {
  const length = size(hex);
  if (length !== ACCOUNT_ID_SIZE) {
    throw new InvalidAccountIdLengthError(length, ACCOUNT_ID_SIZE);
  }
  return hex;
};

export const parseUnsigned = (input: string, field: string): bigint => {
  if (!UNSIGNED_INTEGER.test(input)) {
    throw new InvalidNumberInputError(field, input, 'unsigned integer');
  }
  return BigInt(input);
};

export const parsePhase = (input: string, max: number): number => {
  const phase = parseUnsigned(input, 'phase');
  if (phase > BigInt(max)) {
    throw new InvalidNumberInputError('phase', input, `integer between 0 and ${max}`);
  }
  return Number(phase);
};
