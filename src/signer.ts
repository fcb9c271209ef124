import { Keyring } from '@polkadot/keyring';
import type { KeyringPair } from '@polkadot/keyring/types';
import { encodeAddress } from '@polkadot/util-crypto';

import { SS58_FORMAT } from './constant';
import { KeyDerivationError } from './error';
import { checkAccountIdBytes } from './hex';
import type { AccountId, ExtrinsicOpts, HexData } from './type';

export type Signer = KeyringPair;

const PASSWORD_SEPARATOR = '///';

const applyPassword = (suri: string, password: string | undefined): string => {
  if (password == null) {
    return suri;
  }
  const index = suri.indexOf(PASSWORD_SEPARATOR);
  const base = index === -1 ? suri : suri.slice(0, index);
  return `${base}${PASSWORD_SEPARATOR}${password}`;
};

/**
 * Derives an sr25519 pair from a secret URI (`//Alice`, `<mnemonic>//hard/soft`,
 * `0x<seed>`, with an optional `///password`). A given password replaces the
 * password part of the URI. Requires `cryptoWaitReady()` to have resolved.
 */
export const createSigner = (suri: string, password?: string, role = 'signer'): Signer => {
  const keyring = new Keyring({ type: 'sr25519', ss58Format: SS58_FORMAT });
  try {
    return keyring.addFromUri(applyPassword(suri, password));
  } catch {
    throw new KeyDerivationError(role);
  }
};

export const withSigner = async <T>(opts: ExtrinsicOpts, fn: (signer: Signer) => Promise<T>): Promise<T> => {
  const signer = createSigner(opts.suri, opts.password);
  try {
    return await fn(signer);
  } finally {
    signer.lock();
  }
};

export const deriveAccountId = (suri: string, role: string): AccountId => {
  const pair = createSigner(suri, undefined, role);
  const address = pair.address;
  pair.lock();
  return address;
};

export const accountIdFromPublicKey = (publicKey: HexData): AccountId => {
  return encodeAddress(checkAccountIdBytes(publicKey), SS58_FORMAT);
};
