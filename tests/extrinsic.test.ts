import fp from 'path';
import { cryptoWaitReady } from '@polkadot/util-crypto';
import chalk from 'chalk';
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  CodeNotFoundError,
  InvalidAccountIdLengthError,
  KeyDerivationError,
  RemoteCallError,
} from '../src/error';
import {
  executeContractCall,
  executeContractsGatewayCall,
  executeDeploy,
  executeInstantiate,
  executeRuntimeGatewayCall,
} from '../src/extrinsic';
import type { CallContractsGatewayCommand, ExtrinsicOpts } from '../src/type';
import {
  ALICE,
  ALICE_PUBLIC_KEY,
  BOB,
  FAKE_CALL_RESULT,
  FAKE_CODE_HASH,
  FAKE_CONTRACT,
  createFakeChain,
  createTempDirectory,
  createTestContext,
  writeFile,
} from './fixtures';

const NODE_URL = 'ws://localhost:9944';
const WASM = new Uint8Array([0x00, 0x61, 0x73, 0x6d]);
const OPTS: ExtrinsicOpts = { url: NODE_URL, suri: '//Alice', password: undefined };

let directory: string;

beforeAll(async () => {
  chalk.level = 0;
  await cryptoWaitReady();
});

beforeEach(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  directory = await createTempDirectory();
  await writeFile(fp.join(directory, 'contract.yaml'), 'package:\n  name: flipper\n');
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('executeDeploy', () => {
  it('uploads the default artifact and returns the code hash', async () => {
    const chain = createFakeChain();
    const context = createTestContext(directory, chain);
    await writeFile(fp.join(directory, 'target', 'flipper-pruned.wasm'), WASM);

    expect(await executeDeploy(context, OPTS, undefined)).toBe(FAKE_CODE_HASH);
    expect(chain.calls).toEqual([{ url: NODE_URL, method: 'putCode', signer: ALICE, params: WASM }]);
    expect(chain.disconnections).toEqual([NODE_URL]);
  });

  it('fails on missing code before connecting', async () => {
    const chain = createFakeChain();
    const context = createTestContext(directory, chain);
    const path = `${context.targetDirectory}/flipper-pruned.wasm`;

    const error = await executeDeploy(context, OPTS, undefined).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CodeNotFoundError);
    expect(error).toMatchObject({ path });
    expect(chain.connections).toEqual([]);
  });

  it('fails on a bad secret before reading code', async () => {
    const chain = createFakeChain();
    const context = createTestContext(directory, chain);

    await expect(executeDeploy(context, { ...OPTS, suri: 'bad $ secret' }, undefined)).rejects.toThrow(
      KeyDerivationError,
    );
    expect(chain.connections).toEqual([]);
  });

  it('surfaces remote errors verbatim and disconnects', async () => {
    const remoteError = 'contracts.CodeTooLarge: The code supplied to `put_code` exceeds the limit';
    const chain = createFakeChain(new Map([[NODE_URL, remoteError]]));
    const context = createTestContext(directory, chain);
    const path = fp.join(directory, 'custom.wasm');
    await writeFile(path, WASM);

    const error = await executeDeploy(context, OPTS, path).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RemoteCallError);
    expect(error).toMatchObject({ message: remoteError });
    expect(chain.disconnections).toEqual([NODE_URL]);
  });
});

describe('executeInstantiate', () => {
  it('submits the constructor call', async () => {
    const chain = createFakeChain();
    const context = createTestContext(directory, chain);
    const codeHash = `0x${'11'.repeat(32)}` as const;

    const account = await executeInstantiate(context, {
      type: 'instantiate',
      extrinsicOpts: OPTS,
      endowment: 1000n,
      gasLimit: 500000000n,
      codeHash,
      data: '0x9bae9d5e',
    });

    expect(account).toBe(FAKE_CONTRACT);
    expect(chain.calls).toEqual([
      {
        url: NODE_URL,
        method: 'instantiate',
        signer: ALICE,
        params: { endowment: 1000n, gasLimit: 500000000n, codeHash, data: '0x9bae9d5e' },
      },
    ]);
  });
});

describe('executeRuntimeGatewayCall', () => {
  it('derives requester and target from their secrets', async () => {
    const chain = createFakeChain();
    const context = createTestContext(directory, chain);
    const path = fp.join(directory, 'custom.wasm');
    await writeFile(path, WASM);

    const result = await executeRuntimeGatewayCall(context, {
      type: 'call-runtime-gateway',
      extrinsicOpts: OPTS,
      target: '//Bob',
      requester: '//Alice',
      phase: 1,
      value: 5n,
      gasLimit: 500000000n,
      wasmPath: path,
      data: '0x00',
    });

    expect(result).toEqual(FAKE_CALL_RESULT);
    expect(chain.calls).toEqual([
      {
        url: NODE_URL,
        method: 'callRuntimeGateway',
        signer: ALICE,
        params: {
          requester: ALICE,
          target: BOB,
          phase: 1,
          code: WASM,
          value: 5n,
          gasLimit: 500000000n,
          data: '0x00',
        },
      },
    ]);
  });

  it('requires the contract code', async () => {
    const chain = createFakeChain();
    const context = createTestContext(directory, chain);

    await expect(
      executeRuntimeGatewayCall(context, {
        type: 'call-runtime-gateway',
        extrinsicOpts: OPTS,
        target: '//Bob',
        requester: '//Alice',
        phase: 0,
        value: 0n,
        gasLimit: 500000000n,
        wasmPath: undefined,
        data: '0x00',
      }),
    ).rejects.toThrow(CodeNotFoundError);
    expect(chain.connections).toEqual([]);
  });
});

describe('executeContractsGatewayCall', () => {
  const command = (overrides: Partial<CallContractsGatewayCommand>): CallContractsGatewayCommand => ({
    type: 'call-contracts-gateway',
    extrinsicOpts: OPTS,
    target: ALICE_PUBLIC_KEY,
    requester: '//Bob',
    phase: 0,
    value: 0n,
    gasLimit: 3875000000n,
    wasmPath: undefined,
    data: '0x00',
    ...overrides,
  });

  it('proceeds with empty code when the artifact is missing', async () => {
    const chain = createFakeChain();
    const context = createTestContext(directory, chain);

    expect(await executeContractsGatewayCall(context, command({}))).toEqual(FAKE_CALL_RESULT);
    expect(chain.calls).toEqual([
      {
        url: NODE_URL,
        method: 'callContractsGateway',
        signer: ALICE,
        params: {
          requester: BOB,
          target: ALICE,
          phase: 0,
          code: new Uint8Array(),
          value: 0n,
          gasLimit: 3875000000n,
          data: '0x00',
        },
      },
    ]);
  });

  it('fails only on the remote call when the artifact is missing', async () => {
    const chain = createFakeChain(new Map([[NODE_URL, 'contractsGateway.ExecutionFailed']]));
    const context = createTestContext(directory, chain);

    await expect(executeContractsGatewayCall(context, command({}))).rejects.toThrow('contractsGateway.ExecutionFailed');
    expect(chain.calls).toHaveLength(1);
  });

  it('rejects a target that is not 32 bytes', async () => {
    const chain = createFakeChain();
    const context = createTestContext(directory, chain);

    await expect(executeContractsGatewayCall(context, command({ target: '0x00' }))).rejects.toThrow(
      InvalidAccountIdLengthError,
    );
    expect(chain.connections).toEqual([]);
  });
});

describe('executeContractCall', () => {
  it('calls the target account directly', async () => {
    const chain = createFakeChain();
    const context = createTestContext(directory, chain);

    const result = await executeContractCall(context, {
      type: 'call-contract',
      extrinsicOpts: { url: NODE_URL, suri: '//Bob', password: undefined },
      target: ALICE_PUBLIC_KEY,
      value: 0n,
      gasLimit: 3875000000n,
      data: '0xc0ffee',
    });

    expect(result).toEqual(FAKE_CALL_RESULT);
    expect(chain.calls).toEqual([
      {
        url: NODE_URL,
        method: 'callContract',
        signer: BOB,
        params: { target: ALICE, value: 0n, gasLimit: 3875000000n, data: '0xc0ffee' },
      },
    ]);
  });
});

describe('with a malformed composable schedule', () => {
  beforeEach(async () => {
    await writeFile(fp.join(directory, 'contract.yaml'), 'package:\n  name: flipper\ncomposable:\n  deploy: oops\n');
    await writeFile(fp.join(directory, 'target', 'flipper-pruned.wasm'), WASM);
  });

  it('still deploys the default artifact', async () => {
    const chain = createFakeChain();
    const context = createTestContext(directory, chain);

    expect(await executeDeploy(context, OPTS, undefined)).toBe(FAKE_CODE_HASH);
    expect(chain.calls).toEqual([{ url: NODE_URL, method: 'putCode', signer: ALICE, params: WASM }]);
  });

  it('still passes the default artifact to the contracts gateway', async () => {
    const chain = createFakeChain();
    const context = createTestContext(directory, chain);

    await executeContractsGatewayCall(context, {
      type: 'call-contracts-gateway',
      extrinsicOpts: OPTS,
      target: ALICE_PUBLIC_KEY,
      requester: '//Bob',
      phase: 0,
      value: 0n,
      gasLimit: 3875000000n,
      wasmPath: undefined,
      data: '0x00',
    });

    expect(chain.calls).toHaveLength(1);
    expect(chain.calls[0]).toMatchObject({ method: 'callContractsGateway', params: { code: WASM } });
  });
});
