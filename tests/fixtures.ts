import fs from 'fs/promises';
import os from 'os';
import fp from 'path';

import type { ChainClient, ChainConnector } from '../src/chainClient';
import type { Context } from '../src/context';
import { RemoteCallError } from '../src/error';
import type { BuildSettings, Toolchain } from '../src/toolchain';
import type { CallResult, CodeHash, Manifest } from '../src/type';

export const ALICE = '5GrwvaEF5zXb26Fz9rcQpDWS57CtERHpNehXCPcNoHGKutQY';
export const ALICE_PUBLIC_KEY = '0xd43593c715fdd31c61141abd04a99fd6822c8558854ccde39a5684e7a56da27d';
export const BOB = '5FHneW46xGXgs5mUiveU4sbTyGBzmstUspZC92UhjJM694ty';

export const FAKE_CODE_HASH: CodeHash = `0x${'ab'.repeat(32)}`;
export const FAKE_CONTRACT = '5CiPPseXPECbkjWCa6MnjNokrgYjMqmKndv2rSnekmSK2DjL';
export const FAKE_CALL_RESULT: CallResult = {
  blockHash: `0x${'01'.repeat(32)}`,
  extrinsicHash: `0x${'02'.repeat(32)}`,
  events: ['contracts.ContractExecution', 'system.ExtrinsicSuccess'],
};

export type FakeCall = {
  url: string;
  method: string;
  signer: string;
  params: unknown;
};

export type FakeChain = {
  connect: ChainConnector;
  connections: string[];
  disconnections: string[];
  calls: FakeCall[];
};

/**
 * In-process chain: every call succeeds unless its url is listed in `failures`,
 * in which case it rejects with the given remote error text.
 */
export const createFakeChain = (failures: ReadonlyMap<string, string> = new Map()): FakeChain => {
  const chain: FakeChain = {
    connections: [],
    disconnections: [],
    calls: [],
    connect: async (url) => {
      chain.connections.push(url);

      const submit = (method: string, signer: string, params: unknown): void => {
        chain.calls.push({ url, method, signer, params });
        const failure = failures.get(url);
        if (failure != null) {
          throw new RemoteCallError(failure);
        }
      };

      const client: ChainClient = {
        url,
        putCode: async (signer, code) => {
          submit('putCode', signer.address, code);
          return FAKE_CODE_HASH;
        },
        instantiate: async (signer, params) => {
          submit('instantiate', signer.address, params);
          return FAKE_CONTRACT;
        },
        callRuntimeGateway: async (signer, params) => {
          submit('callRuntimeGateway', signer.address, params);
          return FAKE_CALL_RESULT;
        },
        callContractsGateway: async (signer, params) => {
          submit('callContractsGateway', signer.address, params);
          return FAKE_CALL_RESULT;
        },
        callContract: async (signer, params) => {
          submit('callContract', signer.address, params);
          return FAKE_CALL_RESULT;
        },
        disconnect: async () => {
          chain.disconnections.push(url);
        },
      };
      return client;
    },
  };
  return chain;
};

export type FakeToolchainCall = {
  method: string;
  manifest: Manifest;
  settings: BuildSettings;
};

export const createFakeToolchain = (): Toolchain & { calls: FakeToolchainCall[] } => {
  const calls: FakeToolchainCall[] = [];
  return {
    calls,
    createProject: async (name, targetDir) => fp.join(targetDir ?? '.', name),
    build: async (manifest, settings) => {
      calls.push({ method: 'build', manifest, settings });
      return `${settings.targetDirectory}/${manifest.name}-pruned.wasm`;
    },
    composableBuild: async (manifest, settings) => {
      calls.push({ method: 'composableBuild', manifest, settings });
      return `${settings.targetDirectory}/composables`;
    },
    generateMetadata: async (manifest, settings) => {
      calls.push({ method: 'generateMetadata', manifest, settings });
      return `${settings.targetDirectory}/metadata.json`;
    },
  };
};

export const createTempDirectory = async (): Promise<string> => {
  return fs.mkdtemp(fp.join(os.tmpdir(), 'composable-contract-'));
};

export const writeFile = async (path: string, content: string | Uint8Array): Promise<void> => {
  await fs.mkdir(fp.dirname(path), { recursive: true });
  await fs.writeFile(path, content);
};

export const createTestContext = (
  directory: string,
  chain: FakeChain,
  toolchain: Toolchain = createFakeToolchain(),
): Context => {
  return {
    config: {
      features: { extrinsics: true },
      execution: { finalized: false },
    },
    manifestPath: fp.join(directory, 'contract.yaml'),
    targetDirectory: fp.join(directory, 'target'),
    connect: chain.connect,
    toolchain,
  };
};
