import { ApiPromise, WsProvider } from '@polkadot/api';
import type { DispatchErrorModule } from '@polkadot/types/interfaces';
import chalk from 'chalk';
import { isHex, type Hex } from 'viem';

import {
  CONTRACTS_GATEWAY_SECTION,
  CONTRACTS_SECTION,
  MULTISTEP_CALL,
  RUNTIME_GATEWAY_SECTION,
} from './constant';
import { errorMessage, InvalidUrlError, RemoteCallError } from './error';
import type { Signer } from './signer';
import type { AccountId, CallResult, CodeHash, ContractCallParams, GatewayCallParams, InstantiateParams } from './type';

export interface ChainClient {
  readonly url: string;
  putCode(signer: Signer, code: Uint8Array): Promise<CodeHash>;
  instantiate(signer: Signer, params: InstantiateParams): Promise<AccountId>;
  callRuntimeGateway(signer: Signer, params: GatewayCallParams): Promise<CallResult>;
  callContractsGateway(signer: Signer, params: GatewayCallParams): Promise<CallResult>;
  callContract(signer: Signer, params: ContractCallParams): Promise<CallResult>;
  disconnect(): Promise<void>;
}

export type ChainConnector = (url: string, finalized: boolean) => Promise<ChainClient>;

type Hexable = {
  toHex(): Hex;
};

export type ChainCodec = Hexable & {
  toString(): string;
};

export type ChainEvent = {
  readonly section: string;
  readonly method: string;
  readonly data: readonly ChainCodec[];
};

export type ChainStatus = {
  readonly type: string;
  readonly isInvalid: boolean;
  readonly isDropped: boolean;
  readonly isUsurped: boolean;
  readonly isInBlock: boolean;
  readonly isFinalized: boolean;
  readonly asInBlock: Hexable;
  readonly asFinalized: Hexable;
};

export type ChainDispatchError<M> = {
  readonly isModule: boolean;
  readonly asModule: M;
  toString(): string;
};

/**
 * The part of a submittable result the client reads; `M` is the module error
 * index the node's registry decodes.
 */
export type ChainSubmission<M> = {
  readonly status: ChainStatus;
  readonly dispatchError?: ChainDispatchError<M>;
  readonly events: readonly { readonly event: ChainEvent }[];
  readonly txHash: Hexable;
};

export type ChainMetaError = {
  readonly section: string;
  readonly name: string;
  readonly docs: readonly string[];
};

export interface ChainExtrinsic<M> {
  signAndSend(signer: Signer, onResult: (result: ChainSubmission<M>) => void): Promise<() => void>;
}

export type ChainExtrinsicFactory<M> = (...args: unknown[]) => ChainExtrinsic<M>;

export interface ChainApi<M> {
  findExtrinsic(section: string, method: string): ChainExtrinsicFactory<M> | undefined;
  findMetaError(error: M): ChainMetaError;
  disconnect(): Promise<void>;
}

type Submission = {
  result: CallResult;
  events: readonly ChainEvent[];
};

export const checkNodeUrl = (url: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InvalidUrlError(url);
  }
  if (parsed.protocol !== 'ws:' && parsed.protocol !== 'wss:') {
    throw new InvalidUrlError(url);
  }
  return url;
};

const describeDispatchError = <M>(api: ChainApi<M>, error: ChainDispatchError<M>): string => {
  if (error.isModule) {
    const { section, name, docs } = api.findMetaError(error.asModule);
    return `${section}.${name}: ${docs.join(' ')}`;
  }
  return error.toString();
};

const findEvent = (events: readonly ChainEvent[], section: string, method: string): ChainEvent | undefined => {
  return events.find((event) => event.section === section && event.method === method);
};

const gatewayArgs = (params: GatewayCallParams): unknown[] => {
  return [
    params.requester,
    params.target,
    params.phase,
    params.code,
    params.value,
    params.gasLimit,
    params.data,
  ];
};

class SubstrateChainClient<M> implements ChainClient {
  public constructor(
    public readonly url: string,
    private readonly api: ChainApi<M>,
    private readonly finalized: boolean,
  ) {}

  public async putCode(signer: Signer, code: Uint8Array): Promise<CodeHash> {
    const { events } = await this.submit(signer, CONTRACTS_SECTION, 'putCode', [code]);
    const stored = findEvent(events, CONTRACTS_SECTION, 'CodeStored');
    const codeHash = stored?.data[0]?.toHex();
    if (!isHex(codeHash)) {
      throw new RemoteCallError('Code was submitted but no "contracts.CodeStored" event was emitted');
    }
    return codeHash;
  }

  public async instantiate(signer: Signer, params: InstantiateParams): Promise<AccountId> {
    const { events } = await this.submit(signer, CONTRACTS_SECTION, 'instantiate', [
      params.endowment,
      params.gasLimit,
      params.codeHash,
      params.data,
    ]);
    const instantiated = findEvent(events, CONTRACTS_SECTION, 'Instantiated');
    const contract = instantiated?.data[1];
    if (contract == null) {
      throw new RemoteCallError('Contract was instantiated but no "contracts.Instantiated" event was emitted');
    }
    return contract.toString();
  }

  public async callRuntimeGateway(signer: Signer, params: GatewayCallParams): Promise<CallResult> {
    const { result } = await this.submit(signer, RUNTIME_GATEWAY_SECTION, MULTISTEP_CALL, gatewayArgs(params));
    return result;
  }

  public async callContractsGateway(signer: Signer, params: GatewayCallParams): Promise<CallResult> {
    const { result } = await this.submit(signer, CONTRACTS_GATEWAY_SECTION, MULTISTEP_CALL, gatewayArgs(params));
    return result;
  }

  public async callContract(signer: Signer, params: ContractCallParams): Promise<CallResult> {
    const { result } = await this.submit(signer, CONTRACTS_SECTION, 'call', [
      params.target,
      params.value,
      params.gasLimit,
      params.data,
    ]);
    return result;
  }

  public async disconnect(): Promise<void> {
    await this.api.disconnect();
  }

  private createExtrinsic(section: string, method: string, args: readonly unknown[]): ChainExtrinsic<M> {
    const create = this.api.findExtrinsic(section, method);
    if (create == null) {
      throw new RemoteCallError(`Node at ${this.url} does not support "${section}.${method}" extrinsic`);
    }
    return create(...args);
  }

  private submit(signer: Signer, section: string, method: string, args: readonly unknown[]): Promise<Submission> {
    const extrinsic = this.createExtrinsic(section, method, args);
    console.log(chalk.dim(`Submitting ${section}.${method} to ${this.url}`));

    return new Promise<Submission>((resolve, reject) => {
      let settled = false;
      let unsubscribe: (() => void) | undefined;

      const settle = (): void => {
        settled = true;
        unsubscribe?.();
      };

      const onResult = (submitted: ChainSubmission<M>): void => {
        if (settled) {
          return;
        }

        const { status, dispatchError, events, txHash } = submitted;
        if (status.isInvalid || status.isDropped || status.isUsurped) {
          settle();
          reject(new RemoteCallError(`Extrinsic ${section}.${method} is ${status.type.toLowerCase()}`));
          return;
        }

        const included = this.finalized ? status.isFinalized : status.isInBlock || status.isFinalized;
        if (!included) {
          return;
        }

        settle();
        if (dispatchError != null) {
          reject(new RemoteCallError(describeDispatchError(this.api, dispatchError)));
          return;
        }

        const blockHash = status.isInBlock ? status.asInBlock.toHex() : status.asFinalized.toHex();
        resolve({
          result: {
            blockHash,
            extrinsicHash: txHash.toHex(),
            events: events.map(({ event }) => `${event.section}.${event.method}`),
          },
          events: events.map(({ event }) => event),
        });
      };

      void extrinsic.signAndSend(signer, onResult).then(
        (unsub) => {
          unsubscribe = unsub;
          if (settled) {
            unsub();
          }
        },
        (e: unknown) => {
          settle();
          reject(new RemoteCallError(errorMessage(e)));
        },
      );
    });
  }
}

export const createChainClient = <M>(url: string, api: ChainApi<M>, finalized: boolean): ChainClient => {
  return new SubstrateChainClient(url, api, finalized);
};

const toChainApi = (api: ApiPromise): ChainApi<DispatchErrorModule> => {
  return {
    findExtrinsic: (section, method) => api.tx[section]?.[method],
    findMetaError: (error) => api.registry.findMetaError(error),
    disconnect: () => api.disconnect(),
  };
};

export const connectChain: ChainConnector = async (url, finalized) => {
  console.log(chalk.dim(`Connecting to ${url}`));
  const provider = new WsProvider(url);
  try {
    const api = await ApiPromise.create({ provider, throwOnConnect: true });
    return createChainClient(url, toChainApi(api), finalized);
  } catch (e) {
    await provider.disconnect();
    throw new RemoteCallError(`Failed to connect to ${url}`, { cause: e });
  }
};
