import { checkNodeUrl, type ChainClient } from './chainClient';
import { resolveContractCode, resolveOptionalContractCode } from './code';
import type { Context } from './context';
import { accountIdFromPublicKey, deriveAccountId, withSigner } from './signer';
import type {
  AccountId,
  CallContractCommand,
  CallContractsGatewayCommand,
  CallResult,
  CallRuntimeGatewayCommand,
  CodeHash,
  ExtrinsicOpts,
  InstantiateCommand,
} from './type';

const withChainClient = async <T>(
  context: Context,
  url: string,
  fn: (client: ChainClient) => Promise<T>,
): Promise<T> => {
  const client = await context.connect(checkNodeUrl(url), context.config.execution.finalized);
  try {
    return await fn(client);
  } finally {
    await client.disconnect();
  }
};

export const executeDeploy = async (
  context: Context,
  opts: ExtrinsicOpts,
  wasmPath: string | undefined,
): Promise<CodeHash> => {
  return withSigner(opts, async (signer) => {
    const code = await resolveContractCode(context, wasmPath);
    return withChainClient(context, opts.url, (client) => client.putCode(signer, code));
  });
};

export const executeInstantiate = async (context: Context, command: InstantiateCommand): Promise<AccountId> => {
  return withSigner(command.extrinsicOpts, async (signer) => {
    return withChainClient(context, command.extrinsicOpts.url, (client) =>
      client.instantiate(signer, {
        endowment: command.endowment,
        gasLimit: command.gasLimit,
        codeHash: command.codeHash,
        data: command.data,
      }),
    );
  });
};

export const executeRuntimeGatewayCall = async (
  context: Context,
  command: CallRuntimeGatewayCommand,
): Promise<CallResult> => {
  return withSigner(command.extrinsicOpts, async (signer) => {
    const code = await resolveContractCode(context, command.wasmPath);
    const target = deriveAccountId(command.target, 'target');
    const requester = deriveAccountId(command.requester, 'requester');

    return withChainClient(context, command.extrinsicOpts.url, (client) =>
      client.callRuntimeGateway(signer, {
        requester,
        target,
        phase: command.phase,
        code,
        value: command.value,
        gasLimit: command.gasLimit,
        data: command.data,
      }),
    );
  });
};

export const executeContractsGatewayCall = async (
  context: Context,
  command: CallContractsGatewayCommand,
): Promise<CallResult> => {
  return withSigner(command.extrinsicOpts, async (signer) => {
    const code = await resolveOptionalContractCode(context, command.wasmPath);
    const requester = deriveAccountId(command.requester, 'requester');
    const target = accountIdFromPublicKey(command.target);

    return withChainClient(context, command.extrinsicOpts.url, (client) =>
      client.callContractsGateway(signer, {
        requester,
        target,
        phase: command.phase,
        code,
        value: command.value,
        gasLimit: command.gasLimit,
        data: command.data,
      }),
    );
  });
};

export const executeContractCall = async (context: Context, command: CallContractCommand): Promise<CallResult> => {
  return withSigner(command.extrinsicOpts, async (signer) => {
    const target = accountIdFromPublicKey(command.target);

    return withChainClient(context, command.extrinsicOpts.url, (client) =>
      client.callContract(signer, {
        target,
        value: command.value,
        gasLimit: command.gasLimit,
        data: command.data,
      }),
    );
  });
};
