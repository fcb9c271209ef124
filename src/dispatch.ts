import chalk from 'chalk';

import { executeComposableDeploy } from './composable';
import type { Context } from './context';
import { ContractError, formatErrorChain } from './error';
import {
  executeContractCall,
  executeContractsGatewayCall,
  executeDeploy,
  executeInstantiate,
  executeRuntimeGatewayCall,
} from './extrinsic';
import { validateUnstableOptions, validateVerbosity } from './flags';
import { loadManifest } from './manifest';
import type { BuildSettings } from './toolchain';
import type { BuildOptions, CallResult, Command } from './type';
import { joinComma } from './util';

const resolveBuildSettings = (context: Context, options: BuildOptions): BuildSettings => {
  const settings: BuildSettings = {
    verbosity: validateVerbosity(options.verbosity),
    flags: validateUnstableOptions(options.unstableOptions),
    targetDirectory: context.targetDirectory,
  };
  return settings;
};

export const formatCallResult = (result: CallResult): string => {
  return `block ${result.blockHash}, extrinsic ${result.extrinsicHash}, events [${joinComma(result.events)}]`;
};

export const exec = async (command: Command, context: Context): Promise<string> => {
  switch (command.type) {
    case 'new': {
      const directory = await context.toolchain.createProject(command.name, command.targetDir);
      return `Created contract ${command.name} in ${directory}`;
    }

    case 'build': {
      const settings = resolveBuildSettings(context, command);
      const manifest = await loadManifest(context.manifestPath);
      const destination = await context.toolchain.build(manifest, settings);
      return `Your contract is ready. You can find it here: ${chalk.bold(destination)}`;
    }

    case 'composable-build': {
      const settings = resolveBuildSettings(context, command);
      const manifest = await loadManifest(context.manifestPath);
      const directory = await context.toolchain.composableBuild(manifest, settings);
      return `Your composable contracts are ready. You can find them in: ${chalk.bold(directory)}`;
    }

    case 'generate-metadata': {
      const settings = resolveBuildSettings(context, command);
      const manifest = await loadManifest(context.manifestPath);
      const metadataPath = await context.toolchain.generateMetadata(manifest, settings);
      return `Your metadata file is ready. You can find it here: ${metadataPath}`;
    }

    case 'test':
      throw new ContractError('Command unimplemented');

    case 'deploy': {
      const codeHash = await executeDeploy(context, command.extrinsicOpts, command.wasmPath);
      return `Code hash: ${codeHash}`;
    }

    case 'composable-deploy':
      return executeComposableDeploy(context, command.suri);

    case 'instantiate': {
      const contractAccount = await executeInstantiate(context, command);
      return `Contract account: ${contractAccount}`;
    }

    case 'call-runtime-gateway': {
      const result = await executeRuntimeGatewayCall(context, command);
      return `CallRuntimeGateway result: ${formatCallResult(result)}`;
    }

    case 'call-contracts-gateway': {
      const result = await executeContractsGatewayCall(context, command);
      return `CallContractsGateway result: ${formatCallResult(result)}`;
    }

    case 'call-contract': {
      const result = await executeContractCall(context, command);
      return `Call regular contract result: ${formatCallResult(result)}`;
    }
  }
};

export const formatSuccess = (message: string): string => {
  return `\t${message}`;
};

export const formatError = (error: unknown): string => {
  return `${chalk.redBright.bold('ERROR:')} ${chalk.redBright(formatErrorChain(error))}`;
};
