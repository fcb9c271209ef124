import { Command as Program } from 'commander';

import { checkNodeUrl } from './chainClient';
import {
  DEFAULT_CALL_GAS_LIMIT,
  DEFAULT_DATA,
  DEFAULT_ENDOWMENT,
  DEFAULT_GAS_LIMIT,
  DEFAULT_PHASE,
  DEFAULT_TARGET,
  DEFAULT_URL,
  DEFAULT_VALUE,
  MAX_PHASE,
} from './constant';
import { ContractError } from './error';
import { parseCodeHash, parseHexData, parsePhase, parseUnsigned } from './hex';
import type { BuildOptions, CodeHash, Command, ConfigFeatures, ExtrinsicOpts, HexData } from './type';

type BuildFlags = {
  quiet: boolean;
  verbose: boolean;
  unstableOptions: string[];
};

type ExtrinsicFlags = {
  url: string;
  suri: string;
  password?: string;
};

type InstantiateFlags = ExtrinsicFlags & {
  endowment: bigint;
  gas: bigint;
  codeHash: CodeHash;
  data: HexData;
};

type RuntimeGatewayFlags = ExtrinsicFlags & {
  target: string;
  requester: string;
  phase: number;
  value: bigint;
  gas: bigint;
  data: HexData;
};

type ContractsGatewayFlags = ExtrinsicFlags & {
  target: HexData;
  requester: string;
  phase: number;
  value: bigint;
  gas: bigint;
  data: HexData;
};

type ContractCallFlags = ExtrinsicFlags & {
  target: HexData;
  value: bigint;
  gas: bigint;
  data: HexData;
};

const collect = (value: string, previous: string[]): string[] => {
  return [...previous, value];
};

const unsigned = (field: string) => {
  return (input: string): bigint => parseUnsigned(input, field);
};

const hexData = (field: string) => {
  return (input: string): HexData => parseHexData(input, field);
};

const phase = (input: string): number => {
  return parsePhase(input, MAX_PHASE);
};

const withBuildOptions = (command: Program): Program => {
  return command
    .option('--quiet', 'No output printed to stdout', false)
    .option('--verbose', 'Use verbose output', false)
    .option(
      '-Z, --unstable-options <name>',
      'Use the original manifest (Cargo.toml), do not modify for build optimizations',
      collect,
      [],
    );
};

const withExtrinsicOptions = (command: Program): Program => {
  return command
    .option('--url <url>', 'Websockets url of a substrate node', checkNodeUrl, DEFAULT_URL)
    .requiredOption('-s, --suri <suri>', 'Secret key URI for the account deploying the contract')
    .option('-p, --password <password>', 'Password for the secret key');
};

const toBuildOptions = (flags: BuildFlags): BuildOptions => {
  return {
    verbosity: {
      quiet: flags.quiet,
      verbose: flags.verbose,
    },
    unstableOptions: {
      options: flags.unstableOptions,
    },
  };
};

const toExtrinsicOpts = (flags: ExtrinsicFlags): ExtrinsicOpts => {
  return {
    url: flags.url,
    suri: flags.suri,
    password: flags.password,
  };
};

const WASM_PATH_DESCRIPTION = 'Path to wasm contract code, defaults to ./target/<name>-pruned.wasm';

/**
 * Parses `argv` (as given by `process.argv`) into a command. Extrinsic commands
 * are registered only when the `extrinsics` feature is enabled.
 *
 * Commander usage errors are thrown as `CommanderError` after commander has
 * reported them; input validation errors are thrown as they are.
 */
export const parseArgs = (argv: readonly string[], features: ConfigFeatures): Command => {
  const parsed: { command?: Command } = {};

  const program = new Program()
    .name('composable-contract')
    .description('Utilities to develop Wasm smart contracts')
    .exitOverride();

  program
    .command('new')
    .description('Setup and create a new smart contract project')
    .argument('<name>', 'The name of the newly created smart contract')
    .option('-t, --target-dir <path>', 'The optional target directory for the contract project')
    .action((name: string, flags: { targetDir?: string }) => {
      parsed.command = { type: 'new', name, targetDir: flags.targetDir };
    });

  withBuildOptions(program.command('build').description('Compiles the smart contract')).action(
    (flags: BuildFlags) => {
      parsed.command = { type: 'build', ...toBuildOptions(flags) };
    },
  );

  withBuildOptions(
    program
      .command('composable-build')
      .description('Compiles all of the composable smart contracts described in the schedule'),
  ).action((flags: BuildFlags) => {
    parsed.command = { type: 'composable-build', ...toBuildOptions(flags) };
  });

  withBuildOptions(program.command('generate-metadata').description('Generate contract metadata artifacts')).action(
    (flags: BuildFlags) => {
      parsed.command = { type: 'generate-metadata', ...toBuildOptions(flags) };
    },
  );

  program
    .command('test')
    .description('Test the smart contract off-chain')
    .action(() => {
      parsed.command = { type: 'test' };
    });

  if (features.extrinsics) {
    withExtrinsicOptions(program.command('deploy').description('Upload the smart contract code to the chain'))
      .argument('[wasm-path]', WASM_PATH_DESCRIPTION)
      .action((wasmPath: string | undefined, flags: ExtrinsicFlags) => {
        parsed.command = { type: 'deploy', extrinsicOpts: toExtrinsicOpts(flags), wasmPath };
      });

    program
      .command('composable-deploy')
      .description('Upload all smart contracts selected in composable schedule to chains appointed by urls')
      .requiredOption('-s, --suri <suri>', 'Secret key URI for the account deploying the contracts')
      .action((flags: { suri: string }) => {
        parsed.command = { type: 'composable-deploy', suri: flags.suri };
      });

    withExtrinsicOptions(program.command('instantiate').description('Instantiate a deployed smart contract'))
      .option(
        '--endowment <value>',
        'Transfers an initial balance to the instantiated contract',
        unsigned('endowment'),
        parseUnsigned(DEFAULT_ENDOWMENT, 'endowment'),
      )
      .option(
        '--gas <gas>',
        'Maximum amount of gas to be used for this command',
        unsigned('gas'),
        parseUnsigned(DEFAULT_GAS_LIMIT, 'gas'),
      )
      .requiredOption(
        '--code-hash <hex>',
        'The hash of the smart contract code already uploaded to the chain',
        parseCodeHash,
      )
      .requiredOption('--data <hex>', 'Hex encoded data to call a contract constructor', hexData('data'))
      .action((flags: InstantiateFlags) => {
        parsed.command = {
          type: 'instantiate',
          extrinsicOpts: toExtrinsicOpts(flags),
          endowment: flags.endowment,
          gasLimit: flags.gas,
          codeHash: flags.codeHash,
          data: flags.data,
        };
      });

    withExtrinsicOptions(
      program.command('call-runtime-gateway').description('Call for smart contract execution on Runtime Gateway'),
    )
      .argument('[wasm-path]', WASM_PATH_DESCRIPTION)
      .requiredOption('-t, --target <suri>', 'Secret key URI of the target account')
      .requiredOption('-r, --requester <suri>', 'Secret key URI of the requester account')
      .option('--phase <phase>', 'Execution phase', phase, parsePhase(DEFAULT_PHASE, MAX_PHASE))
      .option(
        '--value <value>',
        'Value of balance transfer optionally attached to the execution order',
        unsigned('value'),
        parseUnsigned(DEFAULT_VALUE, 'value'),
      )
      .option(
        '--gas <gas>',
        'Maximum amount of gas to be used for this command',
        unsigned('gas'),
        parseUnsigned(DEFAULT_GAS_LIMIT, 'gas'),
      )
      .option('--data <hex>', 'Hex encoded input data of the call', hexData('data'), parseHexData(DEFAULT_DATA))
      .action((wasmPath: string | undefined, flags: RuntimeGatewayFlags) => {
        parsed.command = {
          type: 'call-runtime-gateway',
          extrinsicOpts: toExtrinsicOpts(flags),
          target: flags.target,
          requester: flags.requester,
          phase: flags.phase,
          value: flags.value,
          gasLimit: flags.gas,
          wasmPath,
          data: flags.data,
        };
      });

    withExtrinsicOptions(
      program.command('call-contracts-gateway').description('Call for smart contract execution on Contracts Gateway'),
    )
      .argument('[wasm-path]', WASM_PATH_DESCRIPTION)
      .option(
        '--target <hex>',
        'Hex encoded public key of the target account',
        hexData('target'),
        parseHexData(DEFAULT_TARGET, 'target'),
      )
      .requiredOption('-r, --requester <suri>', 'Secret key URI of the requester account')
      .option('--phase <phase>', 'Execution phase', phase, parsePhase(DEFAULT_PHASE, MAX_PHASE))
      .option(
        '--value <value>',
        'Value of balance transfer optionally attached to the execution order',
        unsigned('value'),
        parseUnsigned(DEFAULT_VALUE, 'value'),
      )
      .option(
        '--gas <gas>',
        'Maximum amount of gas to be used for this command',
        unsigned('gas'),
        parseUnsigned(DEFAULT_CALL_GAS_LIMIT, 'gas'),
      )
      .option('--data <hex>', 'Hex encoded input data of the call', hexData('data'), parseHexData(DEFAULT_DATA))
      .action((wasmPath: string | undefined, flags: ContractsGatewayFlags) => {
        parsed.command = {
          type: 'call-contracts-gateway',
          extrinsicOpts: toExtrinsicOpts(flags),
          target: flags.target,
          requester: flags.requester,
          phase: flags.phase,
          value: flags.value,
          gasLimit: flags.gas,
          wasmPath,
          data: flags.data,
        };
      });

    withExtrinsicOptions(
      program.command('call-contract').description('Call a regular smart contract execution via Contracts Pallet Call'),
    )
      .option(
        '--target <hex>',
        'Hex encoded public key of the contract account',
        hexData('target'),
        parseHexData(DEFAULT_TARGET, 'target'),
      )
      .option(
        '--value <value>',
        'Value of balance transfer optionally attached to the call',
        unsigned('value'),
        parseUnsigned(DEFAULT_VALUE, 'value'),
      )
      .option(
        '--gas <gas>',
        'Maximum amount of gas to be used for this command',
        unsigned('gas'),
        parseUnsigned(DEFAULT_CALL_GAS_LIMIT, 'gas'),
      )
      .option('--data <hex>', 'Hex encoded input data of the call', hexData('data'), parseHexData(DEFAULT_DATA))
      .action((flags: ContractCallFlags) => {
        parsed.command = {
          type: 'call-contract',
          extrinsicOpts: toExtrinsicOpts(flags),
          target: flags.target,
          value: flags.value,
          gasLimit: flags.gas,
          data: flags.data,
        };
      });
  }

  program.parse([...argv], { from: 'node' });

  if (parsed.command == null) {
    throw new ContractError('No command given');
  }
  return parsed.command;
};
