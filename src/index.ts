import { cryptoWaitReady } from '@polkadot/util-crypto';
import { CommanderError } from 'commander';

import { parseArgs } from './args';
import { connectChain } from './chainClient';
import { loadConfig } from './config';
import { CONFIG_PATH_ENV, DEFAULT_CONFIG_PATH, DEFAULT_MANIFEST_PATH, DEFAULT_TARGET_DIRECTORY } from './constant';
import type { Context } from './context';
import { exec, formatError, formatSuccess } from './dispatch';
import { cargoToolchain } from './toolchain';

const main = async (): Promise<void> => {
  const config = await loadConfig(process.env[CONFIG_PATH_ENV] ?? DEFAULT_CONFIG_PATH);
  const command = parseArgs(process.argv, config.features);
  await cryptoWaitReady();

  const context: Context = {
    config,
    manifestPath: DEFAULT_MANIFEST_PATH,
    targetDirectory: DEFAULT_TARGET_DIRECTORY,
    connect: connectChain,
    toolchain: cargoToolchain,
  };
  const message = await exec(command, context);
  console.log(formatSuccess(message));
};

try {
  await main();
} catch (e) {
  if (e instanceof CommanderError) {
    process.exitCode = e.exitCode;
  } else {
    console.error(formatError(e));
    process.exitCode = 1;
  }
}
