import chalk from 'chalk';

import { CODE_FILE_SUFFIX, COMPOSABLES_DIRECTORY } from './constant';
import { CodeNotFoundError, MetadataReadError } from './error';
import { loadBinary } from './file';
import { loadManifest } from './manifest';
import type { Context } from './context';

export const defaultCodePath = (targetDirectory: string, name: string): string => {
  return `${targetDirectory}/${name}${CODE_FILE_SUFFIX}`;
};

export const composableCodePath = (targetDirectory: string, compose: string): string => {
  return defaultCodePath(`${targetDirectory}/${COMPOSABLES_DIRECTORY}`, compose);
};

export const loadContractCode = async (path: string): Promise<Uint8Array> => {
  try {
    return await loadBinary(path);
  } catch (e) {
    throw new CodeNotFoundError(path, { cause: e });
  }
};

const resolveCodePath = async (context: Context, wasmPath: string | undefined): Promise<string> => {
  if (wasmPath != null) {
    return wasmPath;
  }
  const manifest = await loadManifest(context.manifestPath);
  return defaultCodePath(context.targetDirectory, manifest.name);
};

export const resolveContractCode = async (context: Context, wasmPath: string | undefined): Promise<Uint8Array> => {
  const path = await resolveCodePath(context, wasmPath);
  return loadContractCode(path);
};

/**
 * Missing code resolves to an empty blob: the gateway then calls the contract
 * already deployed at the target.
 */
export const resolveOptionalContractCode = async (
  context: Context,
  wasmPath: string | undefined,
): Promise<Uint8Array> => {
  try {
    return await resolveContractCode(context, wasmPath);
  } catch (e) {
    if (!(e instanceof CodeNotFoundError) && !(e instanceof MetadataReadError)) {
      throw e;
    }
    console.log(chalk.yellow('Correct code not found. Proceeding with a direct contract call at target destination'));
    return new Uint8Array();
  }
};
