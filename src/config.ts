import chalk from 'chalk';

import { DEFAULT_EXTRINSICS, DEFAULT_FINALIZED } from './constant';
import { ConfigError } from './error';
import { checkFileExists, loadYaml } from './file';
import type { Config } from './type';
import { isRecord } from './util';

const readSection = (config: Record<string, unknown>, name: string): Record<string, unknown> => {
  const section = config[name];
  if (section == null) {
    return {};
  }
  if (!isRecord(section)) {
    throw new ConfigError(`Invalid config "${name}" field (object expected)`);
  }
  return section;
};

const readBoolean = (
  section: Record<string, unknown>,
  sectionName: string,
  name: string,
  fallback: boolean,
): boolean => {
  const value = section[name];
  if (value == null) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigError(`Invalid config "${name}" field of "${sectionName}" (boolean expected)`);
  }
  return value;
};

export const parseConfig = (content: unknown): Config => {
  if (content != null && !isRecord(content)) {
    throw new ConfigError('Invalid config (object expected)');
  }

  const root = content ?? {};
  const features = readSection(root, 'features');
  const execution = readSection(root, 'execution');

  const config: Config = {
    features: {
      extrinsics: readBoolean(features, 'features', 'extrinsics', DEFAULT_EXTRINSICS),
    },
    execution: {
      finalized: readBoolean(execution, 'execution', 'finalized', DEFAULT_FINALIZED),
    },
  };
  return config;
};

const loadConfigContent = async (path: string): Promise<unknown> => {
  try {
    return await loadYaml(path);
  } catch (e) {
    throw new ConfigError(`Failed to read config at "${path}"`, { cause: e });
  }
};

export const loadConfig = async (path: string): Promise<Config> => {
  const configExists = await checkFileExists(path);
  const config = parseConfig(configExists ? await loadConfigContent(path) : undefined);

  if (configExists) {
    console.log(chalk.dim(`Config: ${path}`));
    console.log(chalk.dim(`- extrinsics: ${config.features.extrinsics ? 'enabled' : 'disabled'}`));
    console.log(chalk.dim(`- wait for: ${config.execution.finalized ? 'finalization' : 'block inclusion'}`));
  }
  return config;
};
