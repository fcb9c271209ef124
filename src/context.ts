import type { ChainConnector } from './chainClient';
import type { Toolchain } from './toolchain';
import type { Config } from './type';

export type Context = {
  config: Config;
  manifestPath: string;
  targetDirectory: string;
  connect: ChainConnector;
  toolchain: Toolchain;
};
