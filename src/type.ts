import type { Hex } from 'viem';

export type HexData = Hex;
export type CodeHash = Hex;
export type AccountId = string;

export type Verbosity = 'quiet' | 'verbose';

export type VerbosityFlags = {
  readonly quiet: boolean;
  readonly verbose: boolean;
};

export type UnstableOptions = {
  readonly options: readonly string[];
};

export type UnstableFlags = {
  readonly originalManifest: boolean;
};

export type ExtrinsicOpts = {
  readonly url: string;
  readonly suri: string;
  readonly password: string | undefined;
};

export type ConfigFeatures = {
  extrinsics: boolean;
};

export type ConfigExecution = {
  finalized: boolean;
};

export type Config = {
  features: ConfigFeatures;
  execution: ConfigExecution;
};

export type DeployTarget = {
  readonly compose: string;
  readonly url: string;
};

export type ComposableSchedule = {
  readonly build: readonly string[] | undefined;
  readonly deploy: readonly DeployTarget[] | undefined;
};

export type Manifest = {
  readonly path: string;
  readonly name: string;
  readonly composable: unknown; // raw, see requireComposableSchedule
};

//

export type BuildOptions = {
  readonly verbosity: VerbosityFlags;
  readonly unstableOptions: UnstableOptions;
};

export type NewCommand = {
  readonly type: 'new';
  readonly name: string;
  readonly targetDir: string | undefined;
};

export type BuildCommand = BuildOptions & {
  readonly type: 'build';
};

export type ComposableBuildCommand = BuildOptions & {
  readonly type: 'composable-build';
};

export type GenerateMetadataCommand = BuildOptions & {
  readonly type: 'generate-metadata';
};

export type TestCommand = {
  readonly type: 'test';
};

export type DeployCommand = {
  readonly type: 'deploy';
  readonly extrinsicOpts: ExtrinsicOpts;
  readonly wasmPath: string | undefined;
};

export type ComposableDeployCommand = {
  readonly type: 'composable-deploy';
  readonly suri: string;
};

export type InstantiateCommand = {
  readonly type: 'instantiate';
  readonly extrinsicOpts: ExtrinsicOpts;
  readonly endowment: bigint;
  readonly gasLimit: bigint;
  readonly codeHash: CodeHash;
  readonly data: HexData;
};

export type CallRuntimeGatewayCommand = {
  readonly type: 'call-runtime-gateway';
  readonly extrinsicOpts: ExtrinsicOpts;
  readonly target: string;
  readonly requester: string;
  readonly phase: number;
  readonly value: bigint;
  readonly gasLimit: bigint;
  readonly wasmPath: string | undefined;
  readonly data: HexData;
};

export type CallContractsGatewayCommand = {
  readonly type: 'call-contracts-gateway';
  readonly extrinsicOpts: ExtrinsicOpts;
  readonly target: HexData;
  readonly requester: string;
  readonly phase: number;
  readonly value: bigint;
  readonly gasLimit: bigint;
  readonly wasmPath: string | undefined;
  readonly data: HexData;
};

export type CallContractCommand = {
  readonly type: 'call-contract';
  readonly extrinsicOpts: ExtrinsicOpts;
  readonly target: HexData;
  readonly value: bigint;
  readonly gasLimit: bigint;
  readonly data: HexData;
};

export type ExtrinsicCommand =
  | DeployCommand
  | ComposableDeployCommand
  | InstantiateCommand
  | CallRuntimeGatewayCommand
  | CallContractsGatewayCommand
  | CallContractCommand;

export type Command =
  | NewCommand
  | BuildCommand
  | ComposableBuildCommand
  | GenerateMetadataCommand
  | TestCommand
  | ExtrinsicCommand;

//

export type InstantiateParams = {
  endowment: bigint;
  gasLimit: bigint;
  codeHash: CodeHash;
  data: HexData;
};

export type GatewayCallParams = {
  requester: AccountId;
  target: AccountId;
  phase: number;
  code: Uint8Array;
  value: bigint;
  gasLimit: bigint;
  data: HexData;
};

export type ContractCallParams = {
  target: AccountId;
  value: bigint;
  gasLimit: bigint;
  data: HexData;
};

export type CallResult = {
  blockHash: Hex;
  extrinsicHash: Hex;
  events: string[];
};
