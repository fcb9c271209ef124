export const DEFAULT_CONFIG_PATH = 'config.yaml';
export const CONFIG_PATH_ENV = 'COMPOSABLE_CONTRACT_CONFIG';
export const DEFAULT_MANIFEST_PATH = 'contract.yaml';
export const DEFAULT_TARGET_DIRECTORY = './target';
export const COMPOSABLES_DIRECTORY = 'composables';
export const CODE_FILE_SUFFIX = '-pruned.wasm';
export const TEMPLATE_DIRECTORY = new URL('../template/', import.meta.url);

export const DEFAULT_URL = 'ws://localhost:9944';
export const DEFAULT_ENDOWMENT = '0';
export const DEFAULT_GAS_LIMIT = '500000000';
export const DEFAULT_CALL_GAS_LIMIT = '3875000000'; // contracts gateway & direct calls
export const DEFAULT_PHASE = '0';
export const DEFAULT_VALUE = '0';
export const DEFAULT_DATA = '00';
export const DEFAULT_TARGET = '00';

export const DEFAULT_EXTRINSICS = false;
export const DEFAULT_FINALIZED = false;

export const UNSTABLE_ORIGINAL_MANIFEST = 'original-manifest';
export const UNSTABLE_OPTIONS = [UNSTABLE_ORIGINAL_MANIFEST] as const;

export const CODE_HASH_SIZE = 32;
export const ACCOUNT_ID_SIZE = 32;
export const MAX_PHASE = 255;
export const SS58_FORMAT = 42;

export const WASM_TARGET = 'wasm32-unknown-unknown';
export const RELEASE_OVERRIDES = [
  'profile.release.opt-level="z"',
  'profile.release.lto=true',
  'profile.release.codegen-units=1',
  'profile.release.panic="abort"',
];
export const METADATA_PACKAGE = 'metadata-gen';
export const METADATA_FILE = 'metadata.json';

export const CONTRACTS_SECTION = 'contracts';
export const RUNTIME_GATEWAY_SECTION = 'runtimeGateway';
export const CONTRACTS_GATEWAY_SECTION = 'contractsGateway';
export const MULTISTEP_CALL = 'multistepCall';
