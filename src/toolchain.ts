import { spawnSync } from 'child_process';
import fp from 'path';
import chalk from 'chalk';

import { composableCodePath, defaultCodePath } from './code';
import {
  COMPOSABLES_DIRECTORY,
  METADATA_FILE,
  METADATA_PACKAGE,
  RELEASE_OVERRIDES,
  TEMPLATE_DIRECTORY,
  WASM_TARGET,
} from './constant';
import { InvalidProjectNameError, NothingToBuildError, ProjectExistsError, ToolchainError } from './error';
import { checkFileExists, copyFile, createDirectory, joinPath, loadText, parseDirectory, saveText } from './file';
import { requireComposableSchedule } from './manifest';
import type { Manifest, UnstableFlags, Verbosity } from './type';
import { toSnakeCase } from './util';

export type BuildSettings = {
  verbosity: Verbosity | undefined;
  flags: UnstableFlags;
  targetDirectory: string;
};

export interface Toolchain {
  createProject(name: string, targetDir: string | undefined): Promise<string>;
  build(manifest: Manifest, settings: BuildSettings): Promise<string>;
  composableBuild(manifest: Manifest, settings: BuildSettings): Promise<string>;
  generateMetadata(manifest: Manifest, settings: BuildSettings): Promise<string>;
}

const PROJECT_NAME = /^[A-Za-z][A-Za-z0-9_]*$/;
const NAME_PLACEHOLDER = /\{\{name\}\}/g;

// template file -> project file
const TEMPLATE_FILES: ReadonlyMap<string, string> = new Map([
  ['contract.yaml', 'contract.yaml'],
  ['Cargo.toml', 'Cargo.toml'],
  ['lib.rs', 'lib.rs'],
  ['gitignore', '.gitignore'],
]);

export const buildCargoArgs = (manifestPath: string, settings: BuildSettings): string[] => {
  const args = [
    '+nightly',
    'build',
    '--release',
    '--target',
    WASM_TARGET,
    '--manifest-path',
    manifestPath,
    '--target-dir',
    fp.resolve(settings.targetDirectory),
  ];

  if (settings.verbosity != null) {
    args.push(`--${settings.verbosity}`);
  }

  if (!settings.flags.originalManifest) {
    for (const override of RELEASE_OVERRIDES) {
      args.push('--config', override);
    }
  }
  return args;
};

export const compiledCodePath = (targetDirectory: string, crateName: string): string => {
  return joinPath(targetDirectory, WASM_TARGET, 'release', `${toSnakeCase(crateName)}.wasm`);
};

const projectDirectory = (manifest: Manifest): string => {
  return parseDirectory(manifest.path) || '.';
};

const runCargo = (args: readonly string[], cwd: string): void => {
  console.log(chalk.dim(`Running cargo ${args.join(' ')}`));
  const result = spawnSync('cargo', args, { stdio: 'inherit', cwd });
  if (result.error != null) {
    throw new ToolchainError('Failed to run cargo', { cause: result.error });
  }
  if (result.status !== 0) {
    const subcommand = args.find((arg) => !arg.startsWith('+')) ?? '';
    throw new ToolchainError(`cargo ${subcommand} exited with status ${result.status}`);
  }
};

const buildCrate = async (
  crateDirectory: string,
  crateName: string,
  destination: string,
  settings: BuildSettings,
): Promise<void> => {
  const cargoManifest = joinPath(crateDirectory, 'Cargo.toml');
  runCargo(buildCargoArgs(cargoManifest, settings), crateDirectory);
  await copyFile(compiledCodePath(settings.targetDirectory, crateName), destination);
};

export const cargoToolchain: Toolchain = {
  async createProject(name, targetDir) {
    if (!PROJECT_NAME.test(name)) {
      throw new InvalidProjectNameError(name);
    }

    const directory = joinPath(targetDir ?? '.', name);
    if (await checkFileExists(directory)) {
      throw new ProjectExistsError(directory);
    }

    await createDirectory(directory);
    for (const [templateFile, projectFile] of TEMPLATE_FILES) {
      const template = await loadText(new URL(templateFile, TEMPLATE_DIRECTORY));
      await saveText(joinPath(directory, projectFile), template.replace(NAME_PLACEHOLDER, name));
    }
    return directory;
  },

  async build(manifest, settings) {
    const destination = defaultCodePath(settings.targetDirectory, manifest.name);
    await buildCrate(projectDirectory(manifest), manifest.name, destination, settings);
    return destination;
  },

  async composableBuild(manifest, settings) {
    const components = requireComposableSchedule(manifest).build ?? [];
    if (components.length === 0) {
      throw new NothingToBuildError();
    }

    for (const component of components) {
      console.log(`Building: ${chalk.blue.bold(component)}`);
      const crateDirectory = joinPath(projectDirectory(manifest), component);
      await buildCrate(crateDirectory, component, composableCodePath(settings.targetDirectory, component), settings);
    }
    return `${settings.targetDirectory}/${COMPOSABLES_DIRECTORY}`;
  },

  async generateMetadata(manifest, settings) {
    const args = ['run', '--package', METADATA_PACKAGE, '--release'];
    if (settings.verbosity != null) {
      args.push(`--${settings.verbosity}`);
    }
    runCargo(args, projectDirectory(manifest));

    const metadataPath = `${settings.targetDirectory}/${METADATA_FILE}`;
    if (!(await checkFileExists(metadataPath))) {
      throw new ToolchainError(`Metadata generation did not produce "${metadataPath}"`);
    }
    return metadataPath;
  },
};
