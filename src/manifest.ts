import { MetadataReadError } from './error';
import { checkFileExists, loadYaml } from './file';
import type { ComposableSchedule, DeployTarget, Manifest } from './type';
import { isRecord } from './util';

const parseStringList = (value: unknown, path: string, field: string): string[] | undefined => {
  if (value == null) {
    return undefined;
  }
  if (!Array.isArray(value) || value.some((item) => typeof item !== 'string')) {
    throw new MetadataReadError(path, `"${field}" field must be a list of strings`);
  }
  return value.map(String);
};

const parseDeployTargets = (value: unknown, path: string): DeployTarget[] | undefined => {
  if (value == null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new MetadataReadError(path, '"composable.deploy" field must be a list');
  }

  return value.map((item: unknown, index): DeployTarget => {
    const compose = isRecord(item) ? item.compose : undefined;
    const url = isRecord(item) ? item.url : undefined;
    if (typeof compose !== 'string' || typeof url !== 'string') {
      throw new MetadataReadError(
        path,
        `"composable.deploy" entry #${index} must have "compose" and "url" string fields`,
      );
    }
    return { compose, url };
  });
};

const parseComposableSchedule = (value: unknown, path: string): ComposableSchedule => {
  if (!isRecord(value)) {
    throw new MetadataReadError(path, '"composable" field must be an object');
  }

  const schedule: ComposableSchedule = {
    build: parseStringList(value.build, path, 'composable.build'),
    deploy: parseDeployTargets(value.deploy, path),
  };
  return schedule;
};

export const parseManifest = (content: unknown, path: string): Manifest => {
  if (!isRecord(content)) {
    throw new MetadataReadError(path, 'object expected');
  }

  const { package: pkg } = content;
  const name = isRecord(pkg) ? pkg.name : undefined;
  if (typeof name !== 'string' || name === '') {
    throw new MetadataReadError(path, '"package.name" field must be a non-empty string');
  }

  const manifest: Manifest = {
    path,
    name,
    composable: content.composable,
  };
  return manifest;
};

export const loadManifest = async (path: string): Promise<Manifest> => {
  const manifestExists = await checkFileExists(path);
  if (!manifestExists) {
    throw new MetadataReadError(path, 'file does not exist');
  }

  let content: unknown;
  try {
    content = await loadYaml(path);
  } catch (e) {
    throw new MetadataReadError(path, 'invalid YAML', { cause: e });
  }
  return parseManifest(content, path);
};

/**
 * Validates the raw `composable` section. Loading a manifest checks only the
 * package name.
 */
export const requireComposableSchedule = (manifest: Manifest): ComposableSchedule => {
  if (manifest.composable == null) {
    throw new MetadataReadError(
      manifest.path,
      'missing "composable" section, make sure the manifest follows the composable metadata format',
    );
  }
  return parseComposableSchedule(manifest.composable, manifest.path);
};
