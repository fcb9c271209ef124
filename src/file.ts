import fs from 'fs/promises';
import fp from 'path';
import yaml from 'js-yaml';

export const checkFileExists = async (path: string): Promise<boolean> => {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
};

export const parseDirectory = (path: string): string => {
  return fp.parse(path).dir;
};

export const joinPath = (...paths: readonly string[]): string => {
  return fp.join(...paths);
};

export const createDirectory = async (path: string): Promise<void> => {
  await fs.mkdir(path, { recursive: true });
};

export const copyFile = async (from: string, to: string): Promise<void> => {
  const directory = parseDirectory(to);
  if (directory) {
    await createDirectory(directory);
  }
  await fs.copyFile(from, to);
};

//

export const loadText = async (path: string | URL): Promise<string> => {
  const text = await fs.readFile(path, 'utf-8');
  return text;
};

export const loadBinary = async (path: string): Promise<Uint8Array> => {
  const buffer = await fs.readFile(path);
  return new Uint8Array(buffer);
};

export const loadYaml = async (path: string): Promise<unknown> => {
  const text = await loadText(path);
  const object: unknown = yaml.load(text);
  return object;
};

//

export const saveText = async (path: string, text: string): Promise<void> => {
  await fs.writeFile(path, text);
};
