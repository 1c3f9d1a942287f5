import { readFile, stat } from 'node:fs/promises';
import YAML from 'yaml';

export async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export async function readText(path: string): Promise<string> {
  return await readFile(path, 'utf8');
}

export async function readYaml(path: string): Promise<unknown> {
  const raw = await readText(path);
  return YAML.parse(raw);
}
