import fs from 'fs-extra';
import type { Stats } from 'fs';

async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch {
    // Missing or unreadable paths both read as "not there"
    return null;
  }
}

export async function isFile(target: string): Promise<boolean> {
  return (await statOrNull(target))?.isFile() ?? false;
}

export async function isDirectory(target: string): Promise<boolean> {
  return (await statOrNull(target))?.isDirectory() ?? false;
}
