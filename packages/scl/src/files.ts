import { readdir, readFile, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { Scale } from '@tunekit/core';
import { readScale } from './read.js';
import { serializeScale } from './write.js';

export const SCALE_FILE_EXTENSION = '.scl';

export const readScaleFile = async (path: string): Promise<Scale> => readScale(await readFile(path));

export const writeScaleFile = async (path: string, scale: Scale, name = basename(path)): Promise<void> => {
  await writeFile(path, serializeScale(scale, name), 'utf8');
};

export interface CorpusWarning {
  code: 'DESCRIPTION_EMPTY';
  message: string;
}

export type CorpusEntry =
  | { name: string; ok: true; scale: Scale; warnings: CorpusWarning[] }
  | { name: string; ok: false; error: Error };

export interface CorpusReport {
  directory: string;
  entries: CorpusEntry[];
  checked: number;
  failed: number;
}

const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)));

const checkEntry = async (directory: string, name: string): Promise<CorpusEntry> => {
  try {
    const scale = await readScaleFile(join(directory, name));
    const warnings: CorpusWarning[] =
      scale.description.length === 0 ? [{ code: 'DESCRIPTION_EMPTY', message: 'Description is empty.' }] : [];
    return { name, ok: true, scale, warnings };
  } catch (error) {
    return { name, ok: false, error: toError(error) };
  }
};

/**
 * Reads every `.scl` file directly inside `directory`, in name order.
 * A file that fails to read is recorded in the report rather than thrown;
 * failing to list the directory itself rejects.
 */
export const checkScaleCorpus = async (directory: string): Promise<CorpusReport> => {
  const names = (await readdir(directory, { withFileTypes: true }))
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(SCALE_FILE_EXTENSION))
    .map((entry) => entry.name)
    .sort();

  // At most one scale file is open at a time.
  const entries: CorpusEntry[] = [];
  for (const name of names) {
    entries.push(await checkEntry(directory, name));
  }
  return {
    directory,
    entries,
    checked: entries.length,
    failed: entries.filter((entry) => !entry.ok).length,
  };
};
