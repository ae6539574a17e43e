import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, describe, expect, it } from 'vitest';
import { createCentsPitch, createRatioPitch, createScale } from '@tunekit/core';
import { PitchCountMismatchError, checkScaleCorpus, readScaleFile, writeScaleFile } from '../src/index.js';

const corpusDir = fileURLToPath(new URL('./fixtures/corpus/', import.meta.url));

describe('scale files', () => {
  const tempDirs: string[] = [];

  afterEach(async () => {
    await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  });

  it('reads a scale file from disk', async () => {
    const scale = await readScaleFile(join(corpusDir, 'pythagorean5.scl'));
    expect(scale.description).toBe('Pythagorean pentatonic');
    expect(scale.pitches).toEqual([
      createRatioPitch(9, 8),
      createRatioPitch(81, 64),
      createRatioPitch(3, 2),
      createRatioPitch(27, 16),
      createRatioPitch(2, 1),
    ]);
  });

  it('writes with the file name as the header and reads back', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'tunekit-'));
    tempDirs.push(dir);
    const path = join(dir, 'neutral.scl');
    const scale = createScale('Neutral third', [createCentsPitch(350), createRatioPitch(2, 1)]);

    await writeScaleFile(path, scale);

    expect(await readFile(path, 'utf8')).toBe('! neutral.scl\n!\nNeutral third\n 2\n 350.000000\n 2/1\n');
    expect(await readScaleFile(path)).toEqual(scale);
  });

  it('honours an explicit header name', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'tunekit-'));
    tempDirs.push(dir);
    const path = join(dir, 'octave.scl');

    await writeScaleFile(path, createScale('Octave', [createRatioPitch(2, 1)]), 'Octave only');

    expect(await readFile(path, 'utf8')).toBe('! Octave only\n!\nOctave\n 1\n 2/1\n');
  });

  it('rejects when the file is missing', async () => {
    await expect(readScaleFile(join(corpusDir, 'absent.scl'))).rejects.toMatchObject({ code: 'ENOENT' });
  });
});

describe('corpus check', () => {
  it('reads every .scl file in name order and reports failures', async () => {
    const report = await checkScaleCorpus(corpusDir);

    expect(report.entries.map((entry) => entry.name)).toEqual([
      'meanquar.scl',
      'pythagorean5.scl',
      'truncated.scl',
      'untitled.scl',
    ]);
    expect(report.checked).toBe(4);
    expect(report.failed).toBe(1);

    const truncated = report.entries[2];
    if (truncated.ok) throw new Error('Expected truncated.scl to fail.');
    expect(truncated.error).toBeInstanceOf(PitchCountMismatchError);
    expect(truncated.error.message).toBe('Read 2 pitches but expected 3.');
  });

  it('warns about empty descriptions', async () => {
    const report = await checkScaleCorpus(corpusDir);
    const warnings = report.entries.flatMap((entry) => (entry.ok ? entry.warnings.map((w) => `${entry.name}: ${w.code}`) : []));
    expect(warnings).toEqual(['untitled.scl: DESCRIPTION_EMPTY']);
  });

  it('checks a directory of thousands of files without failing valid ones', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'tunekit-corpus-'));
    try {
      for (let i = 0; i < 3000; i += 1) {
        await writeFile(join(dir, `s${String(i).padStart(4, '0')}.scl`), 'x\n 1\n 2/1\n', 'utf8');
      }

      const report = await checkScaleCorpus(dir);

      expect(report.checked).toBe(3000);
      expect(report.failed).toBe(0);
      expect(report.entries[0].name).toBe('s0000.scl');
      expect(report.entries[2999].name).toBe('s2999.scl');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }, 60_000);

  it('rejects when the directory cannot be listed', async () => {
    await expect(checkScaleCorpus(join(corpusDir, 'missing'))).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
