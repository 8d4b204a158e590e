/**
 * Tests for FolderHarvester.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { folderPathSequences, harvestFolder } from './FolderHarvester.js';
import { InformantFactory } from '../informant/InformantFactory.js';
import { TypeCatalog } from '../ontology/TypeCatalog.js';
import { TypeRegistry } from '../ontology/TypeRegistry.js';

describe('FolderHarvester', () => {
  let testDir: string;
  let factory: InformantFactory;

  beforeEach(async () => {
    testDir = join(tmpdir(), `harvest-test-${randomUUID()}`);
    await mkdir(join(testDir, 'projB'), { recursive: true });
    await mkdir(join(testDir, 'projA'), { recursive: true });
    await writeFile(join(testDir, 'projB', 'notes.md'), 'notes');
    await writeFile(join(testDir, 'projA', 'run2.txt'), 'two');
    await writeFile(join(testDir, 'projA', 'run1.txt'), 'one');

    const catalog = new TypeCatalog([
      { name: 'Data', extends: ['Informant'], capabilities: ['location'], fields: {} },
      { name: 'File', extends: ['Data'], capabilities: ['file'], fields: {} },
    ]);
    factory = new InformantFactory(catalog, new TypeRegistry());
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('lists relative path segments in sorted order', async () => {
    expect(await folderPathSequences(testDir)).toEqual([
      ['projA', 'run1.txt'],
      ['projA', 'run2.txt'],
      ['projB', 'notes.md'],
    ]);
  });

  it('assigns path segments to attributes in order', async () => {
    const informants = await harvestFolder(testDir, factory, {
      typeName: 'File',
      attributeSequence: ['project', 'name'],
      useLocation: true,
    });

    expect(informants.map(i => i.name)).toEqual(['run1.txt', 'run2.txt', 'notes.md']);
    expect(informants[0]?.typeName).toBe('File');
    expect(informants[0]?.sourceDepth).toBe(2);
    expect(informants[0]?.fields.project).toBe('projA');
    expect(informants[2]?.fields.location).toBe(join(testDir, 'projB', 'notes.md'));
  });

  it('applies shared attributes over path-derived ones', async () => {
    const informants = await harvestFolder(testDir, factory, {
      typeName: 'File',
      attributeSequence: ['fileType'],
      attributes: { tags: ['harvested'], fields: { fileType: 'raw' } },
    });

    expect(informants.map(i => i.fields.fileType)).toEqual(['raw', 'raw', 'raw']);
    expect(informants[1]?.tags).toEqual(['harvested']);
    expect(informants[1]?.fields.location).toBeNull();
  });

  it('leaves attributes unset when the path is shorter than the sequence', async () => {
    const informants = await harvestFolder(testDir, factory, {
      typeName: 'File',
      attributeSequence: ['project', 'name', 'part'],
    });

    expect(Object.hasOwn(informants[0]?.fields ?? {}, 'part')).toBe(false);
  });

  it('refuses to set derived core attributes from paths', async () => {
    await expect(harvestFolder(testDir, factory, {
      typeName: 'File',
      attributeSequence: ['project', 'typeName'],
    })).rejects.toThrow("Path segments cannot set the 'typeName' attribute");
  });
});
