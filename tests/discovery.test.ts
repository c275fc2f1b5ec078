/**
 * Input Discovery Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { discoverInputs, deriveOutputPath } from '../src/lib/discovery/index.js';
import { DirectoryNotFoundError, NoInputsError } from '../src/lib/errors/index.js';
import { mkdir, rm, symlink, writeFile } from 'fs/promises';
import { join, resolve } from 'path';

const TEST_DIR = 'test-discovery';
const EMPTY_DIR = join(TEST_DIR, 'empty');
const UPPER_DIR = join(TEST_DIR, 'upper');
const SHARED_DIR = 'test-discovery-shared';

describe('discoverInputs', () => {
  beforeAll(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
    await rm(SHARED_DIR, { recursive: true, force: true });
    await mkdir(join(TEST_DIR, 'nested.html'), { recursive: true });
    await mkdir(EMPTY_DIR, { recursive: true });
    await mkdir(UPPER_DIR, { recursive: true });
    await mkdir(SHARED_DIR, { recursive: true });
    for (const name of ['c.html', 'A.HTML', 'b.html', 'notes.txt', 'logo.svg']) {
      await writeFile(join(TEST_DIR, name), name);
    }
    await writeFile(join(UPPER_DIR, 'X.HTML'), 'upper');
    await writeFile(join(SHARED_DIR, 'shared.html'), 'shared');
    await symlink(resolve(SHARED_DIR, 'shared.html'), join(TEST_DIR, 'linked.html'));
    await symlink(resolve(SHARED_DIR), join(TEST_DIR, 'dirlink.html'));
    await symlink(resolve(SHARED_DIR, 'gone.html'), join(TEST_DIR, 'dangling.html'));
  });

  afterAll(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
    await rm(SHARED_DIR, { recursive: true, force: true });
  });

  it('should list HTML files sorted by name', async () => {
    const inputs = await discoverInputs(TEST_DIR);

    expect(inputs.map(i => i.name)).toEqual(['b.html', 'c.html', 'linked.html']);
  });

  it('should return absolute paths', async () => {
    const inputs = await discoverInputs(TEST_DIR);

    expect(inputs[0].path).toBe(join(resolve(TEST_DIR), 'b.html'));
  });

  it('should follow symbolic links to files', async () => {
    const inputs = await discoverInputs(TEST_DIR);

    expect(inputs[2]).toEqual({
      path: join(resolve(TEST_DIR), 'linked.html'),
      name: 'linked.html',
    });
  });

  it('should skip links to directories and dangling links', async () => {
    const names = (await discoverInputs(TEST_DIR)).map(i => i.name);

    expect(names).not.toContain('dirlink.html');
    expect(names).not.toContain('dangling.html');
  });

  it('should match the extension case-sensitively', async () => {
    await expect(discoverInputs(UPPER_DIR)).rejects.toBeInstanceOf(NoInputsError);
  });

  it('should skip directories that match the extension', async () => {
    const inputs = await discoverInputs(TEST_DIR);

    expect(inputs.map(i => i.name)).not.toContain('nested.html');
  });

  it('should honor a custom extension', async () => {
    const inputs = await discoverInputs(TEST_DIR, { extension: '.svg' });

    expect(inputs.map(i => i.name)).toEqual(['logo.svg']);
  });

  it('should throw DirectoryNotFoundError for a missing directory', async () => {
    const error = await discoverInputs('test-discovery-missing').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DirectoryNotFoundError);
    if (!(error instanceof DirectoryNotFoundError)) return;
    expect(error.directory).toBe('test-discovery-missing');
    expect(error.message).toBe('test-discovery-missing directory not found');
  });

  it('should throw DirectoryNotFoundError when the path is a file', async () => {
    await expect(discoverInputs(join(TEST_DIR, 'notes.txt'))).rejects.toBeInstanceOf(
      DirectoryNotFoundError
    );
  });

  it('should throw NoInputsError for a directory without matches', async () => {
    const error = await discoverInputs(EMPTY_DIR).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NoInputsError);
    if (!(error instanceof NoInputsError)) return;
    expect(error.extension).toBe('.html');
    expect(error.message).toBe(`No HTML files found in ${EMPTY_DIR} directory`);
  });
});

describe('deriveOutputPath', () => {
  it('should keep the directory and stem', () => {
    expect(deriveOutputPath('/work/diagrams/flow.html')).toBe('/work/diagrams/flow.jpg');
  });

  it('should replace only the last extension', () => {
    expect(deriveOutputPath('/work/diagrams/v1.2.html')).toBe('/work/diagrams/v1.2.jpg');
  });

  it('should use a custom output extension', () => {
    expect(deriveOutputPath('/work/diagrams/flow.html', '.jpeg')).toBe('/work/diagrams/flow.jpeg');
  });

  it('should be stable across calls', () => {
    const path = '/work/diagrams/flow.html';
    expect(deriveOutputPath(path)).toBe(deriveOutputPath(path));
  });
});
