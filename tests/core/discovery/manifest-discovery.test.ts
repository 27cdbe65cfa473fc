import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import {
  discoverManifest,
  findManifestCandidates,
  selectManifestCandidate
} from '../../../src/core/discovery/manifest-discovery.js';
import { ManifestAmbiguousError, ManifestNotFoundError } from '../../../src/utils/errors.js';
import { makeTempRoot, removeTempRoot, writeTree } from '../../test-helpers.js';

describe('manifest discovery', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempRoot('discovery');
  });

  afterEach(async () => {
    await removeTempRoot(root);
  });

  it('prefers a manifest directly at the search root', async () => {
    await writeTree(root, { 'typst.toml': '', 'nested/typst.toml': '' });
    assert.deepEqual(await discoverManifest(root), { kind: 'direct', manifestPath: path.join(root, 'typst.toml') });
  });

  it('finds a single nested manifest', async () => {
    await writeTree(root, { 'packages/foo/typst.toml': '', 'README.md': '' });
    assert.deepEqual(await discoverManifest(root), {
      kind: 'single',
      manifestPath: path.join(root, 'packages', 'foo', 'typst.toml')
    });
  });

  it('reports several manifests in path order', async () => {
    await writeTree(root, { 'b/typst.toml': '', 'a/typst.toml': '', 'a/deeper/typst.toml': '' });
    const discovery = await discoverManifest(root);
    assert.equal(discovery.kind, 'ambiguous');
    if (discovery.kind === 'ambiguous') {
      assert.deepEqual(discovery.candidates.map(c => c.relativePath), [
        'a/deeper/typst.toml',
        'a/typst.toml',
        'b/typst.toml'
      ]);
    }
  });

  it('orders candidates by code unit rather than locale', async () => {
    await writeTree(root, { 'a/typst.toml': '', 'a-b/typst.toml': '', 'B/typst.toml': '' });
    assert.deepEqual((await findManifestCandidates(root)).map(c => c.relativePath), [
      'B/typst.toml',
      'a-b/typst.toml',
      'a/typst.toml'
    ]);
  });

  it('fails when nothing is found', async () => {
    await writeTree(root, { 'main.typ': '' });
    await assert.rejects(discoverManifest(root), ManifestNotFoundError);
  });

  it('fails when the search root does not exist', async () => {
    await assert.rejects(discoverManifest(path.join(root, 'missing')), ManifestNotFoundError);
  });

  it('ignores files merely ending in typst.toml', async () => {
    await writeTree(root, { 'x/old-typst.toml': '' });
    assert.deepEqual(await findManifestCandidates(root), []);
  });
});

describe('selectManifestCandidate', () => {
  const candidates = [
    { manifestPath: '/r/a/typst.toml', relativePath: 'a/typst.toml' },
    { manifestPath: '/r/b/typst.toml', relativePath: 'b/typst.toml' }
  ];

  it('returns the candidate at a zero-based index', () => {
    assert.equal(selectManifestCandidate(candidates, 1).relativePath, 'b/typst.toml');
  });

  it('rejects out-of-range and fractional indices', () => {
    assert.throws(() => selectManifestCandidate(candidates, 2), ManifestAmbiguousError);
    assert.throws(() => selectManifestCandidate(candidates, -1), ManifestAmbiguousError);
    assert.throws(() => selectManifestCandidate(candidates, 0.5), ManifestAmbiguousError);
  });
});
