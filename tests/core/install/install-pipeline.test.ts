import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import { runInstall } from '../../../src/core/install/install-pipeline.js';
import type { PromptChoice, PromptPort } from '../../../src/core/ports/prompt.js';
import type { TypmDirectories } from '../../../src/types/index.js';
import {
  ConstraintUnsatisfiedError,
  InvalidSourceError,
  ManifestAmbiguousError,
  ManifestNotFoundError
} from '../../../src/utils/errors.js';
import {
  createFakeCloner,
  createFakeCompiler,
  createRecordingOutput,
  listTree,
  makeTempRoot,
  pathExists,
  readText,
  removeTempRoot,
  writeTree
} from '../../test-helpers.js';

const FOO_MANIFEST = '#:schema https://example.invalid/typst.json\n[package]\nname = "foo"\nversion = "1.0.0"\nexclude = ["docs"]\n';

function pickIndex(index: number): PromptPort & { messages: string[] } {
  const messages: string[] = [];
  return {
    messages,
    async select<T>(message: string, choices: Array<PromptChoice<T>>): Promise<T> {
      messages.push(message, ...choices.map(choice => choice.title));
      return choices[index].value;
    }
  };
}

describe('runInstall', () => {
  let root: string;
  let tempRoot: string;
  let directories: TypmDirectories;

  beforeEach(async () => {
    root = await makeTempRoot('install');
    tempRoot = path.join(root, 'tmp');
    await fs.mkdir(tempRoot);
    directories = { data: path.join(root, 'data'), cache: path.join(root, 'cache') };
  });

  afterEach(async () => {
    await removeTempRoot(root);
  });

  it('installs from the in-repo path under <provider>-<owner>', async () => {
    const cloner = createFakeCloner({
      'packages/foo/typst.toml': FOO_MANIFEST,
      'packages/foo/main.typ': '#let hello = [hi]\n',
      'packages/foo/examples/demo.typ': '#import "../main.typ": hello\n',
      'packages/foo/docs/notes.md': 'notes',
      'README.md': 'repo readme'
    });
    const output = createRecordingOutput();

    const result = await runInstall({
      source: 'gh/acme/widgets/packages/foo',
      directories,
      clone: cloner.clone,
      compiler: createFakeCompiler({ major: 0, minor: 12, patch: 0 }),
      tempRoot,
      output
    });

    const dest = path.join(root, 'data', 'packages', 'gh-acme', 'foo', '1.0.0');
    assert.equal(result.target.destination, dest);
    assert.equal(result.importStatement, '#import "@gh-acme/foo:1.0.0": ...');
    assert.deepEqual(cloner.requests.map(r => ({ url: r.url, ref: r.ref })), [
      { url: 'https://github.com/acme/widgets.git', ref: undefined }
    ]);

    assert.deepEqual(await listTree(dest), ['examples/demo.typ', 'main.typ', 'typst.toml']);
    assert.equal(await readText(dest, 'examples/demo.typ'), '#import "@gh-acme/foo:1.0.0": hello\n');
    assert.equal(await readText(dest, 'typst.toml'), '[package]\nname = "foo"\nversion = "1.0.0"\nexclude = ["docs"]');

    assert.deepEqual(output.lines, [
      'info: Attempting to install from: gh/acme/widgets/packages/foo',
      'step: Cloning https://github.com/acme/widgets.git...',
      'info: Found package: foo v1.0.0',
      `step: Installing to: ${dest}`,
      "success: Package 'foo' v1.0.0 installed successfully.",
      'note: You can now import it using: #import "@gh-acme/foo:1.0.0": ...'
    ]);

    assert.deepEqual(await fs.readdir(tempRoot), []);
  });

  it('passes the ref from a URL to the clone', async () => {
    const cloner = createFakeCloner({ 'pkg/foo/typst.toml': FOO_MANIFEST });
    const output = createRecordingOutput();
    await runInstall({
      source: 'https://gitlab.com/acme/widgets/-/tree/v2/pkg/foo',
      directories,
      clone: cloner.clone,
      tempRoot,
      output
    });

    assert.equal(cloner.requests[0].ref, 'v2');
    assert.equal(output.lines[1], 'step: Cloning https://gitlab.com/acme/widgets.git (v2)...');
    assert.equal(await pathExists(path.join(root, 'data', 'packages', 'gl-acme', 'foo', '1.0.0', 'typst.toml')), true);
  });

  it('searches the subtree when the manifest is not at the path', async () => {
    const cloner = createFakeCloner({ 'nested/deep/foo/typst.toml': FOO_MANIFEST });
    const output = createRecordingOutput();
    await runInstall({ source: 'bb/acme/widgets', directories, clone: cloner.clone, tempRoot, output });

    assert.match(output.lines[2], /^info: Found typst\.toml at: .*nested[/\\]deep[/\\]foo[/\\]typst\.toml$/);
    assert.equal(await pathExists(path.join(root, 'data', 'packages', 'bb-acme', 'foo', '1.0.0')), true);
  });

  it('asks which manifest to use when several are found', async () => {
    const cloner = createFakeCloner({
      'a/typst.toml': '[package]\nname = "alpha"\nversion = "0.1.0"\n',
      'b/typst.toml': '[package]\nname = "beta"\nversion = "0.2.0"\n'
    });
    const prompt = pickIndex(1);
    const output = createRecordingOutput();

    const result = await runInstall({ source: 'gh/acme/mono', directories, clone: cloner.clone, tempRoot, output, prompt });

    assert.equal(result.manifest.name, 'beta');
    assert.deepEqual(prompt.messages, [
      'Multiple typst.toml files found. Please choose one to install:',
      'a/typst.toml',
      'b/typst.toml'
    ]);
    assert.equal(output.lines.includes('info: Selected: b/typst.toml'), true);
  });

  it('fails on several manifests without an interactive prompt', async () => {
    const cloner = createFakeCloner({ 'a/typst.toml': FOO_MANIFEST, 'b/typst.toml': FOO_MANIFEST });
    await assert.rejects(
      runInstall({ source: 'gh/acme/mono', directories, clone: cloner.clone, tempRoot, output: createRecordingOutput() }),
      ManifestAmbiguousError
    );
    assert.deepEqual(await fs.readdir(tempRoot), []);
  });

  it('fails when the repository has no manifest', async () => {
    const cloner = createFakeCloner({ 'README.md': '' });
    await assert.rejects(
      runInstall({ source: 'gh/acme/empty', directories, clone: cloner.clone, tempRoot, output: createRecordingOutput() }),
      ManifestNotFoundError
    );
    assert.deepEqual(await fs.readdir(tempRoot), []);
  });

  it('rejects an unsatisfied compiler requirement without writing', async () => {
    const cloner = createFakeCloner({ 'typst.toml': '[package]\nname = "foo"\nversion = "1.0.0"\ncompiler = ">=1.0.0"\n' });
    await assert.rejects(
      runInstall({
        source: 'gh/acme/foo',
        directories,
        clone: cloner.clone,
        compiler: createFakeCompiler({ major: 0, minor: 12, patch: 0 }),
        tempRoot,
        output: createRecordingOutput()
      }),
      ConstraintUnsatisfiedError
    );
    assert.equal(await pathExists(directories.data), false);
  });

  it('warns and overwrites an existing installation', async () => {
    const cloner = createFakeCloner({ 'typst.toml': FOO_MANIFEST, 'main.typ': 'new' });
    const dest = path.join(root, 'data', 'packages', 'gh-acme', 'foo', '1.0.0');
    await writeTree(dest, { 'main.typ': 'old' });
    const output = createRecordingOutput();

    await runInstall({ source: 'gh/acme/foo', directories, clone: cloner.clone, tempRoot, output });

    assert.equal(await readText(dest, 'main.typ'), 'new');
    assert.equal(
      output.lines.includes(`warn: Package foo v1.0.0 already installed at ${dest}. Overwriting.`),
      true
    );
  });

  it('does not clone an invalid source', async () => {
    const cloner = createFakeCloner({});
    await assert.rejects(
      runInstall({ source: 'https://example.com/a/b', directories, clone: cloner.clone, tempRoot, output: createRecordingOutput() }),
      InvalidSourceError
    );
    assert.deepEqual(cloner.requests, []);
  });
});
