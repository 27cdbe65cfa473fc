/**
 * Tests for git source parsing: aliases and provider URLs.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  normalizeCloneUrl,
  parseAliasSource,
  parseGitSource,
  parseGitUrl
} from '../../src/utils/git-url-detection.js';
import { InvalidSourceError } from '../../src/utils/errors.js';

describe('alias sources', () => {
  it('resolves gh alias with a nested path', () => {
    const desc = parseGitSource('gh/acme/widgets/sub/dir');
    assert.equal(desc.cloneUrl, 'https://github.com/acme/widgets.git');
    assert.equal(desc.ref, undefined);
    assert.equal(desc.pathInRepo, 'sub/dir');
    assert.equal(desc.providerHost, 'github.com');
    assert.equal(desc.owner, 'acme');
  });

  it('accepts every alias case-insensitively', () => {
    assert.equal(parseGitSource('GitHub/acme/widgets').cloneUrl, 'https://github.com/acme/widgets.git');
    assert.equal(parseGitSource('GL/acme/widgets').cloneUrl, 'https://gitlab.com/acme/widgets.git');
    assert.equal(parseGitSource('gitlab/acme/widgets').providerHost, 'gitlab.com');
    assert.equal(parseGitSource('bb/acme/widgets').cloneUrl, 'https://bitbucket.org/acme/widgets.git');
    assert.equal(parseGitSource('Bitbucket/acme/widgets').providerHost, 'bitbucket.org');
  });

  it('uses an empty path for the repository root', () => {
    const desc = parseGitSource('gh/acme/widgets');
    assert.equal(desc.pathInRepo, '');
    assert.equal(desc.ref, undefined);
  });

  it('returns null for unknown aliases and short inputs', () => {
    assert.equal(parseAliasSource('sr/acme/widgets'), null);
    assert.equal(parseAliasSource('gh/acme'), null);
    assert.equal(parseAliasSource('gh//widgets'), null);
    assert.equal(parseAliasSource('gh/acme/'), null);
  });

  it('rejects an empty repo name', () => {
    assert.equal(parseAliasSource('gh/acme//pkg'), null);
    assert.throws(() => parseGitSource('gh/acme//pkg'), InvalidSourceError);
  });

  it('rejects parent segments in the path', () => {
    assert.throws(() => parseGitSource('gh/acme/widgets/../../etc'), InvalidSourceError);
  });
});

describe('GitHub URLs', () => {
  it('extracts ref and path from /tree/', () => {
    const desc = parseGitSource('https://github.com/acme/widgets/tree/v2/pkg');
    assert.equal(desc.cloneUrl, 'https://github.com/acme/widgets.git');
    assert.equal(desc.ref, 'v2');
    assert.equal(desc.pathInRepo, 'pkg');
    assert.equal(desc.owner, 'acme');
  });

  it('treats /blob/ like /tree/', () => {
    const desc = parseGitSource('https://github.com/acme/widgets/blob/main/packages/foo');
    assert.equal(desc.ref, 'main');
    assert.equal(desc.pathInRepo, 'packages/foo');
  });

  it('strips .git and www.', () => {
    const desc = parseGitSource('https://www.github.com/acme/widgets.git');
    assert.equal(desc.cloneUrl, 'https://github.com/acme/widgets.git');
    assert.equal(desc.providerHost, 'github.com');
    assert.equal(desc.pathInRepo, '');
    assert.equal(desc.ref, undefined);
  });

  it('uses remaining segments as path when there is no ref marker', () => {
    const desc = parseGitSource('https://github.com/acme/widgets/packages/foo');
    assert.equal(desc.ref, undefined);
    assert.equal(desc.pathInRepo, 'packages/foo');
  });

  it('needs a ref after tree to read it as a ref', () => {
    const desc = parseGitSource('https://github.com/acme/widgets/tree');
    assert.equal(desc.ref, undefined);
    assert.equal(desc.pathInRepo, 'tree');
  });

  it('rejects URLs with fewer than two segments', () => {
    assert.equal(parseGitUrl('https://github.com/acme'), null);
    assert.throws(() => parseGitSource('https://github.com/acme'), InvalidSourceError);
  });
});

describe('GitLab URLs', () => {
  it('extracts ref and path from /-/tree/', () => {
    const desc = parseGitSource('https://gitlab.com/acme/widgets/-/tree/dev/lib/pkg');
    assert.equal(desc.cloneUrl, 'https://gitlab.com/acme/widgets.git');
    assert.equal(desc.ref, 'dev');
    assert.equal(desc.pathInRepo, 'lib/pkg');
  });

  it('does not read GitHub-style tree segments as a ref', () => {
    const desc = parseGitSource('https://gitlab.com/acme/widgets/tree/dev');
    assert.equal(desc.ref, undefined);
    assert.equal(desc.pathInRepo, 'tree/dev');
  });
});

describe('Bitbucket URLs', () => {
  it('never sets a ref', () => {
    const desc = parseGitSource('https://bitbucket.org/acme/widgets/src/main/pkg');
    assert.equal(desc.cloneUrl, 'https://bitbucket.org/acme/widgets.git');
    assert.equal(desc.ref, undefined);
    assert.equal(desc.pathInRepo, 'src/main/pkg');
  });
});

describe('invalid sources', () => {
  it('rejects unknown hosts', () => {
    assert.throws(() => parseGitSource('https://example.com/acme/widgets'), InvalidSourceError);
  });

  it('rejects known hosts with an explicit port', () => {
    assert.equal(parseGitUrl('https://github.com:8443/acme/widgets'), null);
    assert.throws(() => parseGitSource('https://gitlab.com:8080/acme/widgets'), InvalidSourceError);
  });

  it('rejects strings that are neither alias nor URL', () => {
    assert.throws(() => parseGitSource('widgets'), InvalidSourceError);
    assert.throws(() => parseGitSource('acme/widgets/pkg'), InvalidSourceError);
  });

  it('keeps the clone host equal to the provider host', () => {
    for (const input of ['gh/a/b', 'https://www.gitlab.com/a/b', 'bb/a/b/c']) {
      const desc = parseGitSource(input);
      assert.equal(new URL(desc.cloneUrl).hostname, desc.providerHost);
    }
  });

  it('normalizes clone URLs', () => {
    assert.equal(normalizeCloneUrl('gitlab.com', 'acme', 'widgets.git'), 'https://gitlab.com/acme/widgets.git');
  });
});
