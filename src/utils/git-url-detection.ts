/**
 * Git source detection and parsing.
 * Supports:
 * - Provider aliases (gh/owner/repo[/path], gl/..., bb/...)
 * - GitHub web URLs (https://github.com/owner/repo/tree/ref/path)
 * - GitLab web URLs (https://gitlab.com/owner/repo/-/tree/ref/path)
 * - Bitbucket URLs (https://bitbucket.org/owner/repo[/path])
 */

import type { GitSourceDescriptor } from '../types/index.js';
import { PROVIDER_ALIASES } from '../constants/index.js';
import { InvalidSourceError } from './errors.js';
import { logger } from './logger.js';

/**
 * Parse a git source into a descriptor.
 *
 * The alias form is tried first; anything that is not a recognized alias
 * falls through to URL parsing.
 *
 * @param input - Raw user input
 */
export function parseGitSource(input: string): GitSourceDescriptor {
  const alias = parseAliasSource(input);
  if (alias) {
    return alias;
  }

  const fromUrl = parseGitUrl(input);
  if (fromUrl) {
    return fromUrl;
  }

  throw new InvalidSourceError(input, 'unsupported git URL format or provider (or invalid alias)');
}

/**
 * Parse alias form: <alias>/<owner>/<repo>[/<path...>]
 *
 * Examples:
 * - gh/acme/widgets
 * - GL/acme/widgets/packages/foo
 *
 * @returns Descriptor, or null when the input is not a usable alias
 */
export function parseAliasSource(input: string): GitSourceDescriptor | null {
  const parts = input.split('/');
  if (parts.length < 3) {
    return null;
  }

  const host = PROVIDER_ALIASES[parts[0].toLowerCase()];
  const owner = parts[1];
  const repoAndPath = parts.slice(2).join('/');

  if (!host || !owner || !repoAndPath) {
    return null;
  }

  const slash = repoAndPath.indexOf('/');
  const repo = slash === -1 ? repoAndPath : repoAndPath.slice(0, slash);
  const pathInRepo = slash === -1 ? '' : repoAndPath.slice(slash + 1);

  if (!repo) {
    return null;
  }

  logger.debug('Parsed git alias', { input, host, owner, repo, pathInRepo });

  return createDescriptor(input, host, owner, repo, undefined, pathInRepo);
}

/**
 * Parse a provider web or clone URL.
 *
 * Supported formats:
 * - https://github.com/owner/repo[.git]
 * - https://github.com/owner/repo/tree|blob/<ref>[/path]
 * - https://gitlab.com/owner/repo/-/tree|blob/<ref>[/path]
 * - https://bitbucket.org/owner/repo[/path]
 * - any of the above with a leading www.
 *
 * @returns Descriptor, or null when the input is not an absolute URL or the
 *   host/path is not supported
 */
export function parseGitUrl(input: string): GitSourceDescriptor | null {
  let url: URL;

  try {
    url = new URL(input);
  } catch {
    return null;
  }

  if (!url.protocol || !url.host) {
    return null;
  }

  // `host` keeps an explicit port, so such URLs never match a known host
  let host = url.host.toLowerCase();
  if (host.startsWith('www.')) {
    host = host.slice(4);
  }

  const segments = url.pathname.split('/').filter(s => s.length > 0);
  if (segments.length < 2) {
    return null;
  }

  const owner = segments[0];
  const repo = stripGitSuffix(segments[1]);
  let ref: string | undefined;
  let pathSegments: string[] = [];

  switch (host) {
    case 'github.com':
      if (segments.length > 3 && isRefMarker(segments[2])) {
        ref = segments[3];
        pathSegments = segments.slice(4);
      } else if (segments.length > 2) {
        pathSegments = segments.slice(2);
      }
      break;

    case 'gitlab.com':
      if (segments.length > 4 && segments[2] === '-' && isRefMarker(segments[3])) {
        ref = segments[4];
        pathSegments = segments.slice(5);
      } else if (segments.length > 2) {
        pathSegments = segments.slice(2);
      }
      break;

    case 'bitbucket.org':
      // No ref syntax recognized
      pathSegments = segments.slice(2);
      break;

    default:
      return null;
  }

  logger.debug('Parsed git URL', { input, host, owner, repo, ref, path: pathSegments.join('/') });

  return createDescriptor(input, host, owner, repo, ref, pathSegments.join('/'));
}

function isRefMarker(segment: string): boolean {
  return segment === 'tree' || segment === 'blob';
}

function stripGitSuffix(repo: string): string {
  return repo.endsWith('.git') ? repo.slice(0, -4) : repo;
}

/**
 * Build the clone URL for a provider repository.
 */
export function normalizeCloneUrl(host: string, owner: string, repo: string): string {
  return `https://${host}/${owner}/${stripGitSuffix(repo)}.git`;
}

function createDescriptor(
  input: string,
  host: string,
  owner: string,
  repo: string,
  ref: string | undefined,
  pathInRepo: string
): GitSourceDescriptor {
  const normalizedPath = pathInRepo.split('/').filter(s => s.length > 0 && s !== '.');
  if (normalizedPath.includes('..')) {
    throw new InvalidSourceError(input, `path in repository may not contain '..'`);
  }

  return Object.freeze({
    cloneUrl: normalizeCloneUrl(host, owner, repo),
    ref,
    pathInRepo: normalizedPath.join('/'),
    providerHost: host,
    owner
  });
}
