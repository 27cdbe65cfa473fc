import type { ConstraintOperator, VersionConstraint, VersionTriple } from '../../types/index.js';
import { InvalidVersionError } from '../errors.js';

/**
 * Operators in longest-match-first order, so ">=" is never read as ">".
 */
const OPERATORS: readonly ConstraintOperator[] = ['>=', '<=', '==', '!=', '>', '<', '='];

const VERSION_PREFIX = /^\s*(\d+)\.(\d+)\.(\d+)/;

/**
 * Parse the leading `<int>.<int>.<int>` of a version string.
 * Pre-release, build metadata and trailing text are ignored.
 */
export function parseVersion(input: string): VersionTriple {
  const match = VERSION_PREFIX.exec(input);
  if (!match) {
    throw new InvalidVersionError(input);
  }
  return {
    major: Number.parseInt(match[1], 10),
    minor: Number.parseInt(match[2], 10),
    patch: Number.parseInt(match[3], 10)
  };
}

export function formatVersion(version: VersionTriple): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

function compareNumbers(a: number, b: number): -1 | 0 | 1 {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Compare two triples lexicographically. Components of any size are accepted.
 */
export function compareVersions(a: VersionTriple, b: VersionTriple): -1 | 0 | 1 {
  return compareNumbers(a.major, b.major) || compareNumbers(a.minor, b.minor) || compareNumbers(a.patch, b.patch);
}

function findOperatorPrefix(token: string): ConstraintOperator | undefined {
  return OPERATORS.find(op => token.startsWith(op));
}

/**
 * Extract the (operator, operand) pairs of a requirement expression.
 *
 * Every token is checked for an operator prefix; the rest of the token is the
 * operand. A free-standing operator (`>= 0.12.0`) therefore has an empty operand
 * and fails the check. Tokens without an operator prefix are skipped.
 */
export function parseConstraints(requirement: string): VersionConstraint[] {
  const constraints: VersionConstraint[] = [];

  for (const token of requirement.split(/\s+/)) {
    const operator = findOperatorPrefix(token);
    if (operator) {
      constraints.push({ operator, operand: token.slice(operator.length) });
    }
  }

  return constraints;
}

function satisfies(operator: ConstraintOperator, comparison: number): boolean {
  switch (operator) {
    case '>':
      return comparison > 0;
    case '<':
      return comparison < 0;
    case '>=':
      return comparison >= 0;
    case '<=':
      return comparison <= 0;
    case '==':
    case '=':
      return comparison === 0;
    case '!=':
      return comparison !== 0;
  }
}

/**
 * Evaluate an AND-combined requirement (e.g. ">=0.12.0 <0.13.0") against a version.
 *
 * Unrecognized tokens are ignored, so an empty or noise-only requirement matches
 * every version. An operand that is not a version makes the whole check fail.
 */
export function matchesRequirement(requirement: string, version: VersionTriple): boolean {
  for (const constraint of parseConstraints(requirement)) {
    let operand: VersionTriple;
    try {
      operand = parseVersion(constraint.operand);
    } catch (error) {
      if (error instanceof InvalidVersionError) {
        return false;
      }
      throw error;
    }

    if (!satisfies(constraint.operator, compareVersions(version, operand))) {
      return false;
    }
  }
  return true;
}
