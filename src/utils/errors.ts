import { TypmError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for the failure kinds a typm command can abort with
 */

export class InvalidSourceError extends TypmError {
  constructor(source: string, reason?: string) {
    super(
      `Invalid git source '${source}'${reason ? `: ${reason}` : ''}\n\n` +
      `Expected an alias (gh/owner/repo[/path]) or a URL such as:\n` +
      `  https://github.com/owner/repo/tree/<ref>/path\n` +
      `  https://gitlab.com/owner/repo/-/tree/<ref>/path\n` +
      `  https://bitbucket.org/owner/repo`,
      ErrorCodes.INVALID_SOURCE,
      { source }
    );
    this.name = 'InvalidSourceError';
  }
}

export class InvalidVersionError extends TypmError {
  constructor(version: string) {
    super(`Invalid semantic version: '${version}'`, ErrorCodes.INVALID_VERSION, { version });
    this.name = 'InvalidVersionError';
  }
}

export class InvalidManifestError extends TypmError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Invalid manifest: ${reason}`, ErrorCodes.INVALID_MANIFEST, details);
    this.name = 'InvalidManifestError';
  }
}

export class ConstraintUnsatisfiedError extends TypmError {
  constructor(requirement: string, current: string) {
    super(
      `Package requires Typst version '${requirement}', but you have ${current}. Please update Typst.`,
      ErrorCodes.CONSTRAINT_UNSATISFIED,
      { requirement, current }
    );
    this.name = 'ConstraintUnsatisfiedError';
  }
}

export class ExternalToolError extends TypmError {
  constructor(tool: string, message: string, details?: Record<string, unknown>) {
    super(`${tool}: ${message}`, ErrorCodes.EXTERNAL_TOOL_FAILURE, { tool, ...details });
    this.name = 'ExternalToolError';
  }
}

export class ManifestNotFoundError extends TypmError {
  constructor(location: string) {
    super(`No typst.toml found in ${location}`, ErrorCodes.MANIFEST_NOT_FOUND, { location });
    this.name = 'ManifestNotFoundError';
  }
}

export class ManifestAmbiguousError extends TypmError {
  constructor(candidates: string[], reason: string) {
    super(
      `Multiple typst.toml files found (${reason}):\n` +
      candidates.map((candidate, i) => `  ${i + 1}: ${candidate}`).join('\n'),
      ErrorCodes.MANIFEST_AMBIGUOUS,
      { candidates }
    );
    this.name = 'ManifestAmbiguousError';
  }
}

export class FileSystemError extends TypmError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof TypmError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      // Cancellation is not a failure
      if (error instanceof UserCancellationError) {
        process.exit(0);
      }

      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
