/**
 * Clack Prompt Adapter
 *
 * CLI-specific PromptPort implementation that routes to @clack/prompts
 * for interactive terminal prompts.
 */

import * as clack from '@clack/prompts';
import type { PromptPort, PromptChoice } from '../core/ports/prompt.js';
import { nonInteractivePrompt } from '../core/ports/console-prompt.js';
import { UserCancellationError } from '../utils/errors.js';

/**
 * Create a Clack-based PromptPort for interactive terminal sessions.
 */
export function createClackPrompt(): PromptPort {
  return {
    async select<T>(
      message: string,
      choices: Array<PromptChoice<T>>,
      hint?: string
    ): Promise<T> {
      // Select over indices so the option shape does not depend on T
      const result = await clack.select<string>({
        message: hint ? `${message} ${hint}` : message,
        options: choices.map((c, i) => ({
          label: c.title,
          value: String(i),
          ...(c.description ? { hint: c.description } : {}),
        })),
      });
      if (clack.isCancel(result)) {
        clack.cancel('Operation cancelled.');
        throw new UserCancellationError('Operation cancelled by user');
      }
      return choices[Number(result)].value;
    }
  };
}

/**
 * Interactive prompts only when stdin is a terminal.
 */
export function createCliPrompt(): PromptPort {
  return process.stdin.isTTY ? createClackPrompt() : nonInteractivePrompt;
}
