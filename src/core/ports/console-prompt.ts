/**
 * Non-Interactive Prompt Adapter (Default/CI)
 *
 * PromptPort implementation that throws on any prompt attempt.
 */

import type { PromptPort, PromptChoice } from './prompt.js';

export class NonInteractivePromptError extends Error {
  constructor(promptType: string) {
    super(`Cannot prompt for ${promptType} in non-interactive mode.`);
    this.name = 'NonInteractivePromptError';
  }
}

export const nonInteractivePrompt: PromptPort = {
  async select<T>(_message: string, _choices: Array<PromptChoice<T>>, _hint?: string): Promise<T> {
    throw new NonInteractivePromptError('selection');
  }
};
