/**
 * Port Resolution Helpers
 *
 * Resolve OutputPort and PromptPort from a command context, falling back to
 * safe defaults when ports are not explicitly provided.
 */

import type { OutputPort } from './output.js';
import type { PromptPort } from './prompt.js';
import { consoleOutput } from './console-output.js';
import { nonInteractivePrompt } from './console-prompt.js';

export function resolveOutput(ctx?: { output?: OutputPort }): OutputPort {
  return ctx?.output ?? consoleOutput;
}

export function resolvePrompt(ctx?: { prompt?: PromptPort }): PromptPort {
  return ctx?.prompt ?? nonInteractivePrompt;
}
