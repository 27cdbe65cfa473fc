/**
 * Prompt Port Interface
 *
 * Defines the contract for interactive user prompts. Core logic never prompts
 * directly; it hands choices to this port.
 *
 * Implementations:
 *   - ClackPromptAdapter (CLI): routes to @clack/prompts
 *   - NonInteractivePromptAdapter (CI/default): throws on prompt attempts
 */

/**
 * A single choice option for select prompts.
 */
export interface PromptChoice<T = string> {
  title: string;
  value: T;
  description?: string;
}

export interface PromptPort {
  /** Prompt user to select one item from a list */
  select<T>(
    message: string,
    choices: Array<PromptChoice<T>>,
    hint?: string
  ): Promise<T>;
}
