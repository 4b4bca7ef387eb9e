import { CONTEXT_SEPARATOR } from './messages.js';

export const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful laboratory assistant. Use the following context to answer the user\'s question. ' +
  "If the information is not in the context, state that you don't have enough information.";

export interface GroundedPrompt {
  system: string;
  prompt: string;
}

export function buildGroundedPrompt(query: string, contexts: readonly string[], system = DEFAULT_SYSTEM_PROMPT): GroundedPrompt {
  const prompt = [`User Question: ${query}`, `Context:\n${contexts.join(CONTEXT_SEPARATOR)}`, 'Answer:'].join(CONTEXT_SEPARATOR);
  return { system, prompt };
}
