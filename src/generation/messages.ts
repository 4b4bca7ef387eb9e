export const DEFAULT_NO_INFORMATION_MESSAGE =
  "I couldn't find any relevant information in my knowledge base for your query. Please try rephrasing or provide more details.";

export const DEFAULT_DISCLAIMER = '(Note: This is a simplified response. A real LLM would synthesize and summarize.)';

export const CONTEXT_SEPARATOR = '\n\n';
