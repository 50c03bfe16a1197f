export { OpenAIChatClient } from './client';
export { createAssistedExtraction, parseAssistedUpdate } from './extraction';
export * from './prompts';
export type { LLMClient, ChatTurn, ChatOptions, OpenAIChatClientConfig } from './client';
