import OpenAI from 'openai';
import { createModuleLogger, logAIPrompt, logAIResponse } from '../../utils/logger';
import { CollaboratorResult, describeFailure, failWith, succeed } from '../../utils/errors';

const logger = createModuleLogger('llm-client');

export interface ChatTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatOptions {
  task?: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Black-box chat model: system prompt plus history in, text out
 */
export interface LLMClient {
  readonly model: string;
  chat(systemPrompt: string, history: ChatTurn[], options?: ChatOptions): Promise<CollaboratorResult<string>>;
}

export interface OpenAIChatClientConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
  timeoutSeconds: number;
  temperature: number;
  maxTokens: number;
}

export class OpenAIChatClient implements LLMClient {
  private client: OpenAI;
  private config: OpenAIChatClientConfig;

  constructor(config: OpenAIChatClientConfig) {
    this.config = config;
    this.client = new OpenAI({
      baseURL: config.baseUrl,
      apiKey: config.apiKey,
      timeout: config.timeoutSeconds * 1000,
      maxRetries: 0,
    });
  }

  get model(): string {
    return this.config.model;
  }

  async chat(
    systemPrompt: string,
    history: ChatTurn[],
    options: ChatOptions = {}
  ): Promise<CollaboratorResult<string>> {
    const task = options.task ?? 'chat';
    const start = Date.now();

    logAIPrompt(
      task,
      [systemPrompt, ...history.map((turn) => `[${turn.role}] ${turn.content}`)].join('\n\n')
    );

    try {
      const completion = await this.client.chat.completions.create({
        model: this.config.model,
        temperature: options.temperature ?? this.config.temperature,
        max_tokens: options.maxTokens ?? this.config.maxTokens,
        messages: [
          { role: 'system', content: systemPrompt },
          ...history.map(
            (turn): OpenAI.Chat.ChatCompletionMessageParam =>
              turn.role === 'user'
                ? { role: 'user', content: turn.content }
                : { role: 'assistant', content: turn.content }
          ),
        ],
      });

      const content = completion.choices[0]?.message?.content?.trim() ?? '';
      logAIResponse(task, { content, usage: completion.usage ?? null });

      logger.debug('Chat completion received', {
        task,
        model: this.config.model,
        durationMs: Date.now() - start,
        chars: content.length,
      });

      if (!content) {
        return failWith('llm', 'empty', 'Model returned an empty message');
      }

      return succeed(content);
    } catch (error) {
      const failure = describeFailure('llm', error);
      logger.warn('Chat completion failed', {
        task,
        model: this.config.model,
        durationMs: Date.now() - start,
        kind: failure.kind,
        error: failure.message,
      });
      return { ok: false, error: failure };
    }
  }
}
