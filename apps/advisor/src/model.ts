import Anthropic from '@anthropic-ai/sdk';
import { GenerationError } from './errors.js';

export interface GenerateRequest {
  system: string;
  prompt: string;
}

/**
 * Port for the language model behind the advisory stages.
 */
export interface TextGenerator {
  generate(request: GenerateRequest): Promise<string>;
}

interface ContentBlockLike {
  type: string;
  text?: string;
}

/**
 * The slice of the Anthropic Messages API the generator calls.
 */
export interface MessagesClient {
  create(params: Anthropic.Messages.MessageCreateParamsNonStreaming): Promise<{
    content: ReadonlyArray<ContentBlockLike>;
  }>;
}

export interface AnthropicGeneratorOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
  messages?: MessagesClient;
}

export function extractText(content: ReadonlyArray<ContentBlockLike>): string {
  const parts: string[] = [];

  for (const block of content) {
    if (block.type === 'text' && block.text) {
      parts.push(block.text);
    }
  }

  return parts.join('\n').trim();
}

function createMessagesClient(apiKey: string): MessagesClient {
  const client = new Anthropic({ apiKey });
  return {
    create: (params) => client.messages.create(params),
  };
}

export function createAnthropicGenerator(options: AnthropicGeneratorOptions): TextGenerator {
  const messages = options.messages ?? createMessagesClient(options.apiKey);

  return {
    async generate({ system, prompt }) {
      const response = await messages.create({
        model: options.model,
        max_tokens: options.maxTokens,
        system,
        messages: [{ role: 'user', content: prompt }],
      });

      const text = extractText(response.content);
      if (!text) {
        throw new GenerationError(`Model ${options.model} returned no text content`);
      }

      return text;
    },
  };
}
