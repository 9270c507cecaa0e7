import OpenAI from 'openai';
import type { AppConfig } from '../config.js';
import type { Logger } from '../core/logger.js';
import type { CapabilityCallOptions, CapabilitySet, CompletionCapability, EmbeddingCapability } from './types.js';

export class OpenAiCompletionCapability implements CompletionCapability {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string
  ) {}

  async complete(prompt: string, maxTokens: number, options: CapabilityCallOptions = {}): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          {
            role: 'system',
            content: 'You are a careful research assistant analysing excerpts of scholarly papers. Answer only from the excerpt.'
          },
          { role: 'user', content: prompt }
        ],
        max_tokens: maxTokens,
        temperature: 0.2
      },
      { signal: options.signal }
    );

    return response.choices[0]?.message?.content ?? '';
  }
}

export class OpenAiEmbeddingCapability implements EmbeddingCapability {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string
  ) {}

  async embed(texts: string[], options: CapabilityCallOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await this.client.embeddings.create({ model: this.model, input: texts }, { signal: options.signal });

    return [...response.data].sort((left, right) => left.index - right.index).map((item) => item.embedding);
  }
}

export const createCapabilities = (config: AppConfig, logger: Logger): CapabilitySet => {
  if (config.analysisMode === 'heuristic') {
    logger.info('Analysis mode is heuristic; model-backed capabilities disabled');
    return {};
  }

  if (!config.openAiApiKey) {
    logger.info('No completion or embedding credentials configured; using heuristic strategies');
    return {};
  }

  const client = new OpenAI({
    apiKey: config.openAiApiKey,
    baseURL: config.openAiBaseUrl,
    timeout: config.capabilityTimeoutMs,
    maxRetries: 0
  });

  logger.info('Model-backed capabilities enabled', {
    completionModel: config.completionModel,
    embeddingModel: config.embeddingModel
  });

  return {
    completion: new OpenAiCompletionCapability(client, config.completionModel),
    embedding: new OpenAiEmbeddingCapability(client, config.embeddingModel)
  };
};
