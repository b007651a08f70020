import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../../config/logger';
import { ConfigurationError, ExternalServiceError, errorMessage } from '../../utils/errors';
import { DraftGenerator, buildTweetPrompt, buildVariationsPrompt, parseNumberedList } from './DraftGenerator';

export interface AnthropicDraftOptions {
  apiKey: string;
  model: string;
  style: string;
}

export class AnthropicDraftGenerator implements DraftGenerator {
  name = 'Anthropic';
  private client: Anthropic | null = null;

  constructor(private readonly options: AnthropicDraftOptions) {}

  isConfigured(): boolean {
    return !!this.options.apiKey && this.options.apiKey.length > 10;
  }

  async generate(topic: string): Promise<string> {
    const text = await this.complete(buildTweetPrompt(topic, this.options.style), 200);
    return text.trim();
  }

  async generateVariations(topic: string, count: number = 3): Promise<string[]> {
    const text = await this.complete(buildVariationsPrompt(topic, count), 500);
    return parseNumberedList(text.trim());
  }

  private getClient(): Anthropic {
    if (!this.isConfigured()) {
      throw new ConfigurationError('ANTHROPIC_API_KEY not configured');
    }
    if (!this.client) {
      this.client = new Anthropic({ apiKey: this.options.apiKey });
    }
    return this.client;
  }

  private async complete(prompt: string, maxTokens: number): Promise<string> {
    const client = this.getClient();

    try {
      const message = await client.messages.create({
        model: this.options.model,
        max_tokens: maxTokens,
        messages: [{ role: 'user', content: prompt }],
      });

      for (const block of message.content) {
        if (block.type === 'text') {
          return block.text;
        }
      }
      throw new ExternalServiceError('Anthropic', 'response contained no text block');
    } catch (error) {
      if (error instanceof ExternalServiceError) {
        throw error;
      }
      logger.error(`❌ Anthropic generation failed: ${errorMessage(error)}`);
      const status = error instanceof Anthropic.APIError ? error.status : undefined;
      throw new ExternalServiceError('Anthropic', `generation failed: ${errorMessage(error)}`, status);
    }
  }
}
