import OpenAI from 'openai';
import { UpstreamError, errorMessage } from '../utils/errors.js';

/**
 * LLM transport used by every agent.
 * Agents only build prompts; the client owns the provider call.
 */
export interface LlmClient {
  /** Free-text (markdown) completion, returned verbatim. */
  generateText(systemPrompt: string, userPrompt: string): Promise<string>;
  /** Completion in JSON response mode; returns the raw text for the caller to parse. */
  generateJson(systemPrompt: string, userPrompt: string): Promise<string>;
}

export interface OpenAiLlmConfig {
  apiKey: string;
  model: string;
  temperature?: number;
}

export class OpenAiLlmClient implements LlmClient {
  private openai: OpenAI | null;
  private model: string;
  private temperature: number;

  constructor(config: OpenAiLlmConfig) {
    this.openai = config.apiKey ? new OpenAI({ apiKey: config.apiKey }) : null;
    this.model = config.model;
    this.temperature = config.temperature ?? 0.5;

    if (!this.openai) {
      console.warn('[OpenAiLlmClient] OPENAI_API_KEY not set. LLM calls will fail.');
    }
  }

  async generateText(systemPrompt: string, userPrompt: string): Promise<string> {
    return this.complete(systemPrompt, userPrompt, false);
  }

  async generateJson(systemPrompt: string, userPrompt: string): Promise<string> {
    return this.complete(systemPrompt, userPrompt, true);
  }

  private async complete(systemPrompt: string, userPrompt: string, json: boolean): Promise<string> {
    if (!this.openai) {
      throw new UpstreamError('OpenAI API key is not configured. Set OPENAI_API_KEY in your .env file.');
    }

    let content: string | null | undefined;
    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt }
        ],
        ...(json ? { response_format: { type: 'json_object' as const } } : {}),
        temperature: this.temperature
      });
      content = response.choices[0]?.message?.content;
    } catch (error) {
      console.error('[OpenAiLlmClient] Completion error:', errorMessage(error));
      throw new UpstreamError(`Language model request failed: ${errorMessage(error)}`);
    }

    if (!content) {
      throw new UpstreamError('No response from OpenAI');
    }
    return content;
  }
}

export function createOpenAiLlmClient(config: OpenAiLlmConfig): OpenAiLlmClient {
  return new OpenAiLlmClient(config);
}
