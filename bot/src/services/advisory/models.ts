import { GoogleGenAI } from '@google/genai';
import axios, { type AxiosInstance } from 'axios';
import type { ModelProvider, ModelSelector } from '../../config/env';
import { TransientServiceError, type Stage } from '../../core/errors';
import { isRecord, readRecords, readString } from '../../utils/json';
import type { AdvisoryModel, CompletionRequest } from './types';

export class GeminiModel implements AdvisoryModel {
  private readonly ai: GoogleGenAI;

  constructor(
    apiKey: string,
    private readonly model: string,
    private readonly stage: Stage
  ) {
    this.ai = new GoogleGenAI({ apiKey });
  }

  get name() {
    return `gemini:${this.model}`;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.ai.models.generateContent({
      model: this.model,
      contents: request.prompt,
      config: {
        temperature: request.temperature,
        systemInstruction: request.system,
      },
    });
    const text = response.text?.trim();
    if (!text) throw new TransientServiceError(`${this.name} returned an empty response`, this.stage);
    return text;
  }
}

const CHAT_ENDPOINTS: Record<Exclude<ModelProvider, 'gemini'>, string> = {
  xai: 'https://api.x.ai/v1',
  deepseek: 'https://api.deepseek.com',
};

/** OpenAI-compatible `/chat/completions` backends (xAI, DeepSeek). */
export class ChatCompletionsModel implements AdvisoryModel {
  private readonly http: AxiosInstance;

  constructor(
    private readonly provider: Exclude<ModelProvider, 'gemini'>,
    apiKey: string,
    private readonly model: string,
    private readonly stage: Stage,
    timeoutMs: number
  ) {
    this.http = axios.create({
      baseURL: CHAT_ENDPOINTS[provider],
      timeout: timeoutMs,
      headers: { Authorization: `Bearer ${apiKey}`, 'Content-Type': 'application/json' },
    });
  }

  get name() {
    return `${this.provider}:${this.model}`;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const messages = [
      ...(request.system ? [{ role: 'system', content: request.system }] : []),
      { role: 'user', content: request.prompt },
    ];
    const res = await this.http.post<unknown>('/chat/completions', {
      model: this.model,
      messages,
      temperature: request.temperature,
    });

    const choice = isRecord(res.data) ? readRecords(res.data.choices)[0] : undefined;
    const message = choice && isRecord(choice.message) ? choice.message : undefined;
    const text = message ? readString(message, 'content').trim() : '';
    if (!text) throw new TransientServiceError(`${this.name} returned an empty response`, this.stage);
    return text;
  }
}

export function createModel(
  selector: ModelSelector,
  apiKeys: Readonly<Record<ModelProvider, string>>,
  stage: Stage,
  timeoutMs: number
): AdvisoryModel {
  if (selector.provider === 'gemini') return new GeminiModel(apiKeys.gemini, selector.model, stage);
  return new ChatCompletionsModel(selector.provider, apiKeys[selector.provider], selector.model, stage, timeoutMs);
}
