import { GeminiConfig } from '../config';
import { IMAGE_ANALYSIS_INSTRUCTIONS } from '../agents/prompts';
import {
  AIGateway,
  GeminiGenerateContentRequest,
  GeminiGenerateContentResponseSchema,
  GeminiPart
} from '../types';

/** Fetch rejected, timed out, or the service answered with a non-2xx status. */
export class GeminiTransportError extends Error {
  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GeminiTransportError';
  }
}

/** The service answered 2xx but the body is not the expected candidates shape. */
export class GeminiResponseFormatError extends Error {
  constructor(message: string, readonly body: unknown) {
    super(message);
    this.name = 'GeminiResponseFormatError';
  }
}

interface FallbackMessages {
  transport: string;
  malformed: string;
  internal: string;
}

export const TEXT_FALLBACKS: FallbackMessages = {
  transport: "Sorry, I couldn't connect to the AI service. Please try again later.",
  malformed: 'Sorry, I received an unexpected response from the AI. Please try again.',
  internal: 'An internal error occurred. Please try again.'
};

export const VISION_FALLBACKS: FallbackMessages = {
  transport: "Sorry, I couldn't process the image with the AI service. Please try again later.",
  malformed: 'Sorry, I received an unexpected response from the AI Vision service. Please try again.',
  internal: 'An internal error occurred during image analysis. Please try again.'
};

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export class GeminiClient implements AIGateway {
  private config: GeminiConfig;
  private fetchImpl: FetchLike;

  constructor(config: GeminiConfig, fetchImpl: FetchLike = (url, init) => fetch(url, init)) {
    this.config = config;
    this.fetchImpl = fetchImpl;
  }

  async generateText(prompt: string, model: string = this.config.textModel): Promise<string> {
    const payload: GeminiGenerateContentRequest = {
      contents: [{ role: 'user', parts: [{ text: prompt }] }]
    };

    console.log(`🤖 Calling Gemini API with model: ${model}, prompt length: ${prompt.length}`);
    return this.generateWithFallbacks(model, payload, TEXT_FALLBACKS);
  }

  async analyzeImage(base64Image: string, mimeType: string): Promise<string> {
    const parts: GeminiPart[] = IMAGE_ANALYSIS_INSTRUCTIONS.map(text => ({ text }));
    parts.push({ inlineData: { mimeType, data: base64Image } });
    const payload: GeminiGenerateContentRequest = { contents: [{ parts }] };

    console.log(`🖼️  Calling Gemini Vision API for image (type: ${mimeType}, size: ${base64Image.length} bytes)`);
    return this.generateWithFallbacks(this.config.visionModel, payload, VISION_FALLBACKS);
  }

  private async generateWithFallbacks(
    model: string,
    payload: GeminiGenerateContentRequest,
    fallbacks: FallbackMessages
  ): Promise<string> {
    try {
      const answer = await this.generateContent(model, payload);
      console.log(`✅ Gemini call successful (model: ${model})`);
      return answer;
    } catch (error) {
      if (error instanceof GeminiTransportError) {
        console.error(`❌ Error calling Gemini API (model: ${model}):`, error);
        return fallbacks.transport;
      }
      if (error instanceof GeminiResponseFormatError) {
        console.error('❌ Unexpected Gemini API response structure:', JSON.stringify(error.body, null, 2));
        return fallbacks.malformed;
      }
      console.error('🚨 Unexpected error during Gemini API call:', error);
      return fallbacks.internal;
    }
  }

  private async generateContent(model: string, payload: GeminiGenerateContentRequest): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.buildUrl(model), {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: this.config.timeoutMs ? AbortSignal.timeout(this.config.timeoutMs) : undefined
      });
    } catch (error) {
      throw new GeminiTransportError('Request to Gemini API failed', undefined, { cause: error });
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      throw new GeminiTransportError(`Gemini API Error ${response.status}: ${errorText || response.statusText}`, response.status);
    }

    const rawBody = await response.text();
    let body: unknown;
    try {
      body = JSON.parse(rawBody);
    } catch {
      throw new GeminiResponseFormatError('Gemini API returned a non-JSON body', rawBody);
    }

    const parsed = GeminiGenerateContentResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new GeminiResponseFormatError('Gemini API response has no candidate parts', body);
    }

    const text = parsed.data.candidates[0].content.parts[0].text;
    if (typeof text !== 'string') {
      throw new Error('First candidate part carries no text');
    }
    return text;
  }

  private buildUrl(model: string): string {
    return `${this.config.baseUrl}/v1beta/models/${model}:generateContent?key=${encodeURIComponent(this.config.apiKey)}`;
  }
}
