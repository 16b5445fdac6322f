import { z } from 'zod';

// null is accepted and treated the same as a missing field
const optionalString = z
  .string()
  .nullish()
  .transform(value => value ?? undefined);

export const ChatRequestSchema = z.object({
  message: optionalString,
  fileData: optionalString,
  fileType: optionalString,
  fileName: optionalString
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

export interface ChatResponse {
  response: string;
}

export interface ErrorResponse {
  error: string;
}

export type ExtractedText = string | null;

export interface GeminiTextPart {
  text: string;
}

export interface GeminiInlineDataPart {
  inlineData: {
    mimeType: string;
    data: string;
  };
}

export type GeminiPart = GeminiTextPart | GeminiInlineDataPart;

export interface GeminiContent {
  role?: 'user' | 'model';
  parts: GeminiPart[];
}

export interface GeminiGenerateContentRequest {
  contents: GeminiContent[];
}

export const GeminiGenerateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string().optional() }).passthrough()).min(1)
        })
      })
    )
    .min(1)
});

export type GeminiGenerateContentResponse = z.infer<typeof GeminiGenerateContentResponseSchema>;

export interface AIGateway {
  generateText(prompt: string, model?: string): Promise<string>;
  analyzeImage(base64Image: string, mimeType: string): Promise<string>;
}
