import type { ModelMessage } from "ai";
import { z } from "zod/v4";

export interface GenerationParams {
  temperature: number;
  topP: number;
  maxOutputTokens: number;
}

export interface ExtractionRequest {
  system?: string;
  messages: ModelMessage[];
  generation: GenerationParams;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ExtractionResult {
  content: string;
  finishReason?: string;
  usage?: TokenUsage;
  status: number;
}

/**
 * The part of the raw chat-completions body the extractor relies on.
 * Checked after the provider has parsed it.
 */
export const chatCompletionBodySchema = z.object({
  choices: z
    .array(
      z.object({
        finish_reason: z.string().nullish(),
        message: z.object({
          content: z.string(),
        }),
      })
    )
    .min(1),
});
