/**
 * Chat-completions client for an Azure OpenAI deployment, on the AI SDK's
 * Azure provider.
 *
 * One POST per call, no retries. Connection settings come in at
 * construction; nothing here reads the environment.
 */

import { createAzure } from "@ai-sdk/azure";
import {
  APICallError,
  generateText,
  type ImagePart,
  type ModelMessage,
  type TextPart,
} from "ai";
import {
  InferenceError,
  InferenceHttpError,
  ResponseShapeError,
  TransportError,
} from "../errors";
import type { PromptMessage } from "../pipeline/prompt";
import type { ConnectionSettings } from "../settings/connection";
import {
  chatCompletionBodySchema,
  type ExtractionRequest,
  type ExtractionResult,
  type GenerationParams,
} from "./types";

export interface CreateExtractionClientOptions {
  settings: ConnectionSettings;
  /** Swappable for tests; defaults to the global fetch */
  fetch?: typeof fetch;
  /** Abort after this many ms; unset means wait for the transport */
  timeoutMs?: number;
}

export interface ExtractionClient {
  readonly url: string;
  complete(request: ExtractionRequest): Promise<ExtractionResult>;
}

function baseUrl(settings: ConnectionSettings): string {
  return `${settings.endpoint.replace(/\/+$/, "")}/openai`;
}

/** The URL the Azure provider posts to for this deployment. */
export function chatCompletionsUrl(settings: ConnectionSettings): string {
  const url = new URL(`${baseUrl(settings)}/deployments/${settings.deploymentName}/chat/completions`);
  url.searchParams.set("api-version", settings.apiVersion);
  return url.toString();
}

/**
 * Split rendered prompt messages into the system text and AI SDK messages.
 */
export function buildExtractionRequest(
  prompt: PromptMessage[],
  generation: GenerationParams
): ExtractionRequest {
  const system = prompt.flatMap((m) => (m.role === "system" ? [m.content] : []));
  const messages = prompt.flatMap((m): ModelMessage[] => {
    switch (m.role) {
      case "system":
        return [];
      case "user":
        return [
          {
            role: "user",
            content: m.content.map((p): TextPart | ImagePart =>
              p.type === "text"
                ? { type: "text", text: p.text }
                : { type: "image", image: p.image, mediaType: p.mediaType }
            ),
          },
        ];
      case "assistant":
        return [
          {
            role: "assistant",
            content: m.content.flatMap((p): TextPart[] =>
              p.type === "text" ? [{ type: "text", text: p.text }] : []
            ),
          },
        ];
    }
  });

  return {
    system: system.length > 0 ? system.join("\n\n") : undefined,
    messages,
    generation,
  };
}

/**
 * Wrap fetch so that a failed request or an unreadable body surfaces as a
 * TransportError, and hand the provider a fully buffered response.
 */
function transportFetch(
  base: typeof fetch,
  url: string,
  onResponse: (response: Response) => void
): typeof fetch {
  return async (input, init) => {
    let response: Response;
    let body: string;
    try {
      response = await base(input, init);
      body = await response.text();
    } catch (err) {
      throw new TransportError(url, err);
    }
    onResponse(response);
    return new Response(body === "" ? null : body, {
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
    });
  };
}

function describeError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  return err.cause instanceof Error ? `${err.message}: ${err.cause.message}` : err.message;
}

function toInferenceError(err: unknown, url: string, response: Response | undefined): unknown {
  if (err instanceof InferenceError) return err;
  if (
    APICallError.isInstance(err) &&
    err.statusCode !== undefined &&
    (err.statusCode < 200 || err.statusCode >= 300)
  ) {
    return new InferenceHttpError({
      status: err.statusCode,
      statusText: response?.statusText ?? "",
      url: err.url,
      body: err.responseBody ?? "",
    });
  }
  // Anything failing after a response arrived is about that response.
  if (response) return new ResponseShapeError([describeError(err)], { cause: err });
  return err;
}

export function createExtractionClient(
  options: CreateExtractionClientOptions
): ExtractionClient {
  const { settings, timeoutMs } = options;
  const fetchImpl = options.fetch ?? fetch;
  const url = chatCompletionsUrl(settings);

  return {
    url,
    async complete(request) {
      const seen: { response?: Response } = {};
      const azure = createAzure({
        baseURL: baseUrl(settings),
        apiKey: settings.apiKey,
        apiVersion: settings.apiVersion,
        useDeploymentBasedUrls: true,
        fetch: transportFetch(fetchImpl, url, (r) => {
          seen.response = r;
        }),
      });

      const result = await generateText({
        model: azure.chat(settings.deploymentName),
        system: request.system,
        messages: request.messages,
        temperature: request.generation.temperature,
        topP: request.generation.topP,
        maxOutputTokens: request.generation.maxOutputTokens,
        maxRetries: 0,
        abortSignal: timeoutMs === undefined ? undefined : AbortSignal.timeout(timeoutMs),
      }).catch((err: unknown) => {
        throw toInferenceError(err, url, seen.response);
      });

      const parsed = chatCompletionBodySchema.safeParse(result.response.body);
      if (!parsed.success) {
        throw new ResponseShapeError(
          parsed.error.issues.map((i) => `${i.path.map(String).join(".") || "(root)"}: ${i.message}`)
        );
      }

      const [choice] = parsed.data.choices;
      const { inputTokens, outputTokens } = result.usage;
      return {
        content: choice.message.content,
        finishReason: choice.finish_reason ?? undefined,
        usage:
          inputTokens !== undefined && outputTokens !== undefined
            ? { inputTokens, outputTokens }
            : undefined,
        status: seen.response?.status ?? 200,
      };
    },
  };
}
