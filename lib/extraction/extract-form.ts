import fs from "node:fs";
import { InferenceError, InferenceHttpError } from "../errors";
import type { ExtractionConfig } from "../config";
import { appendLogEntry, sanitizeMessages } from "../pipeline/llm-log";
import { renderPrompt } from "../pipeline/prompt";
import type { ConnectionSettings } from "../settings/connection";
import { buildExtractionRequest, createExtractionClient } from "./client";
import type { TokenUsage } from "./types";

export interface ExtractFormOptions {
  imagePath: string;
  settings: ConnectionSettings;
  extraction: ExtractionConfig;
  /** Pretty-printed example of the target JSON shape */
  schema: string;
  fetch?: typeof fetch;
  /** JSONL file that receives one entry per call */
  logPath?: string;
}

export type ExtractionOutcome =
  | { ok: true; content: string; usage?: TokenUsage }
  | { ok: false; error: InferenceError };

/**
 * Send the composite image to the deployment and return the first choice's
 * content. Inference failures come back as `{ ok: false }`; anything else
 * (unreadable image, missing prompt template) is thrown.
 */
export async function extractForm(options: ExtractFormOptions): Promise<ExtractionOutcome> {
  const { settings, extraction } = options;
  const imageBase64 = fs.readFileSync(options.imagePath).toString("base64");

  const promptMessages = await renderPrompt(extraction.prompt, {
    schema: options.schema,
    composite_image: imageBase64,
  });

  const request = buildExtractionRequest(promptMessages, {
    temperature: extraction.temperature,
    topP: extraction.top_p,
    maxOutputTokens: extraction.max_tokens,
  });

  const client = createExtractionClient({
    settings,
    fetch: options.fetch,
    timeoutMs: extraction.timeout_ms,
  });

  const t0 = Date.now();
  let outcome: ExtractionOutcome;
  let httpStatus: number | undefined;
  try {
    const result = await client.complete(request);
    httpStatus = result.status;
    outcome = { ok: true, content: result.content, usage: result.usage };
  } catch (err) {
    if (!(err instanceof InferenceError)) throw err;
    if (err instanceof InferenceHttpError) httpStatus = err.status;
    outcome = { ok: false, error: err };
  }

  if (options.logPath) {
    appendLogEntry(options.logPath, {
      timestamp: new Date().toISOString(),
      promptName: extraction.prompt,
      deploymentName: settings.deploymentName,
      modelId: settings.deploymentName,
      durationMs: Date.now() - t0,
      outcome: outcome.ok ? "success" : "failure",
      httpStatus,
      error: outcome.ok ? undefined : outcome.error.message,
      usage: outcome.ok ? outcome.usage : undefined,
      system: request.system,
      messages: sanitizeMessages(request.messages),
    });
  }

  return outcome;
}

export type OutcomeWriter = Pick<Console, "log" | "error">;

/**
 * Print the content verbatim on success. On failure print a one-line
 * summary plus what the server sent back.
 */
export function reportOutcome(outcome: ExtractionOutcome, out: OutcomeWriter = console): void {
  if (outcome.ok) {
    out.log(outcome.content);
    return;
  }

  const { error } = outcome;
  out.error(`Extraction failed: ${error.name}: ${error.message}`);
  if (error instanceof InferenceHttpError) {
    out.error({
      status: error.status,
      statusText: error.statusText,
      url: error.url,
      body: error.body,
    });
  }
}
