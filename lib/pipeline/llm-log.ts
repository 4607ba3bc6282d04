import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { ImagePart, ModelMessage } from "ai";

export interface LlmLogTokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface LlmLogEntry {
  timestamp: string;
  promptName: string;
  deploymentName: string;
  modelId: string;
  durationMs: number;
  outcome: "success" | "failure";
  httpStatus?: number;
  error?: string;
  usage?: LlmLogTokenUsage;
  system?: string;
  messages: LlmLogMessage[];
}

export type LlmLogMessage = {
  role: string;
  content: (LlmLogTextPart | LlmLogImagePlaceholder)[];
};

type LlmLogTextPart = { type: "text"; text: string };
export type LlmLogImagePlaceholder = {
  type: "image";
  mediaType: string;
  hash: string;
  byteLength: number;
};

/**
 * Strip base64 image data from AI SDK messages, replacing it with a
 * placeholder that records the media type, hash and decoded byte length.
 */
export function sanitizeMessages(messages: ModelMessage[]): LlmLogMessage[] {
  return messages.map((m) => {
    if (typeof m.content === "string") {
      return { role: m.role, content: [{ type: "text" as const, text: m.content }] };
    }
    const parts: LlmLogMessage["content"] = [];
    for (const part of m.content) {
      if (part.type === "text") {
        parts.push({ type: "text", text: part.text });
      } else if (part.type === "image") {
        const data = imageData(part.image);
        parts.push({
          type: "image",
          mediaType: part.mediaType ?? "unknown",
          hash: hashBase64(data),
          byteLength: Math.round((data.length * 3) / 4),
        });
      } else {
        parts.push({ type: "text", text: JSON.stringify(part) });
      }
    }
    return { role: m.role, content: parts };
  });
}

function imageData(image: ImagePart["image"]): string {
  if (typeof image === "string") return image;
  if (image instanceof URL) return image.toString();
  if (image instanceof Uint8Array) return Buffer.from(image).toString("base64");
  return Buffer.from(image).toString("base64");
}

/**
 * Compute the same hash used in log entries for a base64 image string.
 */
export function hashBase64(base64: string): string {
  return createHash("sha256").update(base64).digest("hex").slice(0, 16);
}

const MAX_LOG_ENTRIES = 250;

/**
 * Append a log entry to the JSONL log file, keeping at most
 * MAX_LOG_ENTRIES entries (oldest are dropped).
 */
export function appendLogEntry(filePath: string, entry: LlmLogEntry): void {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
  fs.appendFileSync(filePath, JSON.stringify(entry) + "\n");

  // Trim if over limit
  const content = fs.readFileSync(filePath, "utf-8");
  const lines = content.split("\n").filter(Boolean);
  if (lines.length > MAX_LOG_ENTRIES) {
    fs.writeFileSync(filePath, lines.slice(lines.length - MAX_LOG_ENTRIES).join("\n") + "\n");
  }
}
