import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import type { ExtractionConfig } from "@/lib/config";
import { InferenceHttpError, TransportError } from "@/lib/errors";
import { hashBase64, type LlmLogEntry } from "@/lib/pipeline/llm-log";
import type { ConnectionSettings } from "@/lib/settings/connection";
import { extractForm, reportOutcome } from "../extract-form";

const SETTINGS: ConnectionSettings = {
  endpoint: "https://forms-test.openai.azure.com",
  apiKey: "test-secret",
  deploymentName: "gpt-4o",
  apiVersion: "2024-02-15-preview",
};

const EXTRACTION: ExtractionConfig = {
  prompt: "form_extraction",
  schema_path: "unused.json",
  temperature: 0,
  top_p: 0,
  max_tokens: 4096,
};

const SCHEMA = '{\n  "form_title": ""\n}';
const IMAGE_BASE64 = "ZmFrZS1qcGVnLWJ5dGVz";

function okResponse(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ index: 0, message: { role: "assistant", content } }] }), {
    status: 200,
    headers: { "Content-Type": "application/json" },
  });
}

interface SentPart {
  type: string;
  text?: string;
  image_url?: { url: string };
}

interface SentBody {
  model: string;
  temperature: number;
  top_p: number;
  max_tokens: number;
  messages: { role: string; content: string | SentPart[] }[];
}

function sentBody(fetchMock: Mock<typeof fetch>): SentBody {
  const init = fetchMock.mock.calls[0][1];
  return JSON.parse(String(init?.body));
}

describe("extractForm", () => {
  let tmpDir: string;
  let imagePath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "extract-form-test-"));
    imagePath = path.join(tmpDir, "form.composite.jpg");
    fs.writeFileSync(imagePath, Buffer.from("fake-jpeg-bytes"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("returns the model's content on success", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => okResponse('{"form_title": "W-4"}'));

    const outcome = await extractForm({
      imagePath,
      settings: SETTINGS,
      extraction: EXTRACTION,
      schema: SCHEMA,
      fetch: fetchMock,
    });

    expect(outcome).toEqual({ ok: true, content: '{"form_title": "W-4"}', usage: undefined });
  });

  it("sends the schema text and the image as a JPEG data URI", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => okResponse("X"));

    await extractForm({
      imagePath,
      settings: SETTINGS,
      extraction: EXTRACTION,
      schema: SCHEMA,
      fetch: fetchMock,
    });

    const body = sentBody(fetchMock);
    expect(body.model).toBe("gpt-4o");
    expect(body.temperature).toBe(0);
    expect(body.top_p).toBe(0);
    expect(body.max_tokens).toBe(4096);
    expect(body.messages.map((m) => m.role)).toEqual(["system", "user"]);

    const user = body.messages[1];
    if (typeof user.content === "string") throw new Error("expected content parts");

    const [text, image] = user.content;
    expect(text.type).toBe("text");
    expect(text.text?.endsWith(`Use the following structure:\n\n${SCHEMA}`)).toBe(true);
    expect(image).toEqual({
      type: "image_url",
      image_url: { url: `data:image/jpeg;base64,${IMAGE_BASE64}` },
    });
  });

  it("returns an HTTP failure as an outcome", async () => {
    const fetchMock = vi.fn<typeof fetch>(
      async () => new Response("slow down", { status: 429, statusText: "Too Many Requests" })
    );

    const outcome = await extractForm({
      imagePath,
      settings: SETTINGS,
      extraction: EXTRACTION,
      schema: SCHEMA,
      fetch: fetchMock,
    });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(InferenceHttpError);
    expect(outcome.error.message).toBe("Inference request failed (429 Too Many Requests)");
  });

  it("returns a body that breaks off mid-read as a transport failure", async () => {
    const fetchMock = vi.fn<typeof fetch>(
      async () =>
        new Response(
          new ReadableStream<Uint8Array>({
            start(controller) {
              controller.error(new Error("socket hang up"));
            },
          }),
          { status: 500, statusText: "Internal Server Error" }
        )
    );

    const outcome = await extractForm({
      imagePath,
      settings: SETTINGS,
      extraction: EXTRACTION,
      schema: SCHEMA,
      fetch: fetchMock,
    });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(TransportError);
  });

  it("rejects when the image cannot be read", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => okResponse("X"));

    await expect(
      extractForm({
        imagePath: path.join(tmpDir, "missing.jpg"),
        settings: SETTINGS,
        extraction: EXTRACTION,
        schema: SCHEMA,
        fetch: fetchMock,
      })
    ).rejects.toThrow(/ENOENT/);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("appends a log entry without the image data", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => okResponse("X"));
    const logPath = path.join(tmpDir, "logs", "llm-log.jsonl");

    await extractForm({
      imagePath,
      settings: SETTINGS,
      extraction: EXTRACTION,
      schema: SCHEMA,
      fetch: fetchMock,
      logPath,
    });

    const lines = fs.readFileSync(logPath, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(1);
    const entry: LlmLogEntry = JSON.parse(lines[0]);
    expect(entry.promptName).toBe("form_extraction");
    expect(entry.deploymentName).toBe("gpt-4o");
    expect(entry.modelId).toBe("gpt-4o");
    expect(entry.outcome).toBe("success");
    expect(entry.httpStatus).toBe(200);
    expect(entry.system).toBe(
      "You are an AI assistant that extracts data from scanned forms and returns it as a structured JSON object.\n" +
        "Only return the JSON object. Do not wrap it in a Markdown code block."
    );
    expect(entry.messages).toHaveLength(1);
    expect(entry.messages[0].content[1]).toEqual({
      type: "image",
      mediaType: "image/jpeg",
      hash: hashBase64(IMAGE_BASE64),
      byteLength: 15,
    });
  });

  it("logs failures with the HTTP status", async () => {
    const fetchMock = vi.fn<typeof fetch>(
      async () => new Response("boom", { status: 500, statusText: "Internal Server Error" })
    );
    const logPath = path.join(tmpDir, "llm-log.jsonl");

    await extractForm({
      imagePath,
      settings: SETTINGS,
      extraction: EXTRACTION,
      schema: SCHEMA,
      fetch: fetchMock,
      logPath,
    });

    const entry: LlmLogEntry = JSON.parse(fs.readFileSync(logPath, "utf-8").trim());
    expect(entry.outcome).toBe("failure");
    expect(entry.httpStatus).toBe(500);
    expect(entry.error).toBe("Inference request failed (500 Internal Server Error)");
  });
});

describe("reportOutcome", () => {
  it("prints the content verbatim on success", () => {
    const out = { log: vi.fn(), error: vi.fn() };

    reportOutcome({ ok: true, content: '{"a": 1}' }, out);

    expect(out.log).toHaveBeenCalledTimes(1);
    expect(out.log).toHaveBeenCalledWith('{"a": 1}');
    expect(out.error).not.toHaveBeenCalled();
  });

  it("prints a failure line and the server's reply on HTTP errors", () => {
    const out = { log: vi.fn(), error: vi.fn() };
    const error = new InferenceHttpError({
      status: 429,
      statusText: "Too Many Requests",
      url: "https://forms-test.openai.azure.com/x",
      body: "slow down",
    });

    reportOutcome({ ok: false, error }, out);

    expect(out.log).not.toHaveBeenCalled();
    expect(out.error).toHaveBeenNthCalledWith(
      1,
      "Extraction failed: InferenceHttpError: Inference request failed (429 Too Many Requests)"
    );
    expect(out.error).toHaveBeenNthCalledWith(2, {
      status: 429,
      statusText: "Too Many Requests",
      url: "https://forms-test.openai.azure.com/x",
      body: "slow down",
    });
  });
});
