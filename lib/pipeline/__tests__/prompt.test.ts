import { describe, it, expect } from "vitest";
import { promptsDirFor, renderPrompt } from "../prompt";

const SCHEMA = '{\n  "name": ""\n}';

describe("renderPrompt", () => {
  it("renders the form_extraction template", async () => {
    const messages = await renderPrompt("form_extraction", {
      schema: SCHEMA,
      composite_image: "abc123",
    });
    expect(messages.map((m) => m.role)).toEqual(["system", "user"]);
  });

  it("system content is a trimmed string", async () => {
    const messages = await renderPrompt("form_extraction", {
      schema: SCHEMA,
      composite_image: "abc123",
    });
    expect(messages[0].content).toBe(
      "You are an AI assistant that extracts data from scanned forms and returns it as a structured JSON object.\n" +
        "Only return the JSON object. Do not wrap it in a Markdown code block."
    );
  });

  it("embeds the schema as text followed by the image", async () => {
    const messages = await renderPrompt("form_extraction", {
      schema: SCHEMA,
      composite_image: "abc123",
    });
    const user = messages[1];
    if (user.role === "system") throw new Error("expected a user message");

    expect(user.content).toHaveLength(2);
    const [text, image] = user.content;
    expect(text.type).toBe("text");
    if (text.type !== "text") return;
    expect(text.text.startsWith("Extract the data from this form.")).toBe(true);
    expect(text.text.endsWith(`Use the following structure:\n\n${SCHEMA}`)).toBe(true);

    expect(image).toEqual({ type: "image", image: "abc123", mediaType: "image/jpeg" });
  });

  it("does not escape quotes in the schema", async () => {
    const messages = await renderPrompt("form_extraction", {
      schema: '{"a": "<b>"}',
      composite_image: "x",
    });
    const user = messages[1];
    if (user.role === "system") throw new Error("expected a user message");
    const text = user.content.find((p) => p.type === "text");
    expect(text?.type === "text" && text.text.includes('{"a": "<b>"}')).toBe(true);
  });
});

describe("promptsDirFor", () => {
  it("decodes escaped characters in the module path", () => {
    expect(promptsDirFor("file:///srv/my%20forms/lib/pipeline/prompt.ts")).toBe(
      "/srv/my forms/prompts"
    );
  });
});
