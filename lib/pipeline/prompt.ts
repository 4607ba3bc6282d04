/**
 * Liquid prompt templates rendered into chat messages.
 *
 * Templates mark messages with {% chat role: "..." %} ... {% endchat %} and
 * inline images with {% image expr media_type: "..." %}. Both tags write
 * control-character markers into the rendered text; parseMessages turns the
 * marked text back into PromptMessage[].
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  Liquid,
  Tag,
  type Context,
  type Emitter,
  type TagToken,
  type Template,
  type TopLevelToken,
} from "liquidjs";

export interface PromptTextPart {
  type: "text";
  text: string;
}

export interface PromptImagePart {
  type: "image";
  /** base64, without a data: prefix */
  image: string;
  mediaType: string;
}

export type PromptContentPart = PromptTextPart | PromptImagePart;

export type PromptMessage =
  | { role: "system"; content: string }
  | { role: "user" | "assistant"; content: PromptContentPart[] };

type ChatRole = PromptMessage["role"];

const CHAT_OPEN = "\x01CHAT:";
const CHAT_CLOSE = "\x01ENDCHAT\x01";
const IMAGE_OPEN = "\x00IMG:";
const IMAGE_CLOSE = "\x00";
const DEFAULT_MEDIA_TYPE = "image/png";

const CHAT_BLOCK = /\x01CHAT:(\w+)\x01([\s\S]*?)\x01ENDCHAT\x01/g;
const IMAGE_MARK = /\x00IMG:([^|\x00]*)\|([^\x00]*)\x00/g;

function isChatRole(value: string): value is ChatRole {
  return value === "system" || value === "user" || value === "assistant";
}

class ChatTag extends Tag {
  private readonly role: ChatRole;
  private readonly body: Template[] = [];

  constructor(token: TagToken, remainTokens: TopLevelToken[], liquid: Liquid) {
    super(token, remainTokens, liquid);
    const role = /role:\s*"(\w+)"/.exec(token.args)?.[1];
    if (role === undefined || !isChatRole(role)) {
      throw new Error(`{% chat %} requires role: "system"|"user"|"assistant", got "${token.args}"`);
    }
    this.role = role;

    const stream = liquid.parser
      .parseStream(remainTokens)
      .on("tag:endchat", () => stream.stop())
      .on("template", (tpl: Template) => this.body.push(tpl))
      .on("end", () => {
        throw new Error("{% chat %} is missing its {% endchat %}");
      });
    stream.start();
  }

  *render(ctx: Context, emitter: Emitter): Generator<unknown, void, unknown> {
    emitter.write(`${CHAT_OPEN}${this.role}\x01`);
    yield this.liquid.renderer.renderTemplates(this.body, ctx, emitter);
    emitter.write(CHAT_CLOSE);
  }
}

class ImageTag extends Tag {
  private readonly expression: string;
  private readonly mediaType: string;

  constructor(token: TagToken, remainTokens: TopLevelToken[], liquid: Liquid) {
    super(token, remainTokens, liquid);
    const match = /^(\S+)(?:\s+media_type:\s*"([^"]+)")?$/.exec(token.args.trim());
    if (!match) {
      throw new Error(`{% image %} expects an expression, got "${token.args}"`);
    }
    this.expression = match[1];
    this.mediaType = match[2] ?? DEFAULT_MEDIA_TYPE;
  }

  *render(ctx: Context, emitter: Emitter): Generator<unknown, void, unknown> {
    const value = yield this.liquid.evalValue(this.expression, ctx);
    emitter.write(`${IMAGE_OPEN}${this.mediaType}|${String(value)}${IMAGE_CLOSE}`);
  }
}

/** Directory holding the .liquid templates, relative to a module URL. */
export function promptsDirFor(moduleUrl: string): string {
  return path.resolve(path.dirname(fileURLToPath(moduleUrl)), "../../prompts");
}

const engine = new Liquid({
  root: [promptsDirFor(import.meta.url)],
  extname: ".liquid",
  strictVariables: false,
});
engine.registerTag("chat", ChatTag);
engine.registerTag("image", ImageTag);

export async function renderPrompt(
  templateName: string,
  context: Record<string, unknown>
): Promise<PromptMessage[]> {
  const rendered: string = await engine.renderFile(templateName, context);
  return parseMessages(rendered);
}

function parseMessages(rendered: string): PromptMessage[] {
  const messages: PromptMessage[] = [];
  for (const [, role, body] of rendered.matchAll(CHAT_BLOCK)) {
    if (role === "system") {
      messages.push({ role, content: body.trim() });
    } else if (role === "user" || role === "assistant") {
      messages.push({ role, content: parseParts(body) });
    }
  }
  return messages;
}

function parseParts(body: string): PromptContentPart[] {
  const parts: PromptContentPart[] = [];
  const pushText = (text: string) => {
    const trimmed = text.trim();
    if (trimmed) parts.push({ type: "text", text: trimmed });
  };

  let last = 0;
  for (const match of body.matchAll(IMAGE_MARK)) {
    const index = match.index ?? 0;
    pushText(body.slice(last, index));
    parts.push({ type: "image", mediaType: match[1], image: match[2] });
    last = index + match[0].length;
  }
  pushText(body.slice(last));
  return parts;
}
