import fs from "node:fs";
import path from "node:path";

const ASSIGNMENT = /^\s*([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*?)\s*$/;

interface ParsedLine {
  raw: string;
  key?: string;
  value?: string;
}

function parseLine(raw: string): ParsedLine {
  if (raw.trimStart().startsWith("#")) return { raw };
  const match = ASSIGNMENT.exec(raw);
  if (!match) return { raw };
  return { raw, key: match[1], value: unquote(match[2]) };
}

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value.endsWith(first)) {
      return value.slice(1, -1);
    }
  }
  return value;
}

function splitLines(content: string): string[] {
  if (content === "") return [];
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Parse `KEY = VALUE` text. Blank lines and `#` comments are ignored;
 * when a key repeats, the last assignment wins.
 */
export function parseEnv(content: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const raw of splitLines(content)) {
    const { key, value } = parseLine(raw);
    if (key !== undefined && value !== undefined) {
      values[key] = value;
    }
  }
  return values;
}

export function formatEntry(key: string, value: string): string {
  return `${key} = ${value}`;
}

/**
 * Rewrite the assignments for `updates` in place and append keys that are
 * not present yet. Every other line comes back byte-for-byte, and the
 * file's line ending (LF or CRLF) is kept.
 */
export function applyEnvUpdates(content: string, updates: Record<string, string>): string {
  const eol = content.includes("\r\n") ? "\r\n" : "\n";
  const pending = new Map(Object.entries(updates));
  const lines = splitLines(content).map((raw) => {
    const { key } = parseLine(raw);
    if (key === undefined || !Object.hasOwn(updates, key)) return raw;
    pending.delete(key);
    return formatEntry(key, updates[key]);
  });
  for (const [key, value] of pending) {
    lines.push(formatEntry(key, value));
  }
  return lines.length > 0 ? lines.join(eol) + eol : "";
}

export function readEnvFile(filePath: string): Record<string, string> {
  if (!fs.existsSync(filePath)) return {};
  return parseEnv(fs.readFileSync(filePath, "utf-8"));
}

export function updateEnvFile(filePath: string, updates: Record<string, string>): void {
  const current = fs.existsSync(filePath) ? fs.readFileSync(filePath, "utf-8") : "";
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, applyEnvUpdates(current, updates));
}
