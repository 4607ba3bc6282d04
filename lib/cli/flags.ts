export interface ParsedFlags {
  positional: string[];
  configPath?: string;
  startPage?: number;
  endPage?: number;
  output?: string;
  location?: string;
  environment?: string;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

type ValueFlag = Exclude<keyof ParsedFlags, "positional">;

const FLAGS: Record<string, ValueFlag> = {
  "--config": "configPath",
  "--start-page": "startPage",
  "--end-page": "endPage",
  "--output": "output",
  "--location": "location",
  "--environment": "environment",
};

function parsePageNumber(flag: string, raw: string): number {
  if (!/^\d+$/.test(raw) || Number(raw) < 1) {
    throw new UsageError(`${flag} expects a page number of at least 1, got "${raw}"`);
  }
  return Number(raw);
}

export function parseFlags(args: string[]): ParsedFlags {
  const flags: ParsedFlags = { positional: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith("-")) {
      flags.positional.push(arg);
      continue;
    }

    const key = Object.hasOwn(FLAGS, arg) ? FLAGS[arg] : undefined;
    if (!key) {
      throw new UsageError(`Unknown option: ${arg}`);
    }
    const value = args[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new UsageError(`${arg} needs a value`);
    }
    i++;

    switch (key) {
      case "startPage":
      case "endPage":
        flags[key] = parsePageNumber(arg, value);
        break;
      default:
        flags[key] = value;
    }
  }

  return flags;
}
