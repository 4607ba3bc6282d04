import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";

const DEFAULT_MAX_BYTES = 20 * 1024 * 1024;

const extractionSchema = z.object({
  prompt: z.string().default("form_extraction"),
  schema_path: z.string(),
  temperature: z.number().min(0).max(2).default(0),
  top_p: z.number().min(0).max(1).default(0),
  max_tokens: z.number().int().min(1).default(4096),
  timeout_ms: z.number().int().min(1).optional(),
});

const rasterizeSchema = z.object({
  scale: z.number().positive().default(1),
  output_suffix: z.string().min(1).default(".composite.jpg"),
  quality: z.number().int().min(1).max(100).default(100),
  max_bytes: z.number().int().min(1).default(DEFAULT_MAX_BYTES),
  start_page: z.number().int().min(1).optional(),
  end_page: z.number().int().min(1).optional(),
});

const provisionSchema = z.object({
  location: z.string().default("eastus"),
  environment_name: z.string().default("form-extraction"),
  template_file: z.string().default("infra/main.bicep"),
  parameters_file: z.string().optional(),
});

const configSchema = z.object({
  env_file: z.string().default(".env"),
  api_version: z.string().default("2024-02-15-preview"),
  extraction: extractionSchema,
  rasterize: rasterizeSchema.default(rasterizeSchema.parse({})),
  provision: provisionSchema.default(provisionSchema.parse({})),
  llm_log: z.string().optional(),
});

export type AppConfig = z.infer<typeof configSchema>;
export type ExtractionConfig = AppConfig["extraction"];
export type RasterizeConfig = AppConfig["rasterize"];
export type ProvisionConfig = AppConfig["provision"];

/**
 * Load config.yaml (cwd by default). Relative paths inside the file are
 * resolved against the file's own directory.
 */
export function loadConfig(configPath?: string): AppConfig {
  const resolved = configPath ?? path.resolve(process.cwd(), "config.yaml");
  const raw = yaml.load(fs.readFileSync(resolved, "utf-8"));
  return resolvePaths(configSchema.parse(raw), path.dirname(path.resolve(resolved)));
}

function resolvePaths(cfg: AppConfig, baseDir: string): AppConfig {
  const at = (p: string) => path.resolve(baseDir, p);
  return {
    ...cfg,
    env_file: at(cfg.env_file),
    llm_log: cfg.llm_log === undefined ? undefined : at(cfg.llm_log),
    extraction: { ...cfg.extraction, schema_path: at(cfg.extraction.schema_path) },
    provision: {
      ...cfg.provision,
      template_file: at(cfg.provision.template_file),
      parameters_file:
        cfg.provision.parameters_file === undefined
          ? undefined
          : at(cfg.provision.parameters_file),
    },
  };
}

/**
 * Read the example target shape that is embedded in the extraction prompt.
 * Returned pretty-printed so the model sees a stable layout.
 */
export function loadExtractionSchema(cfg: ExtractionConfig): string {
  const text = fs.readFileSync(cfg.schema_path, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new Error(
      `Extraction schema ${cfg.schema_path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
  return JSON.stringify(parsed, null, 2);
}
