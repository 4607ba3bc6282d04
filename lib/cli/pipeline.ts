#!/usr/bin/env -S npx tsx
/**
 * Form extraction CLI
 *
 * Usage:
 *   npm run pipeline provision                Deploy Azure OpenAI and write .env
 *   npm run pipeline rasterize <pdf_path>     Stack PDF pages into one JPEG
 *   npm run pipeline extract <image_path>     Extract JSON from a composite image
 *   npm run pipeline run <pdf_path>           Rasterize, then extract
 */

import fs from "node:fs";
import { loadConfig, loadExtractionSchema, type AppConfig } from "../config";
import { DeploymentError } from "../errors";
import { extractForm, reportOutcome } from "../extraction/extract-form";
import { rasterize, type RasterizeResult } from "../pdf/rasterize";
import { createCommandRunner } from "../provision/command-runner";
import { provision } from "../provision/provision";
import { loadConnectionSettings } from "../settings/connection";
import { parseFlags, UsageError, type ParsedFlags } from "./flags";
import { runWithProgress } from "./progress";

const USAGE = `Usage: npm run pipeline <command> [args] [options]

Commands:
  provision                 Deploy the inference service and write connection settings
  rasterize <pdf_path>      Render all pages into one composite JPEG
  extract <image_path>      Send a composite image to the model and print the JSON
  run <pdf_path>            rasterize + extract

Options:
  --config <path>       Config file (default: ./config.yaml)
  --start-page <n>      First page to rasterize
  --end-page <n>        Last page to rasterize
  --output <path>       Composite image path (default: next to the PDF)
  --location <region>   Azure region (provision)
  --environment <name>  Deployment / resource name prefix (provision)`;

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    console.log(USAGE);
    process.exit(0);
  }

  const flags = parseFlags(args.slice(1));
  const positional = flags.positional;
  const config = loadConfig(flags.configPath);

  switch (command) {
    case "provision": {
      const result = await provision({
        location: flags.location ?? config.provision.location,
        environmentName: flags.environment ?? config.provision.environment_name,
        templateFile: config.provision.template_file,
        parametersFile: config.provision.parameters_file,
        envFile: config.env_file,
        runner: createCommandRunner(),
        onStep: (message) => console.error(message),
      });
      console.error(`Endpoint: ${result.endpoint}`);
      console.error(`Deployment: ${result.deploymentName}`);
      break;
    }

    case "rasterize": {
      const [pdfPath] = positional;
      if (!pdfPath) {
        console.error("Usage: npm run pipeline rasterize <pdf_path>");
        process.exit(1);
      }
      const result = await runRasterize(pdfPath, config, flags);
      console.log(result.outputPath);
      break;
    }

    case "extract": {
      const [imagePath] = positional;
      if (!imagePath) {
        console.error("Usage: npm run pipeline extract <image_path>");
        process.exit(1);
      }
      await runExtract(imagePath, config);
      break;
    }

    case "run": {
      const [pdfPath] = positional;
      if (!pdfPath) {
        console.error("Usage: npm run pipeline run <pdf_path>");
        process.exit(1);
      }
      const result = await runRasterize(pdfPath, config, flags);
      console.error(`Composite: ${result.outputPath} (${result.width}x${result.height})`);
      await runExtract(result.outputPath, config);
      break;
    }

    default:
      console.error(`Unknown command: ${command}\n`);
      console.log(USAGE);
      process.exit(1);
  }
}

async function runRasterize(
  pdfPath: string,
  config: AppConfig,
  flags: ParsedFlags
): Promise<RasterizeResult> {
  if (!fs.existsSync(pdfPath)) {
    console.error(`PDF not found: ${pdfPath}`);
    process.exit(1);
  }

  let result: RasterizeResult | undefined;
  await runWithProgress(
    rasterize(
      {
        pdfPath,
        outputPath: flags.output,
        outputSuffix: config.rasterize.output_suffix,
        scale: config.rasterize.scale,
        quality: config.rasterize.quality,
        maxBytes: config.rasterize.max_bytes,
        startPage: flags.startPage ?? config.rasterize.start_page,
        endPage: flags.endPage ?? config.rasterize.end_page,
      },
      (r) => {
        result = r;
      }
    ),
    (p) => ({ current: p.page, total: p.totalPages }),
    { label: "rasterize" }
  );

  if (!result) {
    throw new Error("Rasterization finished without a result");
  }
  return result;
}

async function runExtract(imagePath: string, config: AppConfig): Promise<void> {
  if (!fs.existsSync(imagePath)) {
    console.error(`Image not found: ${imagePath}`);
    process.exit(1);
  }

  const settings = loadConnectionSettings(config.env_file, {
    apiVersion: config.api_version,
  });

  const outcome = await extractForm({
    imagePath,
    settings,
    extraction: config.extraction,
    schema: loadExtractionSchema(config.extraction),
    logPath: config.llm_log,
  });

  reportOutcome(outcome);
  if (!outcome.ok) {
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  if (err instanceof UsageError) {
    console.error(`${err.message}\n`);
    console.error(USAGE);
    process.exit(1);
  }
  const name = err instanceof Error ? err.name : "Error";
  const message = err instanceof Error ? err.message : String(err);
  console.error(`\nPipeline failed: ${name}: ${message}`);
  if (err instanceof DeploymentError && err.stderr) {
    console.error(err.stderr);
  }
  process.exit(1);
});
