/**
 * Provisioner
 *
 * Deploys the Bicep template at subscription scope with the `az` CLI
 * (subscription comes from the caller's active `az login` session), then
 * records the endpoint, key and deployment name in the env file.
 *
 * There is no rollback: if a step fails, resources created so far stay in
 * place and the run can simply be repeated.
 */

import { z } from "zod/v4";
import { DeploymentError } from "../errors";
import { ENV_KEYS } from "../settings/connection";
import { updateEnvFile } from "../settings/env-file";
import { describeCommand, type CommandRunner } from "./command-runner";

export interface ProvisionOptions {
  location: string;
  environmentName: string;
  templateFile: string;
  parametersFile?: string;
  envFile: string;
  runner: CommandRunner;
  onStep?: (message: string) => void;
}

export interface ProvisionResult {
  resourceGroupName: string;
  endpoint: string;
  accountName: string;
  deploymentName: string;
  envFile: string;
}

const outputValue = z.object({ value: z.string().min(1) });

const deploymentSchema = z.object({
  properties: z.object({
    outputs: z.object({
      resourceGroupName: outputValue,
      openAiEndpoint: outputValue,
      openAiAccountName: outputValue,
      visionDeploymentName: outputValue,
    }),
  }),
});

const accountKeysSchema = z.object({
  key1: z.string().min(1),
  key2: z.string().optional(),
});

export function deploymentArgs(options: ProvisionOptions): string[] {
  const args = [
    "deployment",
    "sub",
    "create",
    "--name",
    options.environmentName,
    "--location",
    options.location,
    "--template-file",
    options.templateFile,
  ];
  if (options.parametersFile) {
    args.push("--parameters", `@${options.parametersFile}`);
  }
  args.push(
    "--parameters",
    `environmentName=${options.environmentName}`,
    `location=${options.location}`,
    "--output",
    "json"
  );
  return args;
}

export async function provision(options: ProvisionOptions): Promise<ProvisionResult> {
  const { runner, onStep } = options;

  onStep?.(`Deploying ${options.templateFile} to ${options.location}...`);
  const deployArgs = deploymentArgs(options);
  const deployment = parseOutput(
    await runner.run("az", deployArgs),
    deploymentSchema,
    describeCommand("az", deployArgs)
  );
  const outputs = deployment.properties.outputs;

  onStep?.(`Fetching keys for ${outputs.openAiAccountName.value}...`);
  const keyArgs = [
    "cognitiveservices",
    "account",
    "keys",
    "list",
    "--name",
    outputs.openAiAccountName.value,
    "--resource-group",
    outputs.resourceGroupName.value,
    "--output",
    "json",
  ];
  const keys = parseOutput(
    await runner.run("az", keyArgs),
    accountKeysSchema,
    describeCommand("az", keyArgs)
  );

  updateEnvFile(options.envFile, {
    [ENV_KEYS.resourceGroup]: outputs.resourceGroupName.value,
    [ENV_KEYS.endpoint]: outputs.openAiEndpoint.value,
    [ENV_KEYS.apiKey]: keys.key1,
    [ENV_KEYS.deploymentName]: outputs.visionDeploymentName.value,
  });
  onStep?.(`Wrote connection settings to ${options.envFile}`);

  return {
    resourceGroupName: outputs.resourceGroupName.value,
    endpoint: outputs.openAiEndpoint.value,
    accountName: outputs.openAiAccountName.value,
    deploymentName: outputs.visionDeploymentName.value,
    envFile: options.envFile,
  };
}

function parseOutput<T>(
  result: { stdout: string; stderr: string },
  schema: z.ZodType<T>,
  command: string
): T {
  let json: unknown;
  try {
    json = JSON.parse(result.stdout);
  } catch (err) {
    throw new DeploymentError({
      message: "az returned output that is not JSON",
      command,
      stderr: result.stderr,
      cause: err,
    });
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new DeploymentError({
      message: `az returned unexpected output: ${parsed.error.issues
        .map((i) => `${i.path.map(String).join(".")}: ${i.message}`)
        .join("; ")}`,
      command,
      stderr: result.stderr,
    });
  }
  return parsed.data;
}
