import { ConnectionSettingsError } from "../errors";
import { readEnvFile } from "./env-file";

export const ENV_KEYS = {
  resourceGroup: "AZURE_RESOURCE_GROUP_NAME",
  endpoint: "AZURE_OPENAI_ENDPOINT",
  apiKey: "AZURE_OPENAI_API_KEY",
  deploymentName: "AZURE_OPENAI_VISION_MODEL_DEPLOYMENT_NAME",
  apiVersion: "AZURE_OPENAI_API_VERSION",
} as const;

/** Everything the extraction client needs to reach a deployment. */
export interface ConnectionSettings {
  endpoint: string;
  apiKey: string;
  deploymentName: string;
  apiVersion: string;
}

export function connectionFromEnv(
  values: Record<string, string>,
  defaults: { apiVersion: string },
  source = "connection settings"
): ConnectionSettings {
  const required = [ENV_KEYS.endpoint, ENV_KEYS.apiKey, ENV_KEYS.deploymentName];
  const missing = required.filter((key) => !values[key]);
  if (missing.length > 0) {
    throw new ConnectionSettingsError(source, missing);
  }

  return {
    endpoint: values[ENV_KEYS.endpoint].replace(/\/+$/, ""),
    apiKey: values[ENV_KEYS.apiKey],
    deploymentName: values[ENV_KEYS.deploymentName],
    apiVersion: values[ENV_KEYS.apiVersion] || defaults.apiVersion,
  };
}

/**
 * Load connection settings from the provisioner's env file.
 */
export function loadConnectionSettings(
  envFile: string,
  defaults: { apiVersion: string }
): ConnectionSettings {
  return connectionFromEnv(readEnvFile(envFile), defaults, envFile);
}
