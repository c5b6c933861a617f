import { existsSync } from "node:fs";
import * as fs from "node:fs/promises";
import { err, ok, Result } from "neverthrow";
import { z } from "zod";
import type { DeploymentRequest, ResourceDescription } from "../core/types.js";
import { type DynamicValue, fromPlain } from "../core/value.js";

export const DEFAULT_CONFIG_PATH = "dynastack.json";

const ResourceConfigSchema = z.object({
  type: z.string().min(1),
  name: z.string().min(1),
  properties: z.record(z.string(), z.unknown()).default({}),
  dependsOn: z.array(z.string()).default([]),
  provider: z.string().optional(),
});

const StackFileSchema = z.object({
  project: z.string().min(1),
  stack: z.string().min(1),
  config: z.record(z.string(), z.string()).default({}),
  resources: z.array(ResourceConfigSchema).default([]),
  exports: z.record(z.string(), z.string()).default({}),
});

export type StackFileConfig = z.infer<typeof StackFileSchema>;
export type ResourceConfig = z.infer<typeof ResourceConfigSchema>;

export type ConfigError = {
  readonly field: string;
  readonly message: string;
};

export const readConfig = async (path: string): Promise<Result<StackFileConfig, ConfigError>> => {
  if (!existsSync(path)) {
    return err({ field: "path", message: `Config file not found: ${path}` });
  }

  const text = await fs.readFile(path, "utf-8");
  const parsed = Result.fromThrowable(
    (): unknown => JSON.parse(text),
    (e): ConfigError => ({
      field: "root",
      message: `Invalid JSON in ${path}: ${e instanceof Error ? e.message : String(e)}`,
    }),
  )();

  return parsed.andThen(parseConfig);
};

export const parseConfig = (parsed: unknown): Result<StackFileConfig, ConfigError> => {
  const result = StackFileSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    if (issue !== undefined) {
      return err({ field: issue.path.join(".") || "root", message: issue.message });
    }
    return err({ field: "root", message: "Invalid config" });
  }
  return ok(result.data);
};

const toResource = (resource: ResourceConfig): ResourceDescription => {
  const properties: Record<string, DynamicValue> = {};
  for (const [key, value] of Object.entries(resource.properties)) {
    properties[key] = fromPlain(value);
  }
  return {
    type: resource.type,
    name: resource.name,
    properties,
    dependsOn: resource.dependsOn,
    ...(resource.provider !== undefined ? { provider: resource.provider } : {}),
  };
};

/** Builds the request for a stack file; `stackName` overrides the file's stack. */
export const toRequest = (config: StackFileConfig, stackName?: string): DeploymentRequest => ({
  projectName: config.project,
  stackName: stackName ?? config.stack,
  config: config.config,
  exports: config.exports,
  resources: config.resources.map(toResource),
});
