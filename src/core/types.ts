import type { DynamicMap, DynamicValue } from "./value.js";

export type ResourceDescription = {
  readonly type: string;
  readonly name: string;
  readonly properties: DynamicMap;
  readonly dependsOn: readonly string[];
  readonly provider?: string;
};

export type DeploymentRequest = {
  readonly projectName: string;
  readonly stackName: string;
  readonly resources: readonly ResourceDescription[];
  readonly config: Readonly<Record<string, string>>;
  readonly exports: Readonly<Record<string, string>>;
};

export type OutputItem = {
  readonly resourceName: string;
  readonly outputName: string;
  readonly value: DynamicValue;
};

export type DeploymentResponse = {
  readonly success: boolean;
  readonly error?: string;
  readonly outputs: readonly OutputItem[];
};

export const STACK_OUTPUT_OWNER = "stack";

export const okResponse = (outputs: readonly OutputItem[]): DeploymentResponse => ({
  success: true,
  outputs,
});

export const failedResponse = (error: string): DeploymentResponse => ({
  success: false,
  error,
  outputs: [],
});

export const stackOutput = (outputName: string, value: DynamicValue): OutputItem => ({
  resourceName: STACK_OUTPUT_OWNER,
  outputName,
  value,
});
