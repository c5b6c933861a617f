import type { Result } from "neverthrow";
import type { AsyncValue } from "./async-value.js";
import type { DynamicMap, DynamicValue } from "./value.js";

export type ProvisioningError = {
  readonly message: string;
  /** URN of the resource whose registration failed, when one did. */
  readonly resource?: string;
};

export type ResourceHandle = {
  readonly urn: string;
  readonly name: string;
  readonly type: string;
};

export type ResourceInputs = Readonly<Record<string, AsyncValue<DynamicValue>>>;

export type ResourceOptions = {
  readonly dependsOn: readonly ResourceHandle[];
  readonly provider?: string;
};

export type RegisteredResource = {
  readonly handle: ResourceHandle;
  readonly id: AsyncValue<string>;
  readonly outputs: AsyncValue<DynamicMap>;
};

/**
 * What a deployment program sees of the provisioning engine while it runs.
 */
export type ProgramContext = {
  readonly projectName: string;
  readonly stackName: string;
  readonly dryRun: boolean;
  registerResource(
    type: string,
    name: string,
    inputs: ResourceInputs,
    options: ResourceOptions,
  ): Promise<Result<RegisteredResource, ProvisioningError>>;
  exportOutput(name: string, value: AsyncValue<DynamicValue>): void;
};

export type DeploymentProgram = (ctx: ProgramContext) => Promise<Result<void, ProvisioningError>>;

export type ResourceChanges = Readonly<Record<string, number>>;

export type OperationSummary = {
  readonly message: string;
  readonly result: "succeeded" | "failed";
  readonly resourceChanges: ResourceChanges;
};

export type OperationResult = {
  readonly stdout: string;
  readonly stderr: string;
  readonly summary: OperationSummary;
};

export type PreviewResult = {
  readonly stdout: string;
  readonly stderr: string;
  readonly changeSummary: ResourceChanges;
};

export type StackWorkspace = {
  readonly projectName: string;
  readonly stackName: string;
  refresh(): Promise<Result<OperationResult, ProvisioningError>>;
  preview(): Promise<Result<PreviewResult, ProvisioningError>>;
  up(): Promise<Result<OperationResult, ProvisioningError>>;
  destroy(): Promise<Result<OperationResult, ProvisioningError>>;
  outputs(): Promise<Result<DynamicMap, ProvisioningError>>;
};

export type WorkspaceOptions = {
  readonly projectName: string;
  readonly stackName: string;
  readonly workDir: string;
  readonly config: Readonly<Record<string, string>>;
};

/**
 * The external engine that creates, updates and deletes real resources.
 * `upsertStack` binds a program for preview and up; `selectStack` opens an
 * existing stack for destroy and output reads.
 */
export type ProvisioningEngine = {
  upsertStack(
    options: WorkspaceOptions,
    program: DeploymentProgram,
  ): Promise<Result<StackWorkspace, ProvisioningError>>;
  selectStack(options: WorkspaceOptions): Promise<Result<StackWorkspace, ProvisioningError>>;
};
