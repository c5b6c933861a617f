import { err, ok, type Result } from "neverthrow";
import { AsyncValue } from "../core/async-value.js";
import { describeChanges, type ResourceOperation } from "../core/events.js";
import type {
  DeploymentProgram,
  OperationResult,
  PreviewResult,
  ProgramContext,
  ProvisioningEngine,
  ProvisioningError,
  RegisteredResource,
  ResourceChanges,
  ResourceInputs,
  ResourceOptions,
  StackWorkspace,
  WorkspaceOptions,
} from "../core/provisioning.js";
import { createUrn } from "../core/urn.js";
import { type DynamicMap, type DynamicValue, dynamicEquals } from "../core/value.js";
import {
  echoProvider,
  type ProviderRegistry,
  type ResourceProvider,
  selectProvider,
} from "./providers.js";
import {
  emptyState,
  type StackState,
  type StateError,
  type StateResource,
  type StateStore,
} from "./state-store.js";

export type LocalEngineOptions = {
  readonly store: StateStore;
  readonly providers?: ProviderRegistry;
  /** Used for types no registered provider claims. Defaults to {@link echoProvider}. */
  readonly defaultProvider?: ResourceProvider;
};

const OP_SYMBOLS: Readonly<Record<ResourceOperation, string>> = {
  create: "+",
  update: "~",
  delete: "-",
  same: "=",
  read: ">",
};

const stepLine = (op: ResourceOperation, type: string, name: string): string =>
  `${OP_SYMBOLS[op]} ${op} ${type} ${name}`;

const fromState = (error: StateError): ProvisioningError => ({
  message: error.path !== undefined ? `${error.message} (${error.path})` : error.message,
});

type SettledInputs = {
  readonly values: DynamicMap;
  readonly known: boolean;
  readonly dependencies: ReadonlySet<string>;
};

const settleInputs = async (inputs: ResourceInputs): Promise<SettledInputs> => {
  const values: Record<string, DynamicValue> = {};
  const dependencies = new Set<string>();
  let known = true;
  for (const [key, input] of Object.entries(inputs)) {
    for (const dep of input.dependencies) {
      dependencies.add(dep);
    }
    const settled = await input.settle();
    if (settled.known) {
      values[key] = settled.value;
    } else {
      known = false;
      values[key] = null;
    }
  }
  return { values, known, dependencies };
};

/** Records step lines and change counts for one stack operation. */
class StepLog {
  private readonly stdout: string[] = [];
  private readonly stderr: string[] = [];
  private readonly changes: Record<string, number> = {};

  step(op: ResourceOperation, type: string, name: string): void {
    this.stdout.push(stepLine(op, type, name));
    this.changes[op] = (this.changes[op] ?? 0) + 1;
  }

  warn(message: string): void {
    this.stderr.push(message);
  }

  get resourceChanges(): ResourceChanges {
    return { ...this.changes };
  }

  result(verb: string): OperationResult {
    const resourceChanges = this.resourceChanges;
    return {
      stdout: joinLines(this.stdout),
      stderr: joinLines(this.stderr),
      summary: {
        message: `${verb} succeeded (${describeChanges(resourceChanges)})`,
        result: "succeeded",
        resourceChanges,
      },
    };
  }

  preview(): PreviewResult {
    return {
      stdout: joinLines(this.stdout),
      stderr: joinLines(this.stderr),
      changeSummary: this.resourceChanges,
    };
  }
}

const joinLines = (lines: readonly string[]): string =>
  lines.length > 0 ? `${lines.join("\n")}\n` : "";

/**
 * One run of a deployment program against the prior state of a stack. In
 * dry-run mode it only plans: no provider calls, nothing saved.
 */
class Deployment {
  private readonly registered: StateResource[] = [];
  private readonly exported = new Map<string, AsyncValue<DynamicValue>>();
  readonly log = new StepLog();

  constructor(
    private readonly engine: LocalEngine,
    private readonly options: WorkspaceOptions,
    private readonly prior: StackState,
    private readonly dryRun: boolean,
  ) {}

  context(): ProgramContext {
    return {
      projectName: this.options.projectName,
      stackName: this.options.stackName,
      dryRun: this.dryRun,
      registerResource: (type, name, inputs, options) =>
        this.register(type, name, inputs, options),
      exportOutput: (name, value) => {
        this.exported.set(name, value);
      },
    };
  }

  private async register(
    type: string,
    name: string,
    inputs: ResourceInputs,
    options: ResourceOptions,
  ): Promise<Result<RegisteredResource, ProvisioningError>> {
    const urn = createUrn(this.options.stackName, this.options.projectName, type, name);
    if (this.registered.some((r) => r.urn === urn)) {
      return err({ message: `resource ${urn} was registered twice`, resource: urn });
    }

    const settled = await settleInputs(inputs);
    const dependencies = [
      ...new Set([...options.dependsOn.map((dep) => dep.urn), ...settled.dependencies]),
    ];
    const previous = this.prior.resources.find((r) => r.urn === urn);
    const handle = { urn, name, type };

    const op: ResourceOperation =
      previous === undefined
        ? "create"
        : settled.known && dynamicEquals(previous.inputs, settled.values)
          ? "same"
          : "update";

    if (this.dryRun) {
      this.log.step(op, type, name);
      if (previous === undefined) {
        return ok({
          handle,
          id: AsyncValue.unknown<string>([urn]),
          outputs: AsyncValue.unknown<DynamicMap>([urn]),
        });
      }
      return ok({
        handle,
        id: AsyncValue.of(previous.id, [urn]),
        outputs:
          op === "same"
            ? AsyncValue.of(previous.outputs, [urn])
            : AsyncValue.unknown<DynamicMap>([urn]),
      });
    }

    const provider = this.engine.providerFor(type, options.provider);
    const applied = await this.apply(op, provider, { type, name, inputs: settled.values }, previous);
    if (applied.isErr()) {
      this.log.warn(`${type} ${name}: ${applied.error.message}`);
      return err({
        message: `failed to ${op} ${type} ${name}: ${applied.error.message}`,
        resource: urn,
      });
    }
    this.log.step(op, type, name);

    this.registered.push({
      urn,
      type,
      name,
      id: applied.value.id,
      ...(options.provider !== undefined ? { provider: options.provider } : {}),
      inputs: settled.values,
      outputs: applied.value.outputs,
      dependencies,
    });

    const saved = await this.save(this.pending(), this.prior.outputs);
    if (saved.isErr()) {
      return err(saved.error);
    }

    return ok({
      handle,
      id: AsyncValue.of(applied.value.id, [urn]),
      outputs: AsyncValue.of(applied.value.outputs, [urn]),
    });
  }

  private async apply(
    op: ResourceOperation,
    provider: ResourceProvider,
    request: { readonly type: string; readonly name: string; readonly inputs: DynamicMap },
    previous: StateResource | undefined,
  ): Promise<Result<{ readonly id: string; readonly outputs: DynamicMap }, ProvisioningError>> {
    if (previous === undefined) {
      return provider.create(request);
    }
    if (op === "same") {
      return ok({ id: previous.id, outputs: previous.outputs });
    }
    const updated = await provider.update({
      type: request.type,
      name: request.name,
      id: previous.id,
      olds: previous.inputs,
      news: request.inputs,
    });
    return updated.map((outputs) => ({ id: previous.id, outputs }));
  }

  /** Registered resources so far, followed by prior ones not yet registered. */
  private pending(): readonly StateResource[] {
    const seen = new Set(this.registered.map((r) => r.urn));
    return [...this.registered, ...this.prior.resources.filter((r) => !seen.has(r.urn))];
  }

  private save(
    resources: readonly StateResource[],
    outputs: DynamicMap,
  ): Promise<Result<void, ProvisioningError>> {
    return this.engine.saveState(this.options, { ...this.prior, resources, outputs });
  }

  /** Prior resources the program did not register, newest first. */
  private orphans(): readonly StateResource[] {
    const seen = new Set(this.registered.map((r) => r.urn));
    return this.prior.resources.filter((r) => !seen.has(r.urn)).reverse();
  }

  private async settleExports(): Promise<DynamicMap> {
    const outputs: Record<string, DynamicValue> = {};
    for (const [name, value] of this.exported) {
      const settled = await value.settle();
      outputs[name] = settled.known ? settled.value : null;
    }
    return outputs;
  }

  async run(program: DeploymentProgram): Promise<Result<void, ProvisioningError>> {
    const ran = await program(this.context());
    if (ran.isErr()) {
      return err(ran.error);
    }

    const orphans = this.orphans();
    if (this.dryRun) {
      for (const orphan of orphans) {
        this.log.step("delete", orphan.type, orphan.name);
      }
      return ok(undefined);
    }

    const undeleted = new Set(orphans.map((r) => r.urn));
    for (const orphan of orphans) {
      const deleted = await this.engine.deleteResource(orphan);
      if (deleted.isErr()) {
        this.log.warn(`${orphan.type} ${orphan.name}: ${deleted.error.message}`);
        return err(deleted.error);
      }
      this.log.step("delete", orphan.type, orphan.name);
      undeleted.delete(orphan.urn);
      const saved = await this.save(
        [...this.registered, ...this.prior.resources.filter((r) => undeleted.has(r.urn))],
        this.prior.outputs,
      );
      if (saved.isErr()) {
        return err(saved.error);
      }
    }

    return this.save(this.registered, await this.settleExports());
  }
}

/**
 * A provisioning engine that keeps stack state in a {@link StateStore} and
 * delegates resource work to {@link ResourceProvider}s.
 */
export class LocalEngine implements ProvisioningEngine {
  private readonly store: StateStore;
  private readonly providers: ProviderRegistry;
  private readonly defaultProvider: ResourceProvider;

  constructor(options: LocalEngineOptions) {
    this.store = options.store;
    this.providers = options.providers ?? {};
    this.defaultProvider = options.defaultProvider ?? echoProvider();
  }

  providerFor(type: string, explicit?: string): ResourceProvider {
    return selectProvider(this.providers, this.defaultProvider, type, explicit);
  }

  async loadState(
    options: WorkspaceOptions,
  ): Promise<Result<StackState | undefined, ProvisioningError>> {
    const loaded = await this.store.load(options);
    return loaded.mapErr(fromState);
  }

  async saveState(
    options: WorkspaceOptions,
    state: StackState,
  ): Promise<Result<void, ProvisioningError>> {
    const saved = await this.store.save(options, state);
    return saved.mapErr(fromState);
  }

  async deleteResource(resource: StateResource): Promise<Result<void, ProvisioningError>> {
    const deleted = await this.providerFor(resource.type, resource.provider).delete({
      type: resource.type,
      name: resource.name,
      id: resource.id,
      outputs: resource.outputs,
    });
    return deleted.mapErr((e) => ({
      message: `failed to delete ${resource.type} ${resource.name}: ${e.message}`,
    }));
  }

  async upsertStack(
    options: WorkspaceOptions,
    program: DeploymentProgram,
  ): Promise<Result<StackWorkspace, ProvisioningError>> {
    const loaded = await this.loadState(options);
    if (loaded.isErr()) {
      return err(loaded.error);
    }
    if (loaded.value === undefined) {
      const created = await this.saveState(options, emptyState(options));
      if (created.isErr()) {
        return err(created.error);
      }
    }
    return ok(new LocalStack(this, options, program));
  }

  async selectStack(options: WorkspaceOptions): Promise<Result<StackWorkspace, ProvisioningError>> {
    const loaded = await this.loadState(options);
    if (loaded.isErr()) {
      return err(loaded.error);
    }
    if (loaded.value === undefined) {
      return err({ message: `stack '${options.stackName}' not found` });
    }
    return ok(new LocalStack(this, options, undefined));
  }
}

const noProgram: DeploymentProgram = async () =>
  err({ message: "stack was selected without a program; preview and up need one" });

class LocalStack implements StackWorkspace {
  readonly projectName: string;
  readonly stackName: string;

  constructor(
    private readonly engine: LocalEngine,
    private readonly options: WorkspaceOptions,
    private readonly program: DeploymentProgram | undefined,
  ) {
    this.projectName = options.projectName;
    this.stackName = options.stackName;
  }

  private async state(): Promise<Result<StackState, ProvisioningError>> {
    const loaded = await this.engine.loadState(this.options);
    return loaded.map((state) => state ?? emptyState(this.options));
  }

  async refresh(): Promise<Result<OperationResult, ProvisioningError>> {
    const state = await this.state();
    if (state.isErr()) {
      return err(state.error);
    }

    const log = new StepLog();
    const kept: StateResource[] = [];
    for (const resource of state.value.resources) {
      const provider = this.engine.providerFor(resource.type, resource.provider);
      if (provider.read === undefined) {
        kept.push(resource);
        continue;
      }
      const read = await provider.read({
        type: resource.type,
        name: resource.name,
        id: resource.id,
        outputs: resource.outputs,
      });
      if (read.isErr()) {
        log.warn(`read failed for ${resource.type} ${resource.name}: ${read.error.message}`);
        kept.push(resource);
      } else if (read.value === undefined) {
        log.step("delete", resource.type, resource.name);
      } else {
        log.step("read", resource.type, resource.name);
        kept.push({ ...resource, outputs: read.value });
      }
    }

    const saved = await this.engine.saveState(this.options, { ...state.value, resources: kept });
    return saved.map(() => log.result("refresh"));
  }

  async preview(): Promise<Result<PreviewResult, ProvisioningError>> {
    const state = await this.state();
    if (state.isErr()) {
      return err(state.error);
    }
    const deployment = new Deployment(this.engine, this.options, state.value, true);
    const ran = await deployment.run(this.program ?? noProgram);
    return ran.map(() => deployment.log.preview());
  }

  async up(): Promise<Result<OperationResult, ProvisioningError>> {
    const state = await this.state();
    if (state.isErr()) {
      return err(state.error);
    }
    const deployment = new Deployment(this.engine, this.options, state.value, false);
    const ran = await deployment.run(this.program ?? noProgram);
    return ran.map(() => deployment.log.result("update"));
  }

  async destroy(): Promise<Result<OperationResult, ProvisioningError>> {
    const state = await this.state();
    if (state.isErr()) {
      return err(state.error);
    }

    const log = new StepLog();
    let remaining = [...state.value.resources];
    for (const resource of [...state.value.resources].reverse()) {
      const deleted = await this.engine.deleteResource(resource);
      if (deleted.isErr()) {
        return err(deleted.error);
      }
      log.step("delete", resource.type, resource.name);
      remaining = remaining.filter((r) => r.urn !== resource.urn);
      const saved = await this.engine.saveState(this.options, {
        ...state.value,
        resources: remaining,
      });
      if (saved.isErr()) {
        return err(saved.error);
      }
    }

    const cleared = await this.engine.saveState(this.options, {
      ...state.value,
      resources: [],
      outputs: {},
    });
    return cleared.map(() => log.result("destroy"));
  }

  async outputs(): Promise<Result<DynamicMap, ProvisioningError>> {
    const state = await this.state();
    return state.map((s) => s.outputs);
  }
}
