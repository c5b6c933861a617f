import { randomUUID } from "node:crypto";
import { ok, type Result } from "neverthrow";
import { resourcePackage } from "../core/urn.js";
import type { DynamicMap } from "../core/value.js";

export type ProviderError = {
  readonly message: string;
};

export type ResourceRef = {
  readonly type: string;
  readonly name: string;
};

export type CreateRequest = ResourceRef & {
  readonly inputs: DynamicMap;
};

export type CreateResult = {
  readonly id: string;
  readonly outputs: DynamicMap;
};

export type UpdateRequest = ResourceRef & {
  readonly id: string;
  readonly olds: DynamicMap;
  readonly news: DynamicMap;
};

export type ExistingResource = ResourceRef & {
  readonly id: string;
  readonly outputs: DynamicMap;
};

/**
 * Performs the work behind one kind of resource. `read` is optional; a
 * provider without it is skipped on refresh. `read` yields `undefined` when
 * the resource no longer exists.
 */
export type ResourceProvider = {
  create(request: CreateRequest): Promise<Result<CreateResult, ProviderError>>;
  update(request: UpdateRequest): Promise<Result<DynamicMap, ProviderError>>;
  delete(resource: ExistingResource): Promise<Result<void, ProviderError>>;
  read?(resource: ExistingResource): Promise<Result<DynamicMap | undefined, ProviderError>>;
};

export type ProviderRegistry = Readonly<Record<string, ResourceProvider>>;

const randomId = (request: CreateRequest): string => `${request.name}-${randomUUID().slice(0, 8)}`;

/**
 * A provider that touches nothing: it assigns an id and reports the inputs as
 * outputs.
 */
export const echoProvider = (
  generateId: (request: CreateRequest) => string = randomId,
): ResourceProvider => ({
  create: async (request) => ok({ id: generateId(request), outputs: request.inputs }),
  update: async (request) => ok(request.news),
  delete: async () => ok(undefined),
});

/** Explicit provider name first, then the type's package, then the fallback. */
export const selectProvider = (
  providers: ProviderRegistry,
  fallback: ResourceProvider,
  type: string,
  explicit?: string,
): ResourceProvider =>
  (explicit !== undefined ? providers[explicit] : undefined) ??
  providers[resourcePackage(type)] ??
  fallback;
