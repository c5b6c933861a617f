import { dirname, resolve } from "node:path";
import { err, type Result } from "neverthrow";
import { createBoundary } from "../boundary/operations.js";
import {
  type ClientError,
  DeploymentClient,
  formatClientError,
  type StackResult,
} from "../client/client.js";
import { formatEvent } from "../client/printer.js";
import type { EngineEvent } from "../core/events.js";
import { LocalEngine } from "../engine/local-engine.js";
import type { ProviderRegistry } from "../engine/providers.js";
import { FileStateStore } from "../engine/state-store.js";
import { type ConfigError, DEFAULT_CONFIG_PATH, readConfig, toRequest } from "./config.js";

export type StackOperation = "preview" | "deploy" | "destroy" | "output";

export type StackCommandOptions = {
  readonly config?: string;
  readonly stack?: string;
  /** Where project working directories go. Defaults to the stack file's directory. */
  readonly workRoot?: string;
  readonly providers?: ProviderRegistry;
};

export type CliError =
  | { readonly kind: "config"; readonly error: ConfigError }
  | { readonly kind: "client"; readonly error: ClientError };

export const formatCliError = (error: CliError): string => {
  switch (error.kind) {
    case "config":
      return error.error.field === "path" || error.error.field === "root"
        ? error.error.message
        : `${error.error.field}: ${error.error.message}`;
    case "client":
      return formatClientError(error.error);
  }
};

export const printEvent = (event: EngineEvent): void => {
  const line = formatEvent(event);
  switch (line.level) {
    case "info":
      console.log(line.text);
      break;
    case "warn":
      console.warn(line.text);
      break;
    case "error":
      console.error(line.text);
      break;
  }
};

export const runStackOperation = async (
  operation: StackOperation,
  options: StackCommandOptions = {},
): Promise<Result<StackResult, CliError>> => {
  const configPath = resolve(options.config ?? DEFAULT_CONFIG_PATH);
  const config = await readConfig(configPath);
  if (config.isErr()) {
    return err({ kind: "config", error: config.error });
  }

  const engine = new LocalEngine({
    store: new FileStateStore(),
    ...(options.providers !== undefined ? { providers: options.providers } : {}),
  });
  const boundary = createBoundary({
    engine,
    workRoot: options.workRoot ?? dirname(configPath),
  });
  const client = new DeploymentClient(boundary, {
    onEvent: (sequenced) => printEvent(sequenced.event),
  });

  const request = toRequest(config.value, options.stack);
  const result = await (() => {
    switch (operation) {
      case "preview":
        return client.preview(request);
      case "deploy":
        return client.deploy(request);
      case "destroy":
        return client.destroy(request);
      case "output":
        return client.getOutputs(request);
    }
  })();

  return result.mapErr((error): CliError => ({ kind: "client", error }));
};
