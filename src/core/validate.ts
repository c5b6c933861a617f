import { err, ok, type Result } from "neverthrow";
import type { EngineError, ValidationError, ValidationErrorCode } from "./errors.js";
import type { DeploymentRequest, ResourceDescription } from "./types.js";

const createError = (
  path: readonly string[],
  message: string,
  code: ValidationErrorCode,
): ValidationError => ({ path, message, code });

const PATH_SEPARATORS = /[/\\]/;

const validatePathSegment = (
  field: "projectName" | "stackName",
  label: string,
  value: string,
): readonly ValidationError[] => {
  if (value === "") {
    return [
      createError([field], `Request requires '${field}' to be a non-empty string`, "MISSING_REQUIRED_FIELD"),
    ];
  }
  if (PATH_SEPARATORS.test(value) || value === "." || value === "..") {
    return [createError([field], `${label} '${value}' must be a single path segment`, "INVALID_NAME")];
  }
  return [];
};

export const validateResource = (
  resource: ResourceDescription,
  index: number,
): readonly ValidationError[] => {
  const path = ["resources", String(index)];
  const errors: ValidationError[] = [];

  if (resource.type === "") {
    errors.push(
      createError([...path, "type"], "Resource requires 'type' to be a non-empty string", "MISSING_REQUIRED_FIELD"),
    );
  }

  if (resource.name === "") {
    errors.push(
      createError([...path, "name"], "Resource requires 'name' to be a non-empty string", "MISSING_REQUIRED_FIELD"),
    );
  }

  return errors;
};

const collectDuplicateNames = (
  resources: readonly ResourceDescription[],
): readonly ValidationError[] => {
  const seen = new Map<string, number>();
  const errors: ValidationError[] = [];

  resources.forEach((resource, index) => {
    if (resource.name === "") {
      return;
    }
    const first = seen.get(resource.name);
    if (first !== undefined) {
      errors.push(
        createError(
          ["resources", String(index), "name"],
          `Duplicate resource name '${resource.name}'. First occurrence at: resources.${first}`,
          "DUPLICATE_ID",
        ),
      );
    } else {
      seen.set(resource.name, index);
    }
  });

  return errors;
};

export const collectRequestErrors = (request: DeploymentRequest): readonly ValidationError[] => {
  const errors: ValidationError[] = [
    ...validatePathSegment("projectName", "Project name", request.projectName),
    ...validatePathSegment("stackName", "Stack name", request.stackName),
  ];

  request.resources.forEach((resource, index) => {
    errors.push(...validateResource(resource, index));
  });

  errors.push(...collectDuplicateNames(request.resources));

  return errors;
};

export function validateRequest(request: DeploymentRequest): Result<DeploymentRequest, EngineError> {
  const errors = collectRequestErrors(request);
  return errors.length > 0 ? err({ kind: "validation", errors }) : ok(request);
}
