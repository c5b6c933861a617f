export type EngineError =
  | { readonly kind: "decode"; readonly message: string }
  | { readonly kind: "validation"; readonly errors: readonly ValidationError[] }
  | { readonly kind: "workspace"; readonly message: string; readonly path?: string }
  | { readonly kind: "registration"; readonly resource: string; readonly message: string }
  | { readonly kind: "encode"; readonly message: string }
  | { readonly kind: "engine"; readonly message: string };

export type ValidationError = {
  readonly path: readonly string[];
  readonly message: string;
  readonly code: ValidationErrorCode;
};

export type ValidationErrorCode =
  | "MISSING_REQUIRED_FIELD"
  | "INVALID_NAME"
  | "DUPLICATE_ID";

export const formatEngineError = (error: EngineError): string => {
  switch (error.kind) {
    case "decode":
      return `failed to decode request: ${error.message}`;
    case "validation":
      return error.errors
        .map((e) => (e.path.length > 0 ? `${e.path.join(".")}: ${e.message}` : e.message))
        .join("; ");
    case "workspace":
      return error.message;
    case "registration":
      return error.message;
    case "encode":
      return `failed to encode message: ${error.message}`;
    case "engine":
      return error.message;
  }
};

export const errorMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e));
