import Ajv, { type ErrorObject, type JSONSchemaType, type ValidateFunction } from "ajv";

const ajv = new Ajv({
  allErrors: true,
  strict: false,
  coerceTypes: true,
  useDefaults: true,
});

export type SchemaValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: string[] };

/** Compiles on first use; the returned function reuses the compiled validator. */
export function createSchemaValidator<T>(schema: JSONSchemaType<T>) {
  let compiled: ValidateFunction<T> | null = null;

  return (payload: unknown): SchemaValidationResult<T> => {
    compiled ??= ajv.compile<T>(schema);
    if (compiled(payload)) {
      return {
        success: true,
        data: payload,
      };
    }

    return {
      success: false,
      errors: formatAjvErrors(compiled.errors),
    };
  };
}

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors?.length) {
    return [];
  }

  return errors.map((error) => {
    const path = error.instancePath ? error.instancePath : error.schemaPath.replace("#/", "");
    return `${path || "(root)"} ${error.message ?? ""}`.trim();
  });
}
