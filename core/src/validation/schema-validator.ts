import { readFileSync } from 'node:fs';
import { Ajv, type ValidateFunction } from 'ajv';

const ajv = new Ajv({ allErrors: true, strict: false, useDefaults: false });
const cache = new Map<string, ValidateFunction>();

export interface SchemaValidationResult {
  valid: boolean;
  messages: string[];
}

/**
 * Loads and compiles a JSON schema file. Compiled validators are cached by path.
 */
export function loadSchemaValidator(schemaUrl: URL): ValidateFunction {
  const key = schemaUrl.href;
  const cached = cache.get(key);
  if (cached) {
    return cached;
  }

  const validate = compileSchemaFile(schemaUrl);
  cache.set(key, validate);
  return validate;
}

/**
 * Compiles a JSON schema file into a type guard for `T`. Not cached; callers
 * that validate repeatedly hold on to the result.
 */
export function compileSchemaFile<T = unknown>(schemaUrl: URL): ValidateFunction<T> {
  const schemaText = readFileSync(schemaUrl, 'utf8');
  try {
    return ajv.compile<T>(JSON.parse(schemaText));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid schema at ${schemaUrl.pathname}: ${message}`);
  }
}

export function validateAgainstSchema(
  validate: ValidateFunction,
  payload: unknown
): SchemaValidationResult {
  if (validate(payload)) {
    return { valid: true, messages: [] };
  }
  const messages = (validate.errors ?? []).map((err) =>
    `${err.instancePath || '/'} ${err.message ?? ''}`.trim()
  );
  return { valid: false, messages };
}
