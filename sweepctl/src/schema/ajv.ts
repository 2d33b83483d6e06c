import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn<T> = ((data: unknown) => data is T) & { errors?: unknown };

export type AjvInstance = {
  compile: <T>(schema: unknown) => AjvValidateFn<T>;
  errorsText: (errors: unknown, options?: { separator?: string; dataVar?: string }) => string;
};

let shared: AjvInstance | null = null;

/** Shared draft 2020-12 instance with formats; compiled validators are cached by ajv itself. */
export function loadAjv(): AjvInstance {
  if (shared) return shared;

  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true, useDefaults: false });
  add(ajv);

  shared = ajv;
  return ajv;
}
