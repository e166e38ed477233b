import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

/** A compiled schema; a type guard for the shape the schema describes. */
export type AjvValidateFn<T = unknown> = ((data: unknown) => data is T) & { errors?: unknown };

export type AjvInstance = {
  compile: <T = unknown>(schema: unknown) => AjvValidateFn<T>;
  errorsText: (errors: unknown) => string;
};

export async function loadAjv(): Promise<AjvInstance> {
  // The CJS default export does not line up with its ESM typings under NodeNext.
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);

  return ajv;
}
