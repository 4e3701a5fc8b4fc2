import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import type { ValidateFunction } from "ajv";

export type { ValidateFunction };

// Both packages are CommonJS; under NodeNext the class and the plugin sit on `.default`.
export type AjvInstance = InstanceType<typeof Ajv2020.default>;

export function createAjv(): AjvInstance {
  const ajv = new Ajv2020.default({ allErrors: true, strict: true, useDefaults: true });
  addFormats.default(ajv);
  return ajv;
}
