import Ajv2020 from "ajv/dist/2020";
import type { ErrorObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";

import { ValidationError } from "../../validation/errors";

// Schemas
import fieldMap from "../schemas/field-map.v1.json";
import rawRecord from "../schemas/raw-record.v1.json";
import canonicalEvent from "../schemas/canonical-event.v1.json";
import checkIn from "../schemas/check-in.v1.json";

const ajv = new Ajv2020({ allErrors: true, strict: false });
addFormats(ajv);

// Compiled once per process
const validators = {
  "field-map.v1": ajv.compile(fieldMap),
  "raw-record.v1": ajv.compile(rawRecord),
  "canonical-event.v1": ajv.compile(canonicalEvent),
  "check-in.v1": ajv.compile(checkIn),
} satisfies Record<string, ValidateFunction>;

export type SchemaName = keyof typeof validators;

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(e => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`);
}

export function check(schemaName: SchemaName, data: unknown): { ok: true } | { ok: false; errors: string[] } {
  const v = validators[schemaName];
  if (v(data)) return { ok: true };
  return { ok: false, errors: formatErrors(v.errors) };
}

export function validate<T>(schemaName: SchemaName, data: unknown): asserts data is T {
  const v = validators[schemaName];
  if (!v(data)) {
    const messages = formatErrors(v.errors).join("; ");
    throw new ValidationError(`Schema validation failed for ${schemaName}: ${messages}`, v.errors);
  }
}
