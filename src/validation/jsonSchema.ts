import Ajv, { ErrorObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import manifestSchema from "../../schemas/manifest.schema.json";
import { Manifest } from "../types/manifest";

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

let manifestValidator: ValidateFunction<Manifest> | null = null;

export function getManifestValidator(): ValidateFunction<Manifest> {
  if (!manifestValidator) {
    manifestValidator = ajv.compile<Manifest>(manifestSchema);
  }
  return manifestValidator;
}

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(
    (error) => `${error.instancePath || "<root>"} ${error.message ?? "is invalid"}`
  );
}
