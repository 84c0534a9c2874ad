import Ajv, { type SchemaObject, type ValidateFunction } from "ajv";
import type { ProductRecord } from "../types";
import { SchemaError } from "../core/errors";
import { getErrorMessage } from "../core/utils";

export type RecordValidator = (record: ProductRecord) => boolean;

/**
 * Build the accept/reject check applied to every extracted record.
 * Without a schema every record is accepted. Rejections are logged with
 * the record's detail URL and the violated constraints; they never throw.
 * @param schema - JSON Schema for a single record
 */
export function createRecordValidator(schema?: SchemaObject | null): RecordValidator {
  if (!schema) return () => true;

  const ajv = new Ajv({ allErrors: true, strict: false });
  let validate: ValidateFunction<ProductRecord>;
  try {
    validate = ajv.compile<ProductRecord>(schema);
  } catch (err) {
    throw new SchemaError(`Output schema does not compile: ${getErrorMessage(err)}`);
  }

  return (record) => {
    const recordId = record.detail_url ?? "(no url)";
    if (validate(record)) return true;
    console.warn(
      `Validation failed for ${recordId}: ` +
        ajv.errorsText(validate.errors, { dataVar: "record" })
    );
    return false;
  };
}
