/**
 * Base class for remote procedures.
 */

import { z } from "zod";
import { ReportServiceError } from "../../core/errors.js";

/**
 * Parameters failed validation.
 */
export class InvalidParamsError extends ReportServiceError {
  constructor(method: string, message: string) {
    super("invalid_params", `Invalid parameters for ${method}: ${message}`);
  }
}

/**
 * Published description of a procedure.
 */
export interface ProcedureSchema {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

/**
 * Abstract base class for procedures exposed over the RPC transport.
 *
 * Each procedure declares a zod schema; `invoke` validates the raw request
 * body against it before `execute` sees the values.
 */
export abstract class Procedure {
  /**
   * Method name used in the request path.
   */
  abstract readonly name: string;

  /**
   * Description of what the procedure does.
   */
  abstract readonly description: string;

  /**
   * Zod schema for procedure parameters.
   */
  abstract readonly parameters: z.ZodObject<z.ZodRawShape>;

  /**
   * Execute the procedure with validated parameters. The result must be
   * JSON-serializable.
   */
  abstract execute(params: Record<string, unknown>): Promise<unknown>;

  /**
   * Validate raw parameters and execute.
   */
  async invoke(raw: unknown): Promise<unknown> {
    const parsed = this.parameters.safeParse(raw ?? {});
    if (!parsed.success) {
      const message = parsed.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join("; ");
      throw new InvalidParamsError(this.name, message);
    }
    return this.execute(parsed.data);
  }

  toSchema(): ProcedureSchema {
    return {
      name: this.name,
      description: this.description,
      parameters: zodToJsonSchema(this.parameters),
    };
  }
}

/**
 * Convert a Zod object schema to JSON Schema format.
 */
function zodToJsonSchema(schema: z.ZodObject<z.ZodRawShape>): Record<string, unknown> {
  const properties: Record<string, unknown> = {};
  const required: string[] = [];

  for (const [key, value] of Object.entries(schema.shape)) {
    properties[key] = zodFieldToJsonSchema(value);
    if (!(value instanceof z.ZodOptional) && !(value instanceof z.ZodDefault)) {
      required.push(key);
    }
  }

  return { type: "object", properties, required };
}

/**
 * Convert a Zod field to JSON Schema format.
 */
function zodFieldToJsonSchema(field: z.ZodTypeAny): Record<string, unknown> {
  if (field instanceof z.ZodOptional) {
    return zodFieldToJsonSchema(field.unwrap());
  }

  if (field instanceof z.ZodDefault) {
    const inner = zodFieldToJsonSchema(field._def.innerType);
    inner.default = field._def.defaultValue();
    return inner;
  }

  // Transforms publish the wire type
  if (field instanceof z.ZodEffects) {
    const inner = zodFieldToJsonSchema(field.innerType());
    if (field.description) inner.description = field.description;
    return inner;
  }

  const described = (type: string): Record<string, unknown> =>
    field.description ? { type, description: field.description } : { type };

  if (field instanceof z.ZodString) return described("string");
  if (field instanceof z.ZodNumber) return described("number");
  if (field instanceof z.ZodBoolean) return described("boolean");

  if (field instanceof z.ZodEnum) {
    return { type: "string", enum: field._def.values };
  }

  if (field instanceof z.ZodArray) {
    return { type: "array", items: zodFieldToJsonSchema(field.element) };
  }

  return { type: "string" };
}
