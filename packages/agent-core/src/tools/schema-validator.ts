import Ajv, { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';

import { ValidationError, errorMessage } from '../errors.js';
import { ToolInputSchema } from '../types/json-schema.js';

/**
 * Validates tool arguments against the tool's declared JSON Schema.
 * Compiled validators are cached per schema object.
 */
export class SchemaValidator {
  private ajv: Ajv;
  private compiled = new WeakMap<ToolInputSchema, ValidateFunction>();

  constructor() {
    this.ajv = new Ajv({ allErrors: true, strict: false });
    addFormats(this.ajv);
  }

  validate(toolName: string, schema: ToolInputSchema, args: Record<string, unknown>): void {
    let validator = this.compiled.get(schema);
    if (!validator) {
      try {
        validator = this.ajv.compile(schema);
      } catch (error) {
        throw new ValidationError(`Tool ${toolName} has an invalid parameter schema: ${errorMessage(error)}`);
      }
      this.compiled.set(schema, validator);
    }

    if (!validator(args)) {
      const details = (validator.errors ?? []).map(err => `${err.instancePath || '(root)'} ${err.message ?? 'is invalid'}`.trim());
      throw new ValidationError(`Invalid arguments for ${toolName}: ${details.join('; ')}`, details);
    }
  }
}
