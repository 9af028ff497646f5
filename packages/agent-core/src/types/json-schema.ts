import { z } from 'zod';

/**
 * JSON Schema type definitions for tool parameters.
 *
 * A discriminated union covering the subset of JSON Schema that tool parameter declarations use:
 * named, typed fields that are either required or optional.
 */

type SchemaBase = {
  title?: string;
  description?: string;
};

type StringSchema = SchemaBase & {
  type: 'string';
  enum?: string[];
  default?: string;
  minLength?: number;
  maxLength?: number;
};

type NumericSchema = SchemaBase & {
  type: 'number' | 'integer';
  enum?: number[];
  default?: number;
  minimum?: number;
  maximum?: number;
};

type BooleanSchema = SchemaBase & {
  type: 'boolean';
  default?: boolean;
};

type ArraySchema = SchemaBase & {
  type: 'array';
  items: JsonSchemaDefinition | JsonSchemaDefinition[];
  minItems?: number;
  maxItems?: number;
};

type ObjectSchema = SchemaBase & {
  type: 'object';
  properties?: Record<string, JsonSchemaDefinition>;
  required?: string[];
  additionalProperties?: boolean | JsonSchemaDefinition;
};

export type JsonSchemaDefinition =
  | StringSchema
  | NumericSchema
  | BooleanSchema
  | ArraySchema
  | ObjectSchema;

// The root of a tool's parameter schema is always an object
export type ToolInputSchema = ObjectSchema;

const NestedSchema = z.custom<JsonSchemaDefinition>(value => typeof value === 'object' && value !== null && !Array.isArray(value));

/**
 * Structural check for parameter schemas received from remote tool servers. Only the root is
 * checked here; nested definitions are left to the ajv compile step in the executor.
 */
export const ToolInputSchemaSchema = z.object({
  type: z.literal('object'),
  title: z.string().optional(),
  description: z.string().optional(),
  properties: z.record(z.string(), NestedSchema).optional(),
  required: z.array(z.string()).optional(),
  additionalProperties: z.union([z.boolean(), NestedSchema]).optional(),
}).passthrough();
