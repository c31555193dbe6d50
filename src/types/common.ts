/**
 * Shared schema types for validating loosely-typed payloads
 * before they become structured requests.
 */

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object' | 'date';

export interface FieldSchema {
  type: FieldType;
  required: boolean;
  min?: number;
  max?: number;
  maxLength?: number;
  enum?: readonly string[];
}

export type BodySchema = Record<string, FieldSchema>;
