/**
 * Capability argument validation and tool declaration rendering.
 *
 * The same InputSchema drives both: the JSON schema advertised to the model
 * and the check applied to whatever the model sends back.
 */

import type { Tool } from '@anthropic-ai/sdk/resources/messages';
import type { CapabilityDescriptor, FieldSpec, InputSchema } from './types.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkType(path: string, value: unknown, spec: FieldSpec): string | null {
  switch (spec.type) {
    case 'array':
      return Array.isArray(value) ? null : `${path} must be an array.`;
    case 'object':
      return isRecord(value) ? null : `${path} must be an object.`;
    case 'integer':
      return Number.isInteger(value) ? null : `${path} must be an integer.`;
    default:
      return typeof value === spec.type ? null : `${path} must be a ${spec.type}.`;
  }
}

function validateField(path: string, value: unknown, spec: FieldSpec, issues: string[]): void {
  const typeError = checkType(path, value, spec);
  if (typeError) {
    issues.push(typeError);
    return;
  }

  // Non-empty string check
  const nonEmpty = spec.nonEmpty ?? (spec.required && spec.type === 'string');
  if (nonEmpty && typeof value === 'string' && !value.trim()) {
    issues.push(`${path} must be a non-empty string.`);
    return;
  }

  if (spec.enum && typeof value === 'string' && !spec.enum.includes(value)) {
    issues.push(`${path} must be one of: ${spec.enum.join(', ')}.`);
    return;
  }

  if (spec.items && Array.isArray(value)) {
    value.forEach((item, index) => {
      if (spec.items) validateField(`${path}[${index}]`, item, spec.items, issues);
    });
  }

  if (spec.properties && isRecord(value)) {
    collectIssues(value, spec.properties, issues, `${path}.`);
  }

  if (spec.validate) {
    const customError = spec.validate(value);
    if (customError) issues.push(customError);
  }
}

function collectIssues(
  input: Record<string, unknown>,
  schema: InputSchema,
  issues: string[],
  prefix: string
): void {
  for (const key of Object.keys(input)) {
    if (!(key in schema)) {
      issues.push(`${prefix}${key} is not a recognized field.`);
    }
  }

  for (const [field, spec] of Object.entries(schema)) {
    const value = input[field];
    const path = `${prefix}${field}`;

    if (value === undefined || value === null) {
      if (spec.required) issues.push(`${path} is required.`);
      continue;
    }

    validateField(path, value, spec, issues);
  }
}

/**
 * Validate capability arguments against an input schema.
 * Returns every problem found; an empty list means the input is valid.
 */
export function validateArguments(input: unknown, schema: InputSchema): string[] {
  if (!isRecord(input)) {
    return ['arguments must be an object.'];
  }
  const issues: string[] = [];
  collectIssues(input, schema, issues, '');
  return issues;
}

function toJsonSchemaProperty(spec: FieldSpec): Record<string, unknown> {
  const property: Record<string, unknown> = {
    type: spec.type,
  };
  if (spec.description) property.description = spec.description;
  if (spec.enum) property.enum = [...spec.enum];
  if (spec.items) property.items = toJsonSchemaProperty(spec.items);
  if (spec.properties) {
    property.properties = toJsonSchemaProperties(spec.properties);
    property.required = requiredFields(spec.properties);
    property.additionalProperties = false;
  }
  return property;
}

function toJsonSchemaProperties(schema: InputSchema): Record<string, Record<string, unknown>> {
  return Object.fromEntries(
    Object.entries(schema).map(([field, spec]) => [field, toJsonSchemaProperty(spec)])
  );
}

function requiredFields(schema: InputSchema): string[] {
  return Object.entries(schema)
    .filter(([, spec]) => spec.required)
    .map(([field]) => field);
}

/**
 * Render a capability as a tool declaration for the model.
 */
export function toToolDeclaration(descriptor: CapabilityDescriptor): Tool {
  return {
    name: descriptor.name,
    description: descriptor.description,
    input_schema: {
      type: 'object' as const,
      properties: toJsonSchemaProperties(descriptor.inputSchema),
      required: requiredFields(descriptor.inputSchema),
      additionalProperties: false,
    },
  };
}
