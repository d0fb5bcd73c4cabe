// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/services/elicitation`
 * Purpose: Turns an elicitation's requestedSchema into typed form fields, validates submitted values, builds responses.
 * Scope: Pure functions. Rendering and collecting input belong to the embedding UI.
 * Invariants:
 *   - Field order follows the schema's `properties` order
 *   - Empty string or missing value is valid for optional fields
 *   - Validation returns the first failing rule per field
 *   - Responses carry `content` only for a non-empty accept
 * Side-effects: none
 * Links: agentic-loop.ts (elicitation handler), adapters/server/mcp/json-rpc.ts
 * @public
 */

import type {
  ElicitationAction,
  ElicitationContentValue,
  ElicitationResponse,
} from "@agent-relay/ai-core";
import { z } from "zod";

export type FormFieldType =
  | "text"
  | "number"
  | "integer"
  | "boolean"
  | "singleSelect"
  | "multiSelect";

export interface FormFieldOption {
  readonly value: string;
  readonly label: string;
}

export interface ElicitationFormField {
  readonly name: string;
  readonly label: string;
  readonly type: FormFieldType;
  readonly required: boolean;
  readonly description?: string;
  readonly defaultValue?: unknown;
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly pattern?: RegExp;
  readonly format?: string;
  readonly minimum?: number;
  readonly maximum?: number;
  readonly options?: readonly FormFieldOption[];
  readonly minItems?: number;
  readonly maxItems?: number;
}

export interface ElicitationForm {
  readonly fields: readonly ElicitationFormField[];
}

const ConstOptionSchema = z.object({ const: z.unknown(), title: z.string().optional() });

const PropertySchema = z.object({
  type: z.string().optional(),
  title: z.string().optional(),
  description: z.string().optional(),
  default: z.unknown().optional(),
  minLength: z.number().int().optional(),
  maxLength: z.number().int().optional(),
  pattern: z.string().optional(),
  format: z.string().optional(),
  minimum: z.number().optional(),
  maximum: z.number().optional(),
  enum: z.array(z.unknown()).optional(),
  oneOf: z.array(ConstOptionSchema).optional(),
  items: z
    .object({
      enum: z.array(z.unknown()).optional(),
      anyOf: z.array(ConstOptionSchema).optional(),
    })
    .optional(),
  minItems: z.number().int().optional(),
  maxItems: z.number().int().optional(),
});

type PropertyDefinition = z.infer<typeof PropertySchema>;

const RequestedSchema = z.object({
  properties: z.record(z.unknown()).default({}),
  required: z.array(z.string()).default([]),
});

const EMAIL_PATTERN = /^[\w\-.]+@([\w-]+\.)+[\w-]{2,4}$/;

function fieldType(property: PropertyDefinition): FormFieldType {
  switch (property.type) {
    case "boolean":
      return "boolean";
    case "number":
      return "number";
    case "integer":
      return "integer";
    case "array":
      return "multiSelect";
    default:
      return property.enum !== undefined || property.oneOf !== undefined
        ? "singleSelect"
        : "text";
  }
}

function plainOptions(values: readonly unknown[]): FormFieldOption[] {
  return values.map((value) => ({ value: String(value), label: String(value) }));
}

function titledOptions(
  options: readonly z.infer<typeof ConstOptionSchema>[]
): FormFieldOption[] {
  return options.map((option) => {
    const value = String(option.const);
    return { value, label: option.title ?? value };
  });
}

function fieldOptions(
  property: PropertyDefinition,
  type: FormFieldType
): FormFieldOption[] | undefined {
  if (property.enum !== undefined) return plainOptions(property.enum);
  if (property.oneOf !== undefined) return titledOptions(property.oneOf);
  if (type === "multiSelect" && property.items !== undefined) {
    if (property.items.enum !== undefined) return plainOptions(property.items.enum);
    if (property.items.anyOf !== undefined) return titledOptions(property.items.anyOf);
  }
  return undefined;
}

/** Unusable patterns are dropped rather than failing the whole form. */
function compilePattern(source: string | undefined): RegExp | undefined {
  if (source === undefined) return undefined;
  try {
    return new RegExp(source);
  } catch (error) {
    if (error instanceof SyntaxError) return undefined;
    throw error;
  }
}

export function parseFormField(
  name: string,
  rawProperty: unknown,
  required: boolean
): ElicitationFormField {
  const parsed = PropertySchema.safeParse(rawProperty);
  const property: PropertyDefinition = parsed.success ? parsed.data : {};
  const type = fieldType(property);
  const options = fieldOptions(property, type);
  const pattern = compilePattern(property.pattern);

  return {
    name,
    label: property.title ?? name,
    type,
    required,
    ...(property.description !== undefined && { description: property.description }),
    ...(property.default !== undefined && { defaultValue: property.default }),
    ...(property.minLength !== undefined && { minLength: property.minLength }),
    ...(property.maxLength !== undefined && { maxLength: property.maxLength }),
    ...(pattern !== undefined && { pattern }),
    ...(property.format !== undefined && { format: property.format }),
    ...(property.minimum !== undefined && { minimum: property.minimum }),
    ...(property.maximum !== undefined && { maximum: property.maximum }),
    ...(options !== undefined && { options }),
    ...(property.minItems !== undefined && { minItems: property.minItems }),
    ...(property.maxItems !== undefined && { maxItems: property.maxItems }),
  };
}

export function parseElicitationForm(
  requestedSchema: Record<string, unknown> | undefined
): ElicitationForm {
  const parsed = RequestedSchema.safeParse(requestedSchema ?? {});
  if (!parsed.success) return { fields: [] };
  const required = new Set(parsed.data.required);
  return {
    fields: Object.entries(parsed.data.properties).map(([name, property]) =>
      parseFormField(name, property, required.has(name))
    ),
  };
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function validateText(field: ElicitationFormField, value: unknown): string | undefined {
  if (typeof value !== "string") return "Must be a string";
  if (field.minLength !== undefined && value.length < field.minLength) {
    return `Minimum length is ${field.minLength}`;
  }
  if (field.maxLength !== undefined && value.length > field.maxLength) {
    return `Maximum length is ${field.maxLength}`;
  }
  if (field.pattern !== undefined && !field.pattern.test(value)) {
    return "Does not match required pattern";
  }
  if (field.format === "email" && !EMAIL_PATTERN.test(value)) {
    return "Must be a valid email address";
  }
  if (field.format === "uri" && !URL.canParse(value)) {
    return "Must be a valid URI";
  }
  return undefined;
}

function validateNumber(field: ElicitationFormField, value: unknown): string | undefined {
  const numeric = toNumber(value);
  if (numeric === undefined) {
    return field.type === "integer" ? "Must be an integer" : "Must be a number";
  }
  if (field.type === "integer" && !Number.isInteger(numeric)) return "Must be an integer";
  if (field.minimum !== undefined && numeric < field.minimum) {
    return `Minimum value is ${field.minimum}`;
  }
  if (field.maximum !== undefined && numeric > field.maximum) {
    return `Maximum value is ${field.maximum}`;
  }
  return undefined;
}

function validateMultiSelect(field: ElicitationFormField, value: unknown): string | undefined {
  if (!Array.isArray(value)) return "Must be a list";
  if (field.minItems !== undefined && value.length < field.minItems) {
    return `Must select at least ${field.minItems} items`;
  }
  if (field.maxItems !== undefined && value.length > field.maxItems) {
    return `Must select at most ${field.maxItems} items`;
  }
  if (field.options !== undefined) {
    const allowed = new Set(field.options.map((option) => option.value));
    const invalid = value.find((item: unknown) => !allowed.has(String(item)));
    if (invalid !== undefined) return `Invalid option: ${String(invalid)}`;
  }
  return undefined;
}

/** First failing rule for one field, or undefined when the value is acceptable. */
export function validateFormField(
  field: ElicitationFormField,
  value: unknown
): string | undefined {
  const empty = value === undefined || value === null || value === "";
  if (empty) return field.required ? "This field is required" : undefined;

  switch (field.type) {
    case "text":
      return validateText(field, value);
    case "number":
    case "integer":
      return validateNumber(field, value);
    case "boolean":
      return typeof value === "boolean" ? undefined : "Must be true or false";
    case "singleSelect":
      if (
        field.options !== undefined &&
        !field.options.some((option) => option.value === String(value))
      ) {
        return `Must be one of: ${field.options.map((option) => option.value).join(", ")}`;
      }
      return undefined;
    case "multiSelect":
      return validateMultiSelect(field, value);
  }
}

export function validateElicitationForm(
  form: ElicitationForm,
  values: Readonly<Record<string, unknown>>
): Record<string, string> {
  const errors: Record<string, string> = {};
  for (const field of form.fields) {
    const error = validateFormField(field, values[field.name]);
    if (error !== undefined) errors[field.name] = error;
  }
  return errors;
}

function coerceValue(
  field: ElicitationFormField,
  value: unknown
): ElicitationContentValue | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  switch (field.type) {
    case "number":
    case "integer":
      return toNumber(value);
    case "boolean":
      return typeof value === "boolean" ? value : undefined;
    case "multiSelect":
      return Array.isArray(value) ? value.map((item: unknown) => String(item)) : undefined;
    case "text":
    case "singleSelect":
      return String(value);
  }
}

export type ElicitationSubmission =
  | { readonly ok: true; readonly response: ElicitationResponse }
  | { readonly ok: false; readonly errors: Readonly<Record<string, string>> };

/** Validate and turn form values into an accept response with typed content. */
export function submitElicitationForm(
  form: ElicitationForm,
  values: Readonly<Record<string, unknown>>
): ElicitationSubmission {
  const errors = validateElicitationForm(form, values);
  if (Object.keys(errors).length > 0) return { ok: false, errors };

  const content: Record<string, ElicitationContentValue> = {};
  for (const field of form.fields) {
    const coerced = coerceValue(field, values[field.name]);
    if (coerced !== undefined) content[field.name] = coerced;
  }
  return { ok: true, response: elicitationResponse("accept", content) };
}

export function elicitationResponse(
  action: ElicitationAction,
  content?: Readonly<Record<string, ElicitationContentValue>>
): ElicitationResponse {
  return action === "accept" && content !== undefined && Object.keys(content).length > 0
    ? { action, content }
    : { action };
}
