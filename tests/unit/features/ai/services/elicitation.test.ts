// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/services/elicitation`
 * Purpose: Verifies schema → form field parsing, per-field validation messages and response building.
 * Scope: Pure functions only.
 * Side-effects: none
 * Links: src/features/ai/services/elicitation.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  elicitationResponse,
  parseElicitationForm,
  parseFormField,
  submitElicitationForm,
  validateFormField,
} from "@/features/ai/services/elicitation";

const signupSchema = {
  type: "object",
  properties: {
    name: { type: "string", title: "Full name", minLength: 2 },
    age: { type: "integer", minimum: 18 },
    color: { type: "string", enum: ["red", "blue"] },
    plan: { type: "string", oneOf: [{ const: "pro", title: "Pro plan" }] },
    tags: { type: "array", items: { enum: ["a", "b"] }, maxItems: 1 },
    subscribe: { type: "boolean", default: false },
  },
  required: ["name", "age"],
};

describe("parseElicitationForm", () => {
  it("builds fields in property order with their constraints", () => {
    const form = parseElicitationForm(signupSchema);

    expect(form.fields).toEqual([
      { name: "name", label: "Full name", type: "text", required: true, minLength: 2 },
      { name: "age", label: "age", type: "integer", required: true, minimum: 18 },
      {
        name: "color",
        label: "color",
        type: "singleSelect",
        required: false,
        options: [
          { value: "red", label: "red" },
          { value: "blue", label: "blue" },
        ],
      },
      {
        name: "plan",
        label: "plan",
        type: "singleSelect",
        required: false,
        options: [{ value: "pro", label: "Pro plan" }],
      },
      {
        name: "tags",
        label: "tags",
        type: "multiSelect",
        required: false,
        options: [
          { value: "a", label: "a" },
          { value: "b", label: "b" },
        ],
        maxItems: 1,
      },
      { name: "subscribe", label: "subscribe", type: "boolean", required: false, defaultValue: false },
    ]);
  });

  it("returns no fields for a missing or malformed schema", () => {
    expect(parseElicitationForm(undefined)).toEqual({ fields: [] });
    expect(parseElicitationForm({ properties: "nope" })).toEqual({ fields: [] });
  });

  it("drops a pattern that does not compile", () => {
    const field = parseFormField("code", { type: "string", pattern: "[" }, false);

    expect(field.pattern).toBeUndefined();
  });
});

describe("validateFormField", () => {
  const form = parseElicitationForm(signupSchema);
  const field = (name: string) => {
    const found = form.fields.find((candidate) => candidate.name === name);
    if (!found) throw new Error(`no field ${name}`);
    return found;
  };

  it.each([
    ["name", "", "This field is required"],
    ["name", "A", "Minimum length is 2"],
    ["age", "17", "Minimum value is 18"],
    ["age", "18.5", "Must be an integer"],
    ["age", "abc", "Must be an integer"],
    ["color", "green", "Must be one of: red, blue"],
    ["tags", ["a", "b"], "Must select at most 1 items"],
    ["tags", ["c"], "Invalid option: c"],
    ["subscribe", "yes", "Must be true or false"],
  ])("%s = %j → %s", (name, value, message) => {
    expect(validateFormField(field(name), value)).toBe(message);
  });

  it("accepts empty optional values", () => {
    expect(validateFormField(field("color"), "")).toBeUndefined();
  });

  it("checks email and uri formats", () => {
    const email = parseFormField("email", { type: "string", format: "email" }, false);
    const site = parseFormField("site", { type: "string", format: "uri" }, false);

    expect(validateFormField(email, "not-an-email")).toBe("Must be a valid email address");
    expect(validateFormField(email, "ada@example.io")).toBeUndefined();
    expect(validateFormField(site, "not a url")).toBe("Must be a valid URI");
    expect(validateFormField(site, "https://example.com/a")).toBeUndefined();
  });

  it("checks patterns", () => {
    const code = parseFormField("code", { type: "string", pattern: "^[A-Z]+$" }, true);

    expect(validateFormField(code, "abc")).toBe("Does not match required pattern");
    expect(validateFormField(code, "ABC")).toBeUndefined();
  });
});

describe("submitElicitationForm", () => {
  const form = parseElicitationForm(signupSchema);

  it("coerces values into typed accept content", () => {
    const submission = submitElicitationForm(form, {
      name: "Ada",
      age: "42",
      color: "",
      tags: ["a"],
      subscribe: true,
    });

    expect(submission).toEqual({
      ok: true,
      response: {
        action: "accept",
        content: { name: "Ada", age: 42, tags: ["a"], subscribe: true },
      },
    });
  });

  it("returns every field error instead of a response", () => {
    expect(submitElicitationForm(form, {})).toEqual({
      ok: false,
      errors: { name: "This field is required", age: "This field is required" },
    });
  });
});

describe("elicitationResponse", () => {
  it("carries content only for a non-empty accept", () => {
    expect(elicitationResponse("decline", { name: "Ada" })).toEqual({ action: "decline" });
    expect(elicitationResponse("accept", {})).toEqual({ action: "accept" });
    expect(elicitationResponse("accept", { name: "Ada" })).toEqual({
      action: "accept",
      content: { name: "Ada" },
    });
  });
});
