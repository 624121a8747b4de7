import { describe, it, expect } from "vitest";
import { getNativeProvider, type ConfigDocument } from "@ocfg/core";
import {
  applyTemplate,
  coerceOptionValue,
  getOptions,
  removeProvider,
  setOptions,
  templateDefaults,
} from "./provider-options-manager.js";

const numberField = { key: "timeout", label: "Timeout", type: "number" as const };
const boolField = { key: "flag", label: "Flag", type: "boolean" as const };

describe("coerceOptionValue", () => {
  it("converts strings to the field type", () => {
    expect(coerceOptionValue(numberField, " 1500 ")).toBe(1500);
    expect(coerceOptionValue(boolField, "Yes")).toBe(true);
    expect(coerceOptionValue(boolField, "0")).toBe(false);
    expect(coerceOptionValue({ key: "s", label: "S", type: "string" }, "  v ")).toBe("v");
  });

  it("treats empty input as a clear", () => {
    expect(coerceOptionValue(numberField, "")).toBeUndefined();
    expect(coerceOptionValue(numberField, null)).toBeUndefined();
  });

  it("rejects values of the wrong type", () => {
    expect(() => coerceOptionValue(numberField, "fast")).toThrow("timeout must be a number");
    expect(() => coerceOptionValue(boolField, "maybe")).toThrow("flag must be true or false");
  });
});

describe("provider options", () => {
  it("template defaults include the timeout default", () => {
    expect(templateDefaults(getNativeProvider("anthropic")).timeout).toBe(300000);
  });

  it("applyTemplate creates the provider entry once", () => {
    const doc: ConfigDocument = {};
    expect(applyTemplate(doc, "groq")).toBe(true);
    expect(applyTemplate(doc, "groq")).toBe(false);
    const groq = getNativeProvider("groq");
    const expectedOptions = groq.baseURL ? { baseURL: groq.baseURL } : {};
    expect(doc.provider).toEqual({ groq: { npm: groq.npm, name: groq.name, options: expectedOptions } });
  });

  it("stores coerced values and reads them over the defaults", () => {
    const doc: ConfigDocument = {};
    setOptions(doc, "anthropic", { timeout: "60000", baseURL: "https://gateway.example.com/v1" });
    const options = getOptions(doc, "anthropic");
    expect(options.timeout).toBe(60000);
    expect(options.baseURL).toBe("https://gateway.example.com/v1");
  });

  it("clears keys given empty values", () => {
    const doc: ConfigDocument = { provider: { anthropic: { options: { timeout: 1000 } } } };
    setOptions(doc, "anthropic", { timeout: "" });
    expect(doc.provider).toEqual({ anthropic: { options: {} } });
  });

  it("rejects unknown keys without changing the document", () => {
    const doc: ConfigDocument = {};
    expect(() => setOptions(doc, "anthropic", { organization: "org" })).toThrow(
      "Unknown option(s) for anthropic: organization",
    );
    expect(doc).toEqual({});
    expect(() => setOptions(doc, "nope", {})).toThrow("Unknown native provider: nope");
  });

  it("removeProvider keeps entries that still hold models", () => {
    const doc: ConfigDocument = {
      provider: { openai: { npm: "@ai-sdk/openai", options: { timeout: 1 }, models: { "gpt-5": {} } }, groq: { options: {} } },
    };
    removeProvider(doc, "openai");
    removeProvider(doc, "groq");
    expect(doc.provider).toEqual({ openai: { npm: "@ai-sdk/openai", models: { "gpt-5": {} } } });
    expect(() => removeProvider(doc, "groq")).toThrow('Provider "groq" not found');
  });
});
