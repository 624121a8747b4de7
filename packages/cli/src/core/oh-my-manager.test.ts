import { describe, it, expect } from "vitest";
import type { ConfigDocument } from "@ocfg/core";
import {
  addPresetCategory,
  addPresetOhMyAgent,
  deleteCategory,
  deleteOhMyAgent,
  listCategories,
  listOhMyAgents,
  setCategory,
  setOhMyAgent,
} from "./oh-my-manager.js";

describe("oh-my-manager", () => {
  it("sets and replaces agents, keeping unknown fields", () => {
    const doc: ConfigDocument = { agents: { oracle: { model: "openai/gpt-5", extra: 1 } } };
    setOhMyAgent(doc, "oracle", { model: "anthropic/claude-opus-4-5-20251101", description: "Architect" });
    expect(doc.agents).toEqual({
      oracle: { model: "anthropic/claude-opus-4-5-20251101", extra: 1, description: "Architect" },
    });
    expect(listOhMyAgents(doc)).toEqual([
      { name: "oracle", model: "anthropic/claude-opus-4-5-20251101", description: "Architect", valid: true },
    ]);
  });

  it("adds preset agents with their descriptions", () => {
    const doc: ConfigDocument = {};
    addPresetOhMyAgent(doc, "librarian", "google/gemini-3-pro");
    expect(doc.agents).toEqual({
      librarian: {
        model: "google/gemini-3-pro",
        description: "Multi-repository analysis and documentation lookup expert for external resources",
      },
    });
    expect(() => addPresetOhMyAgent(doc, "wizard")).toThrow('Unknown preset agent "wizard"');
  });

  it("deletes agents", () => {
    const doc: ConfigDocument = { agents: { a: {} } };
    deleteOhMyAgent(doc, "a");
    expect(doc.agents).toEqual({});
    expect(() => deleteOhMyAgent(doc, "a")).toThrow('Agent "a" not found');
  });

  it("rounds category temperature to one decimal", () => {
    const doc: ConfigDocument = {};
    setCategory(doc, "visual", { model: "google/gemini-3-pro", temperature: 0.66, description: "UI" });
    expect(doc.categories).toEqual({ visual: { model: "google/gemini-3-pro", temperature: 0.7, description: "UI" } });
    expect(() => setCategory(doc, "visual", { temperature: -1 })).toThrow("Temperature must be between 0 and 2");
  });

  it("adds preset categories and lists them", () => {
    const doc: ConfigDocument = {};
    addPresetCategory(doc, "business-logic", "openai/gpt-5");
    expect(listCategories(doc)).toEqual([
      {
        name: "business-logic",
        model: "openai/gpt-5",
        temperature: 0.1,
        description: "Backend logic, architecture and strategic reasoning",
        valid: true,
      },
    ]);
    deleteCategory(doc, "business-logic");
    expect(listCategories(doc)).toEqual([]);
    expect(() => addPresetCategory(doc, "nope")).toThrow('Unknown preset category "nope"');
  });
});
