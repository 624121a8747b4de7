import * as fs from "node:fs";
import { ownEntry } from "../utils.js";
import { presetFileSchema, presetModelFileSchema } from "../schema.js";
import type { PresetCategory, PresetModel, PresetOpenCodeAgent, PresetSeries } from "../types.js";

function readData(name: string): unknown {
  return JSON.parse(fs.readFileSync(new URL(`../../data/${name}`, import.meta.url), "utf-8"));
}

const modelData = presetModelFileSchema.parse(readData("preset-models.json"));
const presetData = presetFileSchema.parse(readData("presets.json"));

export const PRESET_SERIES: readonly PresetSeries[] = modelData.series;

export const PRESET_SDKS: readonly string[] = modelData.sdks.map(s => s.npm);

/** SDK package → preset series ids it can serve */
export const SDK_SERIES_COMPATIBILITY: Record<string, string[]> = Object.fromEntries(
  modelData.sdks.map(s => [s.npm, s.series]),
);

export const PRESET_OPENCODE_AGENTS: Record<string, PresetOpenCodeAgent> = presetData.opencodeAgents;

export const PRESET_OH_MY_AGENTS: Record<string, string> = presetData.ohMyAgents;

export const PRESET_CATEGORIES: Record<string, PresetCategory> = presetData.categories;

export interface PresetModelRef {
  series: string;
  id: string;
  model: PresetModel;
}

export function findPresetModel(id: string): PresetModelRef | undefined {
  for (const series of PRESET_SERIES) {
    const model = ownEntry(series.models, id);
    if (model) return { series: series.id, id, model };
  }
  return undefined;
}

export function allPresetModels(): PresetModelRef[] {
  return PRESET_SERIES.flatMap(s => Object.entries(s.models).map(([id, model]) => ({ series: s.id, id, model })));
}

/** Preset models suggested for a provider SDK package */
export function presetModelsForSdk(npm: string): PresetModelRef[] {
  const seriesIds = ownEntry(SDK_SERIES_COMPATIBILITY, npm) ?? [];
  return PRESET_SERIES.filter(s => seriesIds.includes(s.id)).flatMap(s =>
    Object.entries(s.models).map(([id, model]) => ({ series: s.id, id, model })),
  );
}
