import { useState } from "react";
import { Sparkles, Trash2 } from "lucide-react";
import {
  addOhMyPresetAgent,
  addPresetCategory,
  fetchCategories,
  fetchModelRefs,
  fetchOhMyAgents,
  fetchOhMyPresets,
  removeCategory,
  removeOhMyAgent,
  setCategory,
  setOhMyAgent,
} from "@/lib/api";
import { useFetch } from "@/hooks/useFetch";
import { useResource } from "@/hooks/useResource";
import { useDashboardStore } from "@/stores/dashboard-store";
import { FormDialog, optional, optionalNumber } from "../FormDialog";
import { AsyncView, Badge, Button, DataTable, Section } from "../ui";

type Editing = { kind: "agent" | "category"; name: string; model: string; temperature?: number };

export function OhMyTab() {
  const mutate = useDashboardStore((s) => s.mutate);
  const agents = useResource(fetchOhMyAgents);
  const categories = useResource(fetchCategories);
  const presets = useFetch(fetchOhMyPresets);
  const refs = useResource(fetchModelRefs);
  const [editing, setEditing] = useState<Editing | null>(null);
  const [presetModel, setPresetModel] = useState("");

  const agentNames = new Set((agents.data ?? []).map((a) => a.name));
  const categoryNames = new Set((categories.data ?? []).map((c) => c.name));
  const missingAgents = Object.keys(presets.data?.agents ?? {}).filter((n) => !agentNames.has(n));
  const missingCategories = Object.keys(presets.data?.categories ?? {}).filter((n) => !categoryNames.has(n));

  return (
    <div>
      <Section title="Oh My OpenCode agents">
        <AsyncView loading={agents.loading} error={agents.error} data={agents.data}>
          {(list) => (
            <DataTable
              headers={["Agent", "Model", "Description", ""]}
              empty="No agents in oh-my-opencode.json."
              rows={list.map((a) => [
                <span className="font-medium">{a.name} {!a.valid && <Badge tone="error">invalid</Badge>}</span>,
                <button className="hover:underline" onClick={() => setEditing({ kind: "agent", name: a.name, model: a.model })}>
                  <code className="text-xs">{a.model || "(unset)"}</code>
                </button>,
                a.description,
                <Button
                  variant="danger"
                  aria-label={`Remove ${a.name}`}
                  onClick={() => void mutate(`Agent "${a.name}" removed`, () => removeOhMyAgent(a.name))}
                >
                  <Trash2 size={14} />
                </Button>,
              ])}
            />
          )}
        </AsyncView>
      </Section>

      <Section title="Categories">
        <AsyncView loading={categories.loading} error={categories.error} data={categories.data}>
          {(list) => (
            <DataTable
              headers={["Category", "Model", "Temperature", "Description", ""]}
              empty="No categories in oh-my-opencode.json."
              rows={list.map((c) => [
                <span className="font-medium">{c.name} {!c.valid && <Badge tone="error">invalid</Badge>}</span>,
                <button
                  className="hover:underline"
                  onClick={() => setEditing({ kind: "category", name: c.name, model: c.model, temperature: c.temperature })}
                >
                  <code className="text-xs">{c.model || "(unset)"}</code>
                </button>,
                c.temperature ?? "",
                c.description,
                <Button
                  variant="danger"
                  aria-label={`Remove ${c.name}`}
                  onClick={() => void mutate(`Category "${c.name}" removed`, () => removeCategory(c.name))}
                >
                  <Trash2 size={14} />
                </Button>,
              ])}
            />
          )}
        </AsyncView>
      </Section>

      {(missingAgents.length > 0 || missingCategories.length > 0) && (
        <Section title="Presets">
          <label className="mb-3 block text-sm">
            <span className="mb-1 block text-muted-foreground">Model for presets (provider/model)</span>
            <input
              aria-label="Preset model"
              className="w-80 rounded-md border border-border bg-muted px-2 py-1 text-sm"
              value={presetModel}
              list="preset-model-refs"
              onChange={(e) => setPresetModel(e.target.value)}
            />
            <datalist id="preset-model-refs">
              {(refs.data ?? []).map((ref) => (
                <option key={ref} value={ref} />
              ))}
            </datalist>
          </label>
          <div className="flex flex-wrap gap-2">
            {missingAgents.map((name) => (
              <Button
                key={name}
                onClick={() => void mutate(`Agent "${name}" added`, () => addOhMyPresetAgent(name, optional(presetModel)))}
              >
                <Sparkles size={14} /> {name}
              </Button>
            ))}
            {missingCategories.map((name) => (
              <Button
                key={name}
                onClick={() => void mutate(`Category "${name}" added`, () => addPresetCategory(name, optional(presetModel)))}
              >
                <Sparkles size={14} /> {name}
              </Button>
            ))}
          </div>
        </Section>
      )}

      {editing && (
        <FormDialog
          title={`Edit ${editing.name}`}
          fields={[
            { key: "model", label: "Model (provider/model)", required: true, defaultValue: editing.model, suggestions: refs.data ?? [] },
            ...(editing.kind === "category"
              ? [{ key: "temperature", label: "Temperature", type: "number" as const, defaultValue: editing.temperature?.toString() }]
              : []),
          ]}
          onClose={() => setEditing(null)}
          onSubmit={(v) =>
            mutate(`${editing.name} updated`, () =>
              editing.kind === "agent"
                ? setOhMyAgent(editing.name, v.model.trim())
                : setCategory(editing.name, { model: v.model.trim(), temperature: optionalNumber(v.temperature) }),
            )
          }
        />
      )}
    </div>
  );
}
