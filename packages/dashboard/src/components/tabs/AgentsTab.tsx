import { useState } from "react";
import { Plus, Sparkles, Trash2 } from "lucide-react";
import { addAgent, addPresetAgent, fetchAgents, fetchModelRefs, fetchPresetAgents, removeAgent } from "@/lib/api";
import { useFetch } from "@/hooks/useFetch";
import { useResource } from "@/hooks/useResource";
import { useToggle } from "@/hooks/useToggle";
import { useDashboardStore } from "@/stores/dashboard-store";
import type { AgentMode } from "@/types";
import { ConfirmDialog } from "../ConfirmDialog";
import { FormDialog, optional, optionalNumber } from "../FormDialog";
import { AsyncView, Badge, Button, DataTable, Section } from "../ui";

const AGENT_MODES: AgentMode[] = ["primary", "subagent", "all"];

function isAgentMode(value: string): value is AgentMode {
  return AGENT_MODES.some((m) => m === value);
}

export function AgentsTab() {
  const mutate = useDashboardStore((s) => s.mutate);
  const { data, loading, error } = useResource(fetchAgents);
  const presets = useFetch(fetchPresetAgents);
  const refs = useResource(fetchModelRefs);
  const adding = useToggle();
  const [removing, setRemoving] = useState<string | null>(null);

  return (
    <div>
      <Section
        title="Agents"
        actions={<Button variant="primary" onClick={adding.toggle}><Plus size={14} /> Add agent</Button>}
      >
        <AsyncView loading={loading} error={error} data={data}>
          {(agents) => (
            <DataTable
              headers={["Name", "Mode", "Model", "Description", ""]}
              empty="No agents configured."
              rows={agents.map((a) => [
                <span className="font-medium">
                  {a.name} {a.disabled && <Badge>disabled</Badge>} {!a.valid && <Badge tone="error">invalid</Badge>}
                </span>,
                <Badge>{a.mode}</Badge>,
                <code className="text-xs">{a.model ?? ""}</code>,
                a.description,
                <Button variant="danger" aria-label={`Remove ${a.name}`} onClick={() => setRemoving(a.name)}>
                  <Trash2 size={14} />
                </Button>,
              ])}
            />
          )}
        </AsyncView>
      </Section>

      <Section title="Preset agents">
        <div className="flex flex-wrap gap-2">
          {(presets.data ?? []).map((preset) => (
            <Button key={preset} onClick={() => void mutate(`Agent "${preset}" added`, () => addPresetAgent(preset))}>
              <Sparkles size={14} /> {preset}
            </Button>
          ))}
        </div>
      </Section>

      {adding.state && (
        <FormDialog
          title="Add agent"
          fields={[
            { key: "name", label: "Name", required: true },
            { key: "description", label: "Description", required: true },
            { key: "mode", label: "Mode", type: "select", options: AGENT_MODES },
            { key: "model", label: "Model (provider/model)", suggestions: refs.data ?? [] },
            { key: "temperature", label: "Temperature", type: "number" },
            { key: "prompt", label: "Prompt", type: "textarea" },
          ]}
          submitLabel="Add"
          onClose={() => adding.set(false)}
          onSubmit={(v) =>
            mutate(`Agent "${v.name.trim()}" added`, () =>
              addAgent({
                name: v.name.trim(),
                description: v.description.trim(),
                mode: isAgentMode(v.mode) ? v.mode : undefined,
                model: optional(v.model),
                temperature: optionalNumber(v.temperature),
                prompt: optional(v.prompt),
              }),
            )
          }
        />
      )}

      {removing && (
        <ConfirmDialog
          title={`Remove ${removing}?`}
          description="The agent is deleted from opencode.json."
          onClose={() => setRemoving(null)}
          onConfirm={() => void mutate(`Agent "${removing}" removed`, () => removeAgent(removing))}
        />
      )}
    </div>
  );
}
