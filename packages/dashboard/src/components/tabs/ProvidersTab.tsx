import { useState } from "react";
import { Plus, Trash2 } from "lucide-react";
import { addModel, addProvider, fetchModels, fetchPresetModels, fetchProviders, fetchSdks, removeModel, removeProvider } from "@/lib/api";
import { useFetch } from "@/hooks/useFetch";
import { useResource } from "@/hooks/useResource";
import { useToggle } from "@/hooks/useToggle";
import { cn } from "@/lib/utils";
import { useDashboardStore } from "@/stores/dashboard-store";
import type { ProviderSummary } from "@/types";
import { ConfirmDialog } from "../ConfirmDialog";
import { FormDialog, optional, optionalNumber, type FieldSpec } from "../FormDialog";
import { AsyncView, Badge, Button, DataTable, Section } from "../ui";

function providerFields(sdks: string[]): FieldSpec[] {
  return [
    { key: "name", label: "Name", required: true, placeholder: "my-provider" },
    { key: "displayName", label: "Display name" },
    { key: "npm", label: "SDK package (blank picks one)", type: "select", options: ["", ...sdks] },
    { key: "baseURL", label: "Base URL", placeholder: "https://api.example.com/v1" },
    { key: "apiKey", label: "API key", type: "password", placeholder: "{env:MY_API_KEY}" },
    { key: "timeout", label: "Timeout (ms)", type: "number" },
  ];
}

export function ProvidersTab() {
  const mutate = useDashboardStore((s) => s.mutate);
  const { data, loading, error } = useResource(fetchProviders);
  const sdks = useFetch(fetchSdks);
  const adding = useToggle();
  const [selected, setSelected] = useState<string | null>(null);
  const [removing, setRemoving] = useState<string | null>(null);

  return (
    <div>
      <Section
        title="Providers"
        actions={<Button variant="primary" onClick={adding.toggle}><Plus size={14} /> Add provider</Button>}
      >
        <AsyncView loading={loading} error={error} data={data}>
          {(providers) => (
            <DataTable
              headers={["Name", "SDK", "Base URL", "Key", "Models", ""]}
              empty="No custom providers configured."
              rows={providers.map((p) => providerRow(p, selected === p.name, setSelected, setRemoving))}
            />
          )}
        </AsyncView>
      </Section>

      {selected && <ModelsPanel provider={selected} />}

      {adding.state && (
        <FormDialog
          title="Add provider"
          fields={providerFields(sdks.data ?? [])}
          submitLabel="Add"
          onClose={() => adding.set(false)}
          onSubmit={(v) => {
            const name = v.name.trim();
            return mutate(`Provider "${name}" added`, () =>
              addProvider({
                name,
                displayName: optional(v.displayName),
                npm: optional(v.npm),
                baseURL: optional(v.baseURL),
                apiKey: optional(v.apiKey),
                timeout: optionalNumber(v.timeout),
              }),
            );
          }}
        />
      )}

      {removing && (
        <ConfirmDialog
          title={`Remove ${removing}?`}
          description="The provider and all of its models are deleted from opencode.json. A backup is taken first."
          onClose={() => setRemoving(null)}
          onConfirm={() => {
            if (selected === removing) setSelected(null);
            void mutate(`Provider "${removing}" removed`, () => removeProvider(removing));
          }}
        />
      )}
    </div>
  );
}

function providerRow(
  p: ProviderSummary,
  active: boolean,
  select: (name: string) => void,
  remove: (name: string) => void,
) {
  return [
    <button className={cn("font-medium hover:underline", active && "text-primary")} onClick={() => select(p.name)}>
      {p.displayName}
      {p.native && <Badge>native</Badge>}
      {!p.valid && <Badge tone="error">invalid</Badge>}
    </button>,
    <code className="text-xs">{p.npm}</code>,
    p.baseURL ?? "",
    p.apiKey ?? "",
    p.modelCount,
    <Button variant="danger" aria-label={`Remove ${p.name}`} onClick={() => remove(p.name)}><Trash2 size={14} /></Button>,
  ];
}

function ModelsPanel({ provider }: { provider: string }) {
  const mutate = useDashboardStore((s) => s.mutate);
  const models = useResource(() => fetchModels(provider), [provider]);
  const presets = useResource(() => fetchPresetModels(provider), [provider]);
  const adding = useToggle();

  const presetIds = (presets.data ?? []).map((p) => p.id);
  const fields: FieldSpec[] = [
    { key: "id", label: "Model ID", required: true, placeholder: presetIds[0] ?? "model-id" },
    { key: "preset", label: "Fill from preset", type: "checkbox", defaultValue: "false" },
    { key: "name", label: "Display name" },
    { key: "context", label: "Context limit", type: "number" },
    { key: "output", label: "Output limit", type: "number" },
    { key: "attachment", label: "Supports attachments", type: "checkbox", defaultValue: "false" },
  ];

  return (
    <Section
      title={`Models of ${provider}`}
      actions={<Button variant="primary" onClick={adding.toggle}><Plus size={14} /> Add model</Button>}
    >
      <AsyncView loading={models.loading} error={models.error} data={models.data}>
        {(list) => (
          <DataTable
            headers={["ID", "Name", "Context", "Output", "Variants", ""]}
            empty="No models yet."
            rows={list.map((m) => [
              <code className="text-xs">{m.id}</code>,
              m.name,
              m.context ?? "",
              m.output ?? "",
              m.variants.join(", "),
              <Button
                variant="danger"
                aria-label={`Remove ${m.id}`}
                onClick={() => void mutate(`Model "${m.id}" removed`, () => removeModel(provider, m.id))}
              >
                <Trash2 size={14} />
              </Button>,
            ])}
          />
        )}
      </AsyncView>
      {presetIds.length > 0 && (
        <p className="mt-2 text-xs text-muted-foreground">Presets: {presetIds.join(", ")}</p>
      )}

      {adding.state && (
        <FormDialog
          title={`Add model to ${provider}`}
          fields={fields}
          submitLabel="Add"
          onClose={() => adding.set(false)}
          onSubmit={(v) =>
            mutate(`Model "${v.id.trim()}" added`, () =>
              addModel(provider, {
                id: v.id.trim(),
                preset: v.preset === "true",
                name: optional(v.name),
                context: optionalNumber(v.context),
                output: optionalNumber(v.output),
                attachment: v.attachment === "true" ? true : undefined,
              }),
            )
          }
        />
      )}
    </Section>
  );
}
