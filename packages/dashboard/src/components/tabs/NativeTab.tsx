import { useState } from "react";
import { Download, KeyRound, Settings2, Trash2 } from "lucide-react";
import {
  fetchAuth,
  fetchEnvDetections,
  fetchNativeProvider,
  fetchNativeProviders,
  importEnvKeys,
  removeApiKey,
  saveNativeOptions,
  setApiKey,
} from "@/lib/api";
import { useResource } from "@/hooks/useResource";
import { useDashboardStore } from "@/stores/dashboard-store";
import type { NativeProviderStatus, NativeProviderTemplate, Status } from "@/types";
import { FormDialog, type FieldSpec } from "../FormDialog";
import { AsyncView, Badge, Button, DataTable, Section, StatusIndicator } from "../ui";

const STATUS_TONE: Record<NativeProviderStatus["status"], Status> = {
  configured: "ok",
  env: "warn",
  none: "idle",
};

function displayValue(value: unknown): string {
  if (value === undefined || value === null) return "";
  return typeof value === "string" ? value : JSON.stringify(value);
}

/** Option form fields, prefilled with the current values */
export function optionFields(template: NativeProviderTemplate, options: Record<string, unknown>): FieldSpec[] {
  return template.optionFields.map((f) => ({
    key: f.key,
    label: f.description ? `${f.label} (${f.description})` : f.label,
    type: f.type === "boolean" ? "select" : f.type === "number" ? "number" : "text",
    options: f.type === "boolean" ? ["", "true", "false"] : undefined,
    defaultValue: displayValue(options[f.key]),
  }));
}

type Editing =
  | { kind: "key"; id: string }
  | { kind: "options"; id: string; template: NativeProviderTemplate; options: Record<string, unknown> };

export function NativeTab() {
  const mutate = useDashboardStore((s) => s.mutate);
  const notify = useDashboardStore((s) => s.notify);
  const providers = useResource(fetchNativeProviders);
  const auth = useResource(fetchAuth);
  const env = useResource(fetchEnvDetections);
  const [editing, setEditing] = useState<Editing | null>(null);

  const openOptions = async (id: string) => {
    try {
      const { template, options } = await fetchNativeProvider(id);
      setEditing({ kind: "options", id, template, options });
    } catch (err) {
      notify({ type: "error", message: err instanceof Error ? err.message : String(err) });
    }
  };

  const importAll = () =>
    mutate("Environment keys imported", async () => {
      const result = await importEnvKeys();
      if (result.imported.length === 0) throw new Error("Nothing to import");
      return result;
    });

  return (
    <div>
      <Section title="Native providers">
        <AsyncView loading={providers.loading} error={providers.error} data={providers.data}>
          {(list) => (
            <DataTable
              headers={["", "Provider", "Status", "Key", "Options", ""]}
              empty="No native providers known."
              rows={list.map((p) => [
                <StatusIndicator status={STATUS_TONE[p.status]} label={p.status} />,
                <span>
                  <span className="font-medium">{p.name}</span> <code className="text-xs text-muted-foreground">{p.id}</code>
                </span>,
                <Badge tone={STATUS_TONE[p.status]}>{p.status}</Badge>,
                p.maskedKey ?? "",
                p.configuredOptions.join(", "),
                <div className="flex gap-1">
                  <Button aria-label={`Set key for ${p.id}`} onClick={() => setEditing({ kind: "key", id: p.id })}>
                    <KeyRound size={14} />
                  </Button>
                  <Button aria-label={`Options for ${p.id}`} onClick={() => void openOptions(p.id)}>
                    <Settings2 size={14} />
                  </Button>
                </div>,
              ])}
            />
          )}
        </AsyncView>
      </Section>

      <Section title="Stored credentials">
        <AsyncView loading={auth.loading} error={auth.error} data={auth.data}>
          {({ entries, error }) => (
            <div>
              {error && <p role="alert" className="mb-2 text-sm text-destructive">auth.json could not be parsed: {error}</p>}
              <DataTable
                headers={["Provider", "Type", "Key", ""]}
                empty="No credentials stored."
                rows={entries.map((e) => [
                  e.providerId,
                  <Badge>{e.type}</Badge>,
                  <code className="text-xs">{e.masked}</code>,
                  <Button
                    variant="danger"
                    aria-label={`Remove key for ${e.providerId}`}
                    onClick={() => void mutate(`Credentials for ${e.providerId} removed`, () => removeApiKey(e.providerId))}
                  >
                    <Trash2 size={14} />
                  </Button>,
                ])}
              />
            </div>
          )}
        </AsyncView>
      </Section>

      <Section
        title="Environment"
        actions={<Button onClick={() => void importAll()}><Download size={14} /> Import keys</Button>}
      >
        <AsyncView loading={env.loading} error={env.error} data={env.data}>
          {(detections) => (
            <DataTable
              headers={["Provider", "Credential", "Variables"]}
              empty="No provider variables set."
              rows={detections.map((d) => [
                d.providerId,
                d.hasCredential ? <Badge tone="ok">yes</Badge> : <Badge>no</Badge>,
                <code className="text-xs">{d.vars.map((v) => `${v.name}=${v.masked}`).join(" ")}</code>,
              ])}
            />
          )}
        </AsyncView>
      </Section>

      {editing?.kind === "key" && (
        <FormDialog
          title={`API key for ${editing.id}`}
          description="Stored in auth.json; only a masked form is shown afterwards."
          fields={[{ key: "key", label: "API key", type: "password", required: true }]}
          onClose={() => setEditing(null)}
          onSubmit={(v) => mutate(`API key for ${editing.id} saved`, () => setApiKey(editing.id, v.key.trim()))}
        />
      )}

      {editing?.kind === "options" && (
        <FormDialog
          title={`${editing.template.name} options`}
          description="Clear a field to remove the option."
          fields={optionFields(editing.template, editing.options)}
          onClose={() => setEditing(null)}
          onSubmit={(v) => mutate(`${editing.template.name} options saved`, () => saveNativeOptions(editing.id, v))}
        />
      )}
    </div>
  );
}
