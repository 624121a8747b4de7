import { useState } from "react";
import { Plus, Power, Trash2 } from "lucide-react";
import { addMcp, fetchMcps, removeMcp, toggleMcp } from "@/lib/api";
import { useResource } from "@/hooks/useResource";
import { useToggle } from "@/hooks/useToggle";
import { useDashboardStore } from "@/stores/dashboard-store";
import type { McpForm } from "@/types";
import { ConfirmDialog } from "../ConfirmDialog";
import { FormDialog, optional, optionalNumber, type FormValues } from "../FormDialog";
import { AsyncView, Badge, Button, DataTable, Section, StatusIndicator } from "../ui";

/** "KEY=VALUE" lines into a record; blank lines are skipped */
export function parsePairs(text: string): Record<string, string> | undefined {
  const entries = text
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line): [string, string] => {
      const eq = line.indexOf("=");
      return eq > 0 ? [line.slice(0, eq).trim(), line.slice(eq + 1).trim()] : [line, ""];
    });
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

export function mcpFormFromValues(v: FormValues): McpForm {
  const remote = v.type === "remote";
  const command = optional(v.command)?.split(/\s+/);
  return {
    name: v.name.trim(),
    command: remote ? undefined : command,
    url: remote ? optional(v.url) : undefined,
    environment: remote ? undefined : parsePairs(v.environment ?? ""),
    headers: remote ? parsePairs(v.headers ?? "") : undefined,
    timeout: optionalNumber(v.timeout),
  };
}

export function McpTab() {
  const mutate = useDashboardStore((s) => s.mutate);
  const { data, loading, error } = useResource(fetchMcps);
  const adding = useToggle();
  const [removing, setRemoving] = useState<string | null>(null);

  return (
    <div>
      <Section
        title="MCP Servers"
        actions={<Button variant="primary" onClick={adding.toggle}><Plus size={14} /> Add server</Button>}
      >
        <AsyncView loading={loading} error={error} data={data}>
          {(servers) => (
            <DataTable
              headers={["", "Name", "Type", "Target", "Timeout", ""]}
              empty="No MCP servers configured."
              rows={servers.map((m) => [
                <StatusIndicator status={!m.valid ? "error" : m.enabled ? "ok" : "idle"} label={m.enabled ? "enabled" : "disabled"} />,
                <span className="font-medium">{m.name}</span>,
                <Badge>{m.type}</Badge>,
                <code className="text-xs">{m.target}</code>,
                `${m.timeout} ms`,
                <div className="flex gap-1">
                  <Button
                    aria-label={`${m.enabled ? "Disable" : "Enable"} ${m.name}`}
                    onClick={() => void mutate(`${m.name} ${m.enabled ? "disabled" : "enabled"}`, () => toggleMcp(m.name, !m.enabled))}
                  >
                    <Power size={14} />
                  </Button>
                  <Button variant="danger" aria-label={`Remove ${m.name}`} onClick={() => setRemoving(m.name)}>
                    <Trash2 size={14} />
                  </Button>
                </div>,
              ])}
            />
          )}
        </AsyncView>
      </Section>

      {adding.state && (
        <FormDialog
          title="Add MCP server"
          description="Local servers run a command; remote servers are reached over HTTP."
          fields={[
            { key: "name", label: "Name", required: true },
            { key: "type", label: "Type", type: "select", options: ["local", "remote"] },
            { key: "command", label: "Command (local)", placeholder: "npx -y @scope/server" },
            { key: "environment", label: "Environment (local, KEY=VALUE per line)", type: "textarea" },
            { key: "url", label: "URL (remote)", placeholder: "https://mcp.example.com/sse" },
            { key: "headers", label: "Headers (remote, KEY=VALUE per line)", type: "textarea" },
            { key: "timeout", label: "Timeout (ms)", type: "number" },
          ]}
          submitLabel="Add"
          onClose={() => adding.set(false)}
          onSubmit={(v) => mutate(`MCP server "${v.name.trim()}" added`, () => addMcp(mcpFormFromValues(v)))}
        />
      )}

      {removing && (
        <ConfirmDialog
          title={`Remove ${removing}?`}
          description="The server entry is deleted from opencode.json."
          onClose={() => setRemoving(null)}
          onConfirm={() => void mutate(`MCP server "${removing}" removed`, () => removeMcp(removing))}
        />
      )}
    </div>
  );
}
