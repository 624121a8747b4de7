import { useState } from "react";
import { Import } from "lucide-react";
import { applyImport, fetchImportSources } from "@/lib/api";
import { useResource } from "@/hooks/useResource";
import { useDashboardStore } from "@/stores/dashboard-store";
import type { ImportApplyResult, ImportSourceType } from "@/types";
import { AsyncView, Button, DataTable, Section } from "../ui";

export function summarizeImport(result: ImportApplyResult): string {
  const parts = [
    result.added.length > 0 && `added ${result.added.join(", ")}`,
    result.overwritten.length > 0 && `overwrote ${result.overwritten.join(", ")}`,
    result.conflicts.length > 0 && `kept existing ${result.conflicts.join(", ")}`,
    result.permissions.length > 0 && `${result.permissions.length} permission(s)`,
  ].filter((p): p is string => typeof p === "string");
  return parts.length > 0 ? parts.join("; ") : "nothing new";
}

export function ImportTab() {
  const mutate = useDashboardStore((s) => s.mutate);
  const { data, loading, error } = useResource(fetchImportSources);
  const [overwrite, setOverwrite] = useState(false);
  const [last, setLast] = useState<string | null>(null);

  const run = (type: ImportSourceType) =>
    mutate(`Imported from ${type}`, async () => {
      const result = await applyImport(type, overwrite);
      setLast(`${type}: ${summarizeImport(result)}`);
    });

  return (
    <Section title="Import from other tools">
      <label className="mb-3 flex items-center gap-2 text-sm">
        <input type="checkbox" aria-label="Overwrite" checked={overwrite} onChange={(e) => setOverwrite(e.target.checked)} />
        Overwrite providers that already exist
      </label>
      <AsyncView loading={loading} error={error} data={data}>
        {(sources) => (
          <DataTable
            headers={["Source", "File", ""]}
            empty="No Claude Code, Codex, Gemini or CC Switch configs found."
            rows={sources.map((s) => [
              s.label,
              <code className="text-xs">{s.path}</code>,
              <Button aria-label={`Import ${s.type}`} onClick={() => void run(s.type)}>
                <Import size={14} /> Import
              </Button>,
            ])}
          />
        )}
      </AsyncView>
      {last && <p className="mt-3 text-sm">{last}</p>}
    </Section>
  );
}
