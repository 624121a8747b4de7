import { useEffect, useState } from "react";
import { Plus, Save, Trash2 } from "lucide-react";
import {
  addInstruction,
  fetchAgentsMd,
  fetchCompaction,
  fetchInstructions,
  removeInstruction,
  saveAgentsMd,
  saveCompaction,
} from "@/lib/api";
import { useResource } from "@/hooks/useResource";
import { cn } from "@/lib/utils";
import { useDashboardStore } from "@/stores/dashboard-store";
import type { CompactionState, ConfigLocation } from "@/types";
import { AsyncView, Button, DataTable, Section } from "../ui";

export function RulesTab() {
  return (
    <div>
      <InstructionsSection />
      <AgentsMdSection />
      <CompactionSection />
    </div>
  );
}

function InstructionsSection() {
  const mutate = useDashboardStore((s) => s.mutate);
  const { data, loading, error } = useResource(fetchInstructions);
  const [draft, setDraft] = useState("");

  const add = async () => {
    const instruction = draft.trim();
    if (!instruction) return;
    if (await mutate(`Instruction "${instruction}" added`, () => addInstruction(instruction))) setDraft("");
  };

  return (
    <Section title="Instruction files">
      <AsyncView loading={loading} error={error} data={data}>
        {(instructions) => (
          <DataTable
            headers={["Path or glob", ""]}
            empty="No instruction files."
            rows={instructions.map((i) => [
              <code>{i}</code>,
              <Button variant="danger" aria-label={`Remove ${i}`} onClick={() => void mutate(`${i} removed`, () => removeInstruction(i))}>
                <Trash2 size={14} />
              </Button>,
            ])}
          />
        )}
      </AsyncView>
      <div className="mt-3 flex gap-2">
        <input
          aria-label="New instruction"
          className="flex-1 rounded-md border border-border bg-muted px-2 py-1 text-sm"
          placeholder="CONTRIBUTING.md or docs/*.md"
          value={draft}
          onChange={(e) => setDraft(e.target.value)}
        />
        <Button variant="primary" onClick={() => void add()}><Plus size={14} /> Add</Button>
      </div>
    </Section>
  );
}

function AgentsMdSection() {
  const mutate = useDashboardStore((s) => s.mutate);
  const [location, setLocation] = useState<ConfigLocation>("global");
  const { data, loading, error } = useResource(() => fetchAgentsMd(location), [location]);
  const [content, setContent] = useState("");

  useEffect(() => {
    if (data) setContent(data.content);
  }, [data]);

  return (
    <Section
      title="AGENTS.md"
      actions={
        <>
          {(["global", "project"] as const).map((loc) => (
            <Button key={loc} className={cn(location === loc && "bg-muted")} onClick={() => setLocation(loc)}>
              {loc}
            </Button>
          ))}
        </>
      }
    >
      <AsyncView loading={loading} error={error} data={data}>
        {(file) => (
          <div>
            <p className="mb-2 text-xs text-muted-foreground">
              {file.path}
              {!file.exists && " (not created yet)"}
            </p>
            <textarea
              aria-label="AGENTS.md content"
              className="h-64 w-full rounded-md border border-border bg-muted p-2 font-mono text-sm"
              value={content}
              onChange={(e) => setContent(e.target.value)}
            />
            <Button
              variant="primary"
              className="mt-2"
              onClick={() => void mutate(`AGENTS.md (${file.location}) saved`, () => saveAgentsMd(file.location, content))}
            >
              <Save size={14} /> Save
            </Button>
          </div>
        )}
      </AsyncView>
    </Section>
  );
}

const COMPACTION_LABELS: Record<keyof CompactionState, string> = {
  auto: "Compact the session automatically when the context is full",
  prune: "Prune old tool outputs",
};

function CompactionSection() {
  const mutate = useDashboardStore((s) => s.mutate);
  const { data, loading, error } = useResource(fetchCompaction);

  return (
    <Section title="Compaction">
      <AsyncView loading={loading} error={error} data={data}>
        {(compaction) => (
          <div className="space-y-2">
            {(["auto", "prune"] as const).map((key) => (
              <label key={key} className="flex items-center gap-2 text-sm">
                <input
                  type="checkbox"
                  aria-label={key}
                  checked={compaction[key]}
                  onChange={(e) => {
                    const value = e.target.checked;
                    void mutate(`compaction.${key} = ${value}`, () => saveCompaction(key === "auto" ? { auto: value } : { prune: value }));
                  }}
                />
                {COMPACTION_LABELS[key]}
              </label>
            ))}
          </div>
        )}
      </AsyncView>
    </Section>
  );
}
