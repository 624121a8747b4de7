import { useState } from "react";
import { Plus, Trash2, Zap } from "lucide-react";
import {
  fetchPermissions,
  quickAddPermissions,
  removePermission,
  removeSkillPermission,
  setPermission,
  setSkillPermission,
} from "@/lib/api";
import { useResource } from "@/hooks/useResource";
import { useDashboardStore } from "@/stores/dashboard-store";
import type { PermissionLevel } from "@/types";
import { FormDialog } from "../FormDialog";
import { AsyncView, Button, DataTable, Section } from "../ui";

const LEVELS: PermissionLevel[] = ["allow", "ask", "deny"];

function isLevel(value: string): value is PermissionLevel {
  return LEVELS.some((l) => l === value);
}

function LevelSelect({ label, level, onChange }: { label: string; level: PermissionLevel | null; onChange: (level: PermissionLevel) => void }) {
  return (
    <select
      aria-label={label}
      className="rounded-md border border-border bg-muted px-2 py-0.5 text-sm"
      value={level ?? ""}
      onChange={(e) => {
        if (isLevel(e.target.value)) onChange(e.target.value);
      }}
    >
      {level === null && <option value="">(custom)</option>}
      {LEVELS.map((l) => (
        <option key={l} value={l}>{l}</option>
      ))}
    </select>
  );
}

export function PermissionsTab() {
  const mutate = useDashboardStore((s) => s.mutate);
  const { data, loading, error } = useResource(fetchPermissions);
  const [adding, setAdding] = useState<"tool" | "skill" | null>(null);

  const quickAdd = () =>
    mutate("Common tools added", async () => {
      const { added } = await quickAddPermissions();
      return added;
    });

  return (
    <AsyncView loading={loading} error={error} data={data}>
      {(perms) => (
        <div>
          <Section
            title="Tool permissions"
            actions={
              <>
                <Button onClick={() => void quickAdd()}><Zap size={14} /> Quick add</Button>
                <Button variant="primary" onClick={() => setAdding("tool")}><Plus size={14} /> Add</Button>
              </>
            }
          >
            <DataTable
              headers={["Tool", "Level", ""]}
              empty="No tool permissions set."
              rows={perms.tools.map((p) => [
                <code>{p.tool}</code>,
                <LevelSelect
                  label={`Level for ${p.tool}`}
                  level={p.level}
                  onChange={(level) => void mutate(`${p.tool}: ${level}`, () => setPermission(p.tool, level))}
                />,
                <Button
                  variant="danger"
                  aria-label={`Remove ${p.tool}`}
                  onClick={() => void mutate(`${p.tool} removed`, () => removePermission(p.tool))}
                >
                  <Trash2 size={14} />
                </Button>,
              ])}
            />
          </Section>

          <Section
            title="Skill permissions"
            actions={<Button variant="primary" onClick={() => setAdding("skill")}><Plus size={14} /> Add pattern</Button>}
          >
            <DataTable
              headers={["Pattern", "Level", ""]}
              empty="No skill patterns set."
              rows={perms.skills.map((p) => [
                <code>{p.pattern}</code>,
                <LevelSelect
                  label={`Level for ${p.pattern}`}
                  level={p.level}
                  onChange={(level) => void mutate(`${p.pattern}: ${level}`, () => setSkillPermission(p.pattern, level))}
                />,
                <Button
                  variant="danger"
                  aria-label={`Remove ${p.pattern}`}
                  onClick={() => void mutate(`${p.pattern} removed`, () => removeSkillPermission(p.pattern))}
                >
                  <Trash2 size={14} />
                </Button>,
              ])}
            />
          </Section>

          {adding && (
            <FormDialog
              title={adding === "tool" ? "Add tool permission" : "Add skill pattern"}
              fields={[
                { key: "name", label: adding === "tool" ? "Tool" : "Pattern", required: true, placeholder: adding === "tool" ? "bash" : "internal-*" },
                { key: "level", label: "Level", type: "select", options: LEVELS },
              ]}
              submitLabel="Add"
              onClose={() => setAdding(null)}
              onSubmit={(v) => {
                const name = v.name.trim();
                const level = isLevel(v.level) ? v.level : "ask";
                return mutate(`${name}: ${level}`, () =>
                  adding === "tool" ? setPermission(name, level) : setSkillPermission(name, level),
                );
              }}
            />
          )}
        </div>
      )}
    </AsyncView>
  );
}
