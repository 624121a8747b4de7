import { useState } from "react";
import { Download, FileText, Plus, Trash2 } from "lucide-react";
import { createSkill, fetchSkill, fetchSkills, installSkill, removeSkill, saveSkill } from "@/lib/api";
import { useResource } from "@/hooks/useResource";
import { useDashboardStore } from "@/stores/dashboard-store";
import type { ConfigLocation, SkillDocument, SkillInfo } from "@/types";
import { ConfirmDialog } from "../ConfirmDialog";
import { FormDialog } from "../FormDialog";
import { AsyncView, Badge, Button, DataTable, Section } from "../ui";

const LOCATIONS: ConfigLocation[] = ["global", "project"];

function toLocation(value: string): ConfigLocation {
  return value === "project" ? "project" : "global";
}

/** Only skills under the OpenCode skill folders can be edited or removed */
export function editableLocation(skill: SkillInfo): ConfigLocation | null {
  if (skill.source === "opencode-global") return "global";
  if (skill.source === "opencode-project") return "project";
  return null;
}

export function SkillsTab() {
  const mutate = useDashboardStore((s) => s.mutate);
  const notify = useDashboardStore((s) => s.notify);
  const { data, loading, error } = useResource(fetchSkills);
  const [dialog, setDialog] = useState<"create" | "install" | null>(null);
  const [editing, setEditing] = useState<{ location: ConfigLocation; name: string; doc: SkillDocument } | null>(null);
  const [removing, setRemoving] = useState<{ location: ConfigLocation; name: string } | null>(null);

  const openEditor = async (location: ConfigLocation, name: string) => {
    try {
      setEditing({ location, name, doc: await fetchSkill(location, name) });
    } catch (err) {
      notify({ type: "error", message: err instanceof Error ? err.message : String(err) });
    }
  };

  return (
    <div>
      <Section
        title="Skills"
        actions={
          <>
            <Button onClick={() => setDialog("install")}><Download size={14} /> Install</Button>
            <Button variant="primary" onClick={() => setDialog("create")}><Plus size={14} /> New skill</Button>
          </>
        }
      >
        <AsyncView loading={loading} error={error} data={data}>
          {(skills) => (
            <DataTable
              headers={["Name", "Source", "Description", ""]}
              empty="No skills found."
              rows={skills.map((s) => {
                const location = editableLocation(s);
                return [
                  <span className="font-medium">{s.name}</span>,
                  <Badge>{s.source}</Badge>,
                  s.description,
                  location ? (
                    <div className="flex gap-1">
                      <Button aria-label={`Edit ${s.name}`} onClick={() => void openEditor(location, s.name)}>
                        <FileText size={14} />
                      </Button>
                      <Button variant="danger" aria-label={`Remove ${s.name}`} onClick={() => setRemoving({ location, name: s.name })}>
                        <Trash2 size={14} />
                      </Button>
                    </div>
                  ) : null,
                ];
              })}
            />
          )}
        </AsyncView>
      </Section>

      {dialog === "create" && (
        <FormDialog
          title="New skill"
          description="Names use lowercase letters, digits and single hyphens."
          fields={[
            { key: "name", label: "Name", required: true, placeholder: "my-skill" },
            { key: "description", label: "Description", required: true },
            { key: "location", label: "Location", type: "select", options: LOCATIONS },
          ]}
          submitLabel="Create"
          onClose={() => setDialog(null)}
          onSubmit={(v) =>
            mutate(`Skill "${v.name.trim()}" created`, () =>
              createSkill({ name: v.name.trim(), description: v.description.trim(), location: toLocation(v.location) }),
            )
          }
        />
      )}

      {dialog === "install" && (
        <FormDialog
          title="Install skill"
          description="A local folder containing SKILL.md, or a GitHub owner/repo/path."
          fields={[
            { key: "source", label: "Source", required: true },
            { key: "location", label: "Location", type: "select", options: LOCATIONS },
            { key: "force", label: "Overwrite existing", type: "checkbox", defaultValue: "false" },
          ]}
          submitLabel="Install"
          onClose={() => setDialog(null)}
          onSubmit={(v) =>
            mutate("Skill installed", () => installSkill(v.source.trim(), toLocation(v.location), v.force === "true"))
          }
        />
      )}

      {editing && (
        <FormDialog
          title={`Edit ${editing.name}`}
          description={editing.doc.path}
          fields={[{ key: "content", label: "SKILL.md", type: "textarea", defaultValue: editing.doc.content }]}
          onClose={() => setEditing(null)}
          onSubmit={(v) =>
            mutate(`Skill "${editing.name}" saved`, () => saveSkill(editing.location, editing.name, v.content))
          }
        />
      )}

      {removing && (
        <ConfirmDialog
          title={`Remove ${removing.name}?`}
          description="The skill folder is deleted."
          onClose={() => setRemoving(null)}
          onConfirm={() => void mutate(`Skill "${removing.name}" removed`, () => removeSkill(removing.location, removing.name))}
        />
      )}
    </div>
  );
}
