import { useState } from "react";
import { Archive, RotateCcw, Trash2 } from "lucide-react";
import { createBackup, deleteBackup, fetchBackups, restoreBackup } from "@/lib/api";
import { useResource } from "@/hooks/useResource";
import { useDashboardStore } from "@/stores/dashboard-store";
import type { BackupInfo } from "@/types";
import { ConfirmDialog } from "../ConfirmDialog";
import { AsyncView, Badge, Button, DataTable, Section } from "../ui";

const BACKUP_TARGETS = ["opencode", "oh-my-opencode", "auth"] as const;

export function BackupsTab() {
  const mutate = useDashboardStore((s) => s.mutate);
  const [filter, setFilter] = useState("");
  const { data, loading, error } = useResource(() => fetchBackups(filter || undefined), [filter]);
  const [pending, setPending] = useState<{ action: "restore" | "delete"; backup: BackupInfo } | null>(null);

  return (
    <div>
      <Section
        title="Backups"
        actions={
          <>
            <select
              aria-label="Filter backups"
              className="rounded-md border border-border bg-muted px-2 py-1 text-sm"
              value={filter}
              onChange={(e) => setFilter(e.target.value)}
            >
              <option value="">all files</option>
              {BACKUP_TARGETS.map((t) => (
                <option key={t} value={t}>{t}</option>
              ))}
            </select>
            {BACKUP_TARGETS.map((t) => (
              <Button key={t} onClick={() => void mutate(`Backup of ${t} created`, () => createBackup(t))}>
                <Archive size={14} /> {t}
              </Button>
            ))}
          </>
        }
      >
        <AsyncView loading={loading} error={error} data={data}>
          {(backups) => (
            <DataTable
              headers={["File", "Config", "Tag", "Taken", ""]}
              empty="No backups yet."
              rows={backups.map((b) => [
                <code className="text-xs">{b.file}</code>,
                b.name,
                <Badge>{b.tag}</Badge>,
                b.display,
                <div className="flex gap-1">
                  <Button aria-label={`Restore ${b.file}`} onClick={() => setPending({ action: "restore", backup: b })}>
                    <RotateCcw size={14} />
                  </Button>
                  <Button variant="danger" aria-label={`Delete ${b.file}`} onClick={() => setPending({ action: "delete", backup: b })}>
                    <Trash2 size={14} />
                  </Button>
                </div>,
              ])}
            />
          )}
        </AsyncView>
      </Section>

      {pending && (
        <ConfirmDialog
          title={pending.action === "restore" ? `Restore ${pending.backup.file}?` : `Delete ${pending.backup.file}?`}
          description={
            pending.action === "restore"
              ? `The current ${pending.backup.name} file is backed up, then replaced with this copy.`
              : "The backup file is deleted."
          }
          confirmLabel={pending.action === "restore" ? "Restore" : "Delete"}
          onClose={() => setPending(null)}
          onConfirm={() =>
            void (pending.action === "restore"
              ? mutate(`${pending.backup.file} restored`, () => restoreBackup(pending.backup.file))
              : mutate(`${pending.backup.file} deleted`, () => deleteBackup(pending.backup.file)))
          }
        />
      )}
    </div>
  );
}
