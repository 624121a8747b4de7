import { useState } from "react";
import { RefreshCw } from "lucide-react";
import { fetchVersion } from "@/lib/api";
import { useDashboardStore } from "@/stores/dashboard-store";
import type { DashboardState, VersionInfo } from "@/types";
import { Badge, Button, DataTable, Section, StatsCard, StatusIndicator } from "../ui";

function statsCards(state: DashboardState) {
  const { stats } = state;
  return [
    { title: "Providers", count: stats.providers },
    { title: "Models", count: stats.models },
    { title: "MCP Servers", count: stats.mcps },
    { title: "Agents", count: stats.agents },
    { title: "Oh My Agents", count: stats.ohMyAgents },
    { title: "Categories", count: stats.categories },
  ];
}

export function HomeTab() {
  const state = useDashboardStore((s) => s.state);
  const notify = useDashboardStore((s) => s.notify);
  const [version, setVersion] = useState<VersionInfo | null>(null);

  const checkUpdates = async () => {
    try {
      setVersion(await fetchVersion(true));
    } catch (err) {
      notify({ type: "error", message: err instanceof Error ? err.message : String(err) });
    }
  };

  if (!state) return null;

  return (
    <div>
      <div className="mb-6 grid grid-cols-2 gap-4 md:grid-cols-3 lg:grid-cols-6">
        {statsCards(state).map((card) => (
          <StatsCard key={card.title} title={card.title} count={card.count} status={card.count > 0 ? "ok" : "idle"} />
        ))}
      </div>

      <Section title="Files">
        <DataTable
          headers={["", "File", "Path"]}
          empty="No files."
          rows={state.files.map((f) => [
            <StatusIndicator status={f.exists ? "ok" : "idle"} label={f.exists ? "present" : "missing"} />,
            f.label,
            <code className="text-xs">{f.path}</code>,
          ])}
        />
        {state.settingsError && (
          <p role="alert" className="mt-2 text-sm text-status-warn">
            {state.settingsPath} ignored: {state.settingsError}
          </p>
        )}
      </Section>

      <Section title="Default models">
        <p className="text-sm">Default: <code>{state.model ?? "(not set)"}</code></p>
        <p className="text-sm">Small: <code>{state.smallModel ?? "(not set)"}</code></p>
      </Section>

      <Section
        title="Version"
        actions={
          <Button onClick={() => void checkUpdates()}>
            <RefreshCw size={14} /> Check for updates
          </Button>
        }
      >
        {version === null ? (
          <p className="text-sm text-muted-foreground">Not checked.</p>
        ) : version.updateAvailable ? (
          <p className="text-sm">
            <Badge tone="warn">{version.latest} available</Badge> running {version.current}
            {version.releaseUrl && <a className="ml-2 underline" href={version.releaseUrl}>release notes</a>}
          </p>
        ) : (
          <p className="text-sm">{version.reason ? `Update check skipped: ${version.reason}` : `ocfg ${version.current} is up to date`}</p>
        )}
      </Section>
    </div>
  );
}
