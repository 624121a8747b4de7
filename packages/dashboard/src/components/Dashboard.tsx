/**
 * Dashboard - browser front end for the ocfg local API
 */

import { useEffect } from "react";
import type { ComponentType } from "react";
import { X } from "lucide-react";
import { cn } from "@/lib/utils";
import { useDashboardStore } from "@/stores/dashboard-store";
import type { TabId } from "@/types";
import { StatusIndicator } from "./ui";
import { AgentsTab } from "./tabs/AgentsTab";
import { BackupsTab } from "./tabs/BackupsTab";
import { HomeTab } from "./tabs/HomeTab";
import { ImportTab } from "./tabs/ImportTab";
import { McpTab } from "./tabs/McpTab";
import { NativeTab } from "./tabs/NativeTab";
import { OhMyTab } from "./tabs/OhMyTab";
import { PermissionsTab } from "./tabs/PermissionsTab";
import { ProvidersTab } from "./tabs/ProvidersTab";
import { RulesTab } from "./tabs/RulesTab";
import { SkillsTab } from "./tabs/SkillsTab";
import { ValidateTab } from "./tabs/ValidateTab";

const TABS: { id: TabId; label: string; component: ComponentType }[] = [
  { id: "home", label: "Overview", component: HomeTab },
  { id: "providers", label: "Providers", component: ProvidersTab },
  { id: "native", label: "Native", component: NativeTab },
  { id: "mcp", label: "MCP", component: McpTab },
  { id: "agents", label: "Agents", component: AgentsTab },
  { id: "ohmy", label: "Oh My", component: OhMyTab },
  { id: "permissions", label: "Permissions", component: PermissionsTab },
  { id: "skills", label: "Skills", component: SkillsTab },
  { id: "rules", label: "Rules", component: RulesTab },
  { id: "backups", label: "Backups", component: BackupsTab },
  { id: "import", label: "Import", component: ImportTab },
  { id: "validate", label: "Validate", component: ValidateTab },
];

export function Dashboard() {
  const apiStatus = useDashboardStore((s) => s.apiStatus);
  const state = useDashboardStore((s) => s.state);
  const activeTab = useDashboardStore((s) => s.activeTab);
  const banner = useDashboardStore((s) => s.banner);
  const setActiveTab = useDashboardStore((s) => s.setActiveTab);
  const clearBanner = useDashboardStore((s) => s.clearBanner);
  const fetchState = useDashboardStore((s) => s.fetchState);
  const checkApiStatus = useDashboardStore((s) => s.checkApiStatus);

  useEffect(() => {
    void checkApiStatus().then(() => fetchState());
  }, [checkApiStatus, fetchState]);

  const ActiveTab = TABS.find((t) => t.id === activeTab)?.component ?? HomeTab;

  return (
    <div className="mx-auto min-h-screen max-w-6xl p-6">
      <header className="mb-6 flex items-center justify-between">
        <div>
          <h1 className="text-2xl font-bold">OpenCode Config</h1>
          {state && <p className="text-xs text-muted-foreground">project: {state.projectDir}</p>}
        </div>
        <div className="flex items-center gap-2">
          <StatusIndicator status={apiStatus === "connected" ? "ok" : apiStatus === "checking" ? "warn" : "error"} />
          <span className="text-sm text-muted-foreground">
            {apiStatus === "connected" ? "Connected" : apiStatus === "checking" ? "Connecting..." : "API offline: run ocfg serve"}
          </span>
        </div>
      </header>

      {banner && (
        <div
          role={banner.type === "error" ? "alert" : "status"}
          className={cn(
            "mb-4 flex items-center justify-between rounded-md border px-4 py-2 text-sm",
            banner.type === "error"
              ? "border-status-error/40 bg-status-error/10 text-status-error"
              : "border-status-ok/40 bg-status-ok/10 text-status-ok",
          )}
        >
          <span>{banner.message}</span>
          <button aria-label="Dismiss" onClick={clearBanner}>
            <X size={14} />
          </button>
        </div>
      )}

      <nav role="tablist" className="mb-6 flex flex-wrap gap-1 rounded-lg border border-border bg-muted p-1">
        {TABS.map((tab) => (
          <button
            key={tab.id}
            role="tab"
            aria-selected={activeTab === tab.id}
            onClick={() => setActiveTab(tab.id)}
            className={cn(
              "rounded-md px-3 py-1.5 text-sm font-medium transition-colors",
              activeTab === tab.id ? "bg-card text-card-foreground shadow-sm" : "text-muted-foreground hover:text-card-foreground",
            )}
          >
            {tab.label}
          </button>
        ))}
      </nav>

      {apiStatus === "connected" ? <ActiveTab /> : null}
    </div>
  );
}
