import { CheckCircle2, Wrench, XCircle, AlertTriangle } from "lucide-react";
import { fixValidation, runValidation } from "@/lib/api";
import { useResource } from "@/hooks/useResource";
import { useDashboardStore } from "@/stores/dashboard-store";
import type { DiagnosticResult } from "@/types";
import { AsyncView, Button, Section } from "../ui";

function CheckIcon({ status }: { status: DiagnosticResult["status"] }) {
  if (status === "pass") return <CheckCircle2 size={16} className="text-status-ok" aria-label="pass" />;
  if (status === "warn") return <AlertTriangle size={16} className="text-status-warn" aria-label="warn" />;
  return <XCircle size={16} className="text-status-error" aria-label="fail" />;
}

export function ValidateTab() {
  const mutate = useDashboardStore((s) => s.mutate);
  const { data, loading, error } = useResource(runValidation);

  const fix = () =>
    mutate("Automatic fixes applied", async () => {
      const { fixed } = await fixValidation();
      if (fixed.length === 0) throw new Error("Nothing to fix automatically");
    });

  return (
    <Section
      title="Validation"
      actions={<Button variant="primary" onClick={() => void fix()}><Wrench size={14} /> Fix</Button>}
    >
      <AsyncView loading={loading} error={error} data={data}>
        {(result) => (
          <div>
            <p className="mb-3 text-sm">
              {result.summary.passed} passed, {result.summary.failed} failed, {result.summary.warnings} warnings
            </p>
            <ul className="space-y-2">
              {result.checks.map((check, i) => (
                <li key={`${check.name}-${i}`} className="text-sm">
                  <div className="flex items-center gap-2">
                    <CheckIcon status={check.status} />
                    <span className="font-medium">{check.name}</span>
                    <span className="text-muted-foreground">{check.message}</span>
                  </div>
                  {check.issues && (
                    <ul className="ml-6 mt-1 list-disc text-xs">
                      {check.issues.map((issue) => (
                        <li key={`${issue.path}-${issue.message}`}>
                          <code>{issue.path}</code>: {issue.message}
                          {issue.fixable && " (fixable)"}
                        </li>
                      ))}
                    </ul>
                  )}
                  {check.fix && <p className="ml-6 text-xs text-muted-foreground">{check.fix}</p>}
                </li>
              ))}
            </ul>
          </div>
        )}
      </AsyncView>
    </Section>
  );
}
