import type { ButtonHTMLAttributes, ReactNode } from "react";
import { Loader2 } from "lucide-react";
import { cn } from "@/lib/utils";
import type { Status } from "@/types";

const STATUS_COLORS: Record<Status, string> = {
  ok: "bg-status-ok",
  warn: "bg-status-warn",
  error: "bg-status-error",
  idle: "bg-status-idle",
};

export function StatusIndicator({ status, label }: { status: Status; label?: string }) {
  return (
    <span
      data-testid="status-indicator"
      data-status={status}
      aria-label={label}
      className={cn("inline-block h-3 w-3 shrink-0 rounded-full", STATUS_COLORS[status])}
    />
  );
}

export function StatsCard({ title, count, status }: { title: string; count: number; status: Status }) {
  return (
    <div className="rounded-lg border border-border bg-card p-4 text-card-foreground shadow-sm">
      <div className="flex items-center justify-between">
        <span className="text-sm font-medium">{title}</span>
        <StatusIndicator status={status} />
      </div>
      <div className="mt-2 text-2xl font-bold">{count}</div>
    </div>
  );
}

export function Section({ title, actions, children }: { title: string; actions?: ReactNode; children: ReactNode }) {
  return (
    <section className="mb-6 rounded-lg border border-border bg-card p-4">
      <div className="mb-3 flex items-center justify-between gap-2">
        <h2 className="text-base font-semibold">{title}</h2>
        {actions && <div className="flex gap-2">{actions}</div>}
      </div>
      {children}
    </section>
  );
}

type ButtonVariant = "primary" | "ghost" | "danger";

const BUTTON_VARIANTS: Record<ButtonVariant, string> = {
  primary: "bg-primary text-primary-foreground hover:bg-primary/90",
  ghost: "border border-border hover:bg-muted",
  danger: "text-destructive hover:bg-destructive/10",
};

export function Button({
  variant = "ghost",
  className,
  ...props
}: ButtonHTMLAttributes<HTMLButtonElement> & { variant?: ButtonVariant }) {
  return (
    <button
      type="button"
      className={cn(
        "inline-flex items-center gap-1 rounded-md px-3 py-1.5 text-sm font-medium disabled:opacity-50",
        BUTTON_VARIANTS[variant],
        className,
      )}
      {...props}
    />
  );
}

export function DataTable({ headers, rows, empty }: { headers: string[]; rows: ReactNode[][]; empty: string }) {
  if (rows.length === 0) return <p className="text-sm text-muted-foreground">{empty}</p>;
  return (
    <table className="w-full text-left text-sm">
      <thead>
        <tr className="border-b border-border text-muted-foreground">
          {headers.map((h) => (
            <th key={h} className="px-2 py-1 font-medium">{h}</th>
          ))}
        </tr>
      </thead>
      <tbody>
        {rows.map((cells, i) => (
          <tr key={i} className="border-b border-border/50 last:border-0">
            {cells.map((cell, j) => (
              <td key={j} className="px-2 py-1.5 align-top">{cell}</td>
            ))}
          </tr>
        ))}
      </tbody>
    </table>
  );
}

/** Loading spinner, error text, or the children once data is present */
export function AsyncView<T>({
  loading,
  error,
  data,
  children,
}: {
  loading: boolean;
  error: Error | null;
  data: T | null;
  children: (data: T) => ReactNode;
}) {
  if (error) return <p role="alert" className="text-sm text-destructive">{error.message}</p>;
  if (data === null) {
    return loading ? <Loader2 aria-label="Loading" className="animate-spin text-muted-foreground" size={18} /> : null;
  }
  return <>{children(data)}</>;
}

export function Badge({ children, tone = "idle" }: { children: ReactNode; tone?: Status }) {
  const tones: Record<Status, string> = {
    ok: "border-status-ok/30 bg-status-ok/10 text-status-ok",
    warn: "border-status-warn/30 bg-status-warn/10 text-status-warn",
    error: "border-status-error/30 bg-status-error/10 text-status-error",
    idle: "border-border bg-muted text-muted-foreground",
  };
  return <span className={cn("rounded-full border px-2 py-0.5 text-xs", tones[tone])}>{children}</span>;
}
