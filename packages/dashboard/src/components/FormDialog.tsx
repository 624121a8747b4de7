import { useState } from "react";
import type { FormEvent } from "react";
import * as Dialog from "@radix-ui/react-dialog";
import { X } from "lucide-react";
import { Button } from "./ui";

export interface FieldSpec {
  key: string;
  label: string;
  type?: "text" | "number" | "password" | "textarea" | "select" | "checkbox";
  placeholder?: string;
  required?: boolean;
  options?: string[];
  /** Free-text values offered through a datalist */
  suggestions?: string[];
  defaultValue?: string;
}

export type FormValues = Record<string, string>;

interface FormDialogProps {
  title: string;
  description?: string;
  fields: FieldSpec[];
  submitLabel?: string;
  onClose: () => void;
  /** Resolve true to close the dialog */
  onSubmit: (values: FormValues) => Promise<boolean>;
}

function initialValues(fields: FieldSpec[]): FormValues {
  return Object.fromEntries(fields.map((f) => [f.key, f.defaultValue ?? (f.type === "select" ? f.options?.[0] ?? "" : "")]));
}

export function FormDialog({ title, description, fields, submitLabel = "Save", onClose, onSubmit }: FormDialogProps) {
  const [values, setValues] = useState<FormValues>(() => initialValues(fields));
  const [busy, setBusy] = useState(false);

  const update = (key: string, value: string) => setValues((v) => ({ ...v, [key]: value }));

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault();
    setBusy(true);
    const done = await onSubmit(values);
    setBusy(false);
    if (done) onClose();
  };

  return (
    <Dialog.Root open={true} onOpenChange={(open) => { if (!open) onClose(); }}>
      <Dialog.Portal>
        <Dialog.Overlay className="fixed inset-0 z-40 bg-black/50" />
        <Dialog.Content className="fixed right-0 top-0 z-50 h-full w-96 overflow-y-auto border-l border-border bg-card text-card-foreground shadow-xl">
          <div className="flex items-start justify-between border-b border-border p-4">
            <div>
              <Dialog.Title className="text-lg font-bold">{title}</Dialog.Title>
              {description && (
                <Dialog.Description className="mt-1 text-sm text-muted-foreground">{description}</Dialog.Description>
              )}
            </div>
            <Dialog.Close asChild>
              <button className="rounded-md p-1 text-muted-foreground hover:bg-muted" aria-label="Close">
                <X size={18} />
              </button>
            </Dialog.Close>
          </div>

          <form onSubmit={handleSubmit} className="space-y-3 p-4">
            {fields.map((field) => (
              <label key={field.key} className="block text-sm">
                <span className="mb-1 block text-muted-foreground">{field.label}</span>
                <FieldInput field={field} value={values[field.key] ?? ""} onChange={(v) => update(field.key, v)} />
              </label>
            ))}
            <Button type="submit" variant="primary" disabled={busy}>
              {submitLabel}
            </Button>
          </form>
        </Dialog.Content>
      </Dialog.Portal>
    </Dialog.Root>
  );
}

const INPUT_CLASS = "w-full rounded-md border border-border bg-muted px-2 py-1 text-sm";

function FieldInput({ field, value, onChange }: { field: FieldSpec; value: string; onChange: (value: string) => void }) {
  switch (field.type) {
    case "textarea":
      return (
        <textarea
          aria-label={field.label}
          className={`${INPUT_CLASS} h-48 font-mono`}
          value={value}
          required={field.required}
          placeholder={field.placeholder}
          onChange={(e) => onChange(e.target.value)}
        />
      );
    case "select":
      return (
        <select aria-label={field.label} className={INPUT_CLASS} value={value} onChange={(e) => onChange(e.target.value)}>
          {(field.options ?? []).map((o) => (
            <option key={o} value={o}>{o}</option>
          ))}
        </select>
      );
    case "checkbox":
      return (
        <input
          aria-label={field.label}
          type="checkbox"
          checked={value === "true"}
          onChange={(e) => onChange(String(e.target.checked))}
        />
      );
    default: {
      const listId = field.suggestions ? `${field.key}-suggestions` : undefined;
      return (
        <>
          <input
            aria-label={field.label}
            className={INPUT_CLASS}
            type={field.type ?? "text"}
            value={value}
            required={field.required}
            placeholder={field.placeholder}
            list={listId}
            onChange={(e) => onChange(e.target.value)}
          />
          {listId && (
            <datalist id={listId}>
              {(field.suggestions ?? []).map((s) => (
                <option key={s} value={s} />
              ))}
            </datalist>
          )}
        </>
      );
    }
  }
}

/** Empty strings become undefined so optional fields are left out of request bodies */
export function optional(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

export function optionalNumber(value: string | undefined): number | undefined {
  const text = optional(value);
  if (text === undefined) return undefined;
  const n = Number(text);
  return Number.isFinite(n) ? n : undefined;
}
