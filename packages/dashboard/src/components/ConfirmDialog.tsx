import * as Dialog from "@radix-ui/react-dialog";

interface ConfirmDialogProps {
  title: string;
  description: string;
  confirmLabel?: string;
  onConfirm: () => void;
  onClose: () => void;
}

export function ConfirmDialog({ title, description, confirmLabel = "Remove", onConfirm, onClose }: ConfirmDialogProps) {
  return (
    <Dialog.Root open={true} onOpenChange={(open) => { if (!open) onClose(); }}>
      <Dialog.Portal>
        <Dialog.Overlay className="fixed inset-0 z-[60] bg-black/60" />
        <Dialog.Content className="fixed left-1/2 top-1/2 z-[70] w-80 -translate-x-1/2 -translate-y-1/2 rounded-lg border border-border bg-card p-6 shadow-2xl">
          <Dialog.Title className="text-lg font-bold text-destructive">{title}</Dialog.Title>
          <Dialog.Description className="mt-2 text-sm text-muted-foreground">{description}</Dialog.Description>
          <div className="mt-4 flex gap-2">
            <button
              onClick={() => {
                onConfirm();
                onClose();
              }}
              className="flex-1 rounded-md bg-destructive px-3 py-2 text-sm font-medium text-white hover:bg-destructive/90"
            >
              {confirmLabel}
            </button>
            <Dialog.Close asChild>
              <button className="flex-1 rounded-md border border-border px-3 py-2 text-sm font-medium hover:bg-muted">
                Cancel
              </button>
            </Dialog.Close>
          </div>
        </Dialog.Content>
      </Dialog.Portal>
    </Dialog.Root>
  );
}
