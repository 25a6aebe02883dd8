export const TOAST_DURATION_MS = 2500;

export type ToastKind = "success" | "error" | "info";

export function showToast(message: string, kind: ToastKind = "info", doc: Document = document) {
  const container = doc.getElementById("toast-container");
  if (!container) {
    return null;
  }

  const toast = doc.createElement("div");
  toast.className = `toast-message toast-message--${kind}`;
  toast.setAttribute("role", kind === "error" ? "alert" : "status");
  toast.textContent = message;
  container.appendChild(toast);

  setTimeout(() => toast.remove(), TOAST_DURATION_MS);
  return toast;
}
