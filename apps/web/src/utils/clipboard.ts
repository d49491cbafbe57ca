function copyWithTextarea(value: string): void {
  if (typeof document === "undefined") throw new Error("Clipboard is unavailable");
  const textarea = document.createElement("textarea");
  textarea.value = value;
  textarea.setAttribute("readonly", "true");
  Object.assign(textarea.style, { position: "fixed", top: "0", left: "0", opacity: "0" });
  document.body.appendChild(textarea);
  try {
    textarea.select();
    if (!document.execCommand("copy")) throw new Error("Copy failed");
  } finally {
    textarea.remove();
  }
}

/** Copies plan text or exports; falls back to execCommand outside secure contexts. */
export async function writeTextToClipboard(value: string): Promise<void> {
  if (!value) return;
  const secure = typeof window !== "undefined" && window.isSecureContext;
  if (secure && typeof navigator !== "undefined" && navigator.clipboard) {
    await navigator.clipboard.writeText(value);
    return;
  }
  copyWithTextarea(value);
}
