/**
 * clipboard.ts
 * Copies the share link or the result summary. Uses the async Clipboard API
 * where available and falls back to a hidden textarea + execCommand("copy").
 *
 *   import { copyText } from "./lib/clipboard";
 *   await copyText(shareUrl);
 */

/** Async Clipboard API needs a secure context (https / localhost). */
export function canUseAsyncClipboard(): boolean {
  return typeof navigator !== "undefined" && !!navigator.clipboard && window.isSecureContext;
}

/** Throws when the copy did not happen. */
export async function copyText(text: string): Promise<void> {
  if (canUseAsyncClipboard()) {
    await navigator.clipboard.writeText(text);
    return;
  }

  const ta = document.createElement("textarea");
  ta.value = text;

  // iOS/Safari: keep it off-screen and read-only
  ta.setAttribute("readonly", "true");
  ta.style.position = "fixed";
  ta.style.top = "-10000px";
  ta.style.left = "-10000px";

  document.body.appendChild(ta);
  ta.select();
  ta.setSelectionRange(0, ta.value.length);

  let ok = false;
  try {
    ok = document.execCommand("copy");
  } finally {
    document.body.removeChild(ta);
  }

  if (!ok) {
    throw new Error("Failed to copy to clipboard");
  }
}
