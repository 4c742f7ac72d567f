/** `?share=<id>` on load means "replay this record". */
export function readShareId(search: string): string | null {
  const id = new URLSearchParams(search).get("share")?.trim();
  return id ? id : null;
}
