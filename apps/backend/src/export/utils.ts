// apps/backend/src/export/utils.ts

export function escapeHtml(value: unknown): string {
  const s = String(value ?? '')
  return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;')
}

/** For values placed inside double-quoted attributes. */
export function escapeAttr(value: unknown): string {
  return escapeHtml(value).replace(/"/g, '&quot;').replace(/'/g, '&#39;')
}
