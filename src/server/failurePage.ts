const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/**
 * Page shown in place of the requested file when the build fails.
 * Build output often contains `<` (compiler diagnostics, JSX), so it is escaped.
 */
export function renderFailurePage(message: string): string {
  return `<pre>${escapeHtml(message)}</pre>`;
}
