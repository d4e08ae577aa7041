// Chat message formatting in the HTML subset chat clients render

const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#039;",
  "\t": "    ",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"'\t]/g, (char) => ESCAPES[char] ?? char);
}

export function bold(text: string): string {
  return `<b>${text}</b>`;
}

export function code(text: string): string {
  return `<code>${text}</code>`;
}

export function link(text: string, url: string): string {
  return `<a href="${escapeHtml(url)}">${text}</a>`;
}

const UNESCAPES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#039;": "'",
};

/** Plain text of a formatted message, for terminals. */
export function stripHtml(html: string): string {
  return html
    .replace(/<[^>]*>/g, "")
    .replace(/&(?:amp|lt|gt|quot|#039);/g, (entity) => UNESCAPES[entity] ?? entity);
}
