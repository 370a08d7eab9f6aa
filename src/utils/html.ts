const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

/**
 * Escapes text for element content and quoted attribute values.
 */
export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

/**
 * Accepts only http(s) and data:image URLs for use in src/href attributes.
 */
export function safeUrl(value: string): string | undefined {
  const trimmed = value.trim();
  return /^(https?:\/\/|data:image\/)/i.test(trimmed) ? trimmed : undefined;
}
