/**
 * Prepare free text for an OpenAlex `.search` filter: commas separate filters
 * there, so they become spaces; whitespace runs collapse to one space.
 */
export function sanitizeSearchText(text: string): string;
export function sanitizeSearchText(text: string | undefined): string | undefined;
export function sanitizeSearchText(text: string | undefined): string | undefined {
  if (!text) return text;
  return text.replace(/,/g, " ").replace(/\s+/g, " ").trim();
}
