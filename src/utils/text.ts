/** Collapses runs of whitespace, including the non-breaking and zero-width spaces the sources pad cells with. */
export function normalizeWhitespace(text: string): string {
  return text.replace(/[\s\u200b]+/g, " ").trim();
}

/** At most `maxLength` characters; a cut excerpt ends with an ellipsis. */
export function excerpt(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, Math.max(0, maxLength - 1)).trimEnd()}…`;
}
