/**
 * Shared helpers
 */

/**
 * Shorten text to `max` characters, marking the cut with an ellipsis
 */
export function truncate(text: string, max: number): string {
  if (text.length <= max) {
    return text;
  }
  return `${text.slice(0, max)}...`;
}
