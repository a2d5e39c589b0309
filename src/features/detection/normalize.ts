/**
 * Trims the text and turns non-breaking spaces into plain spaces.
 * Case, punctuation and inner whitespace are left alone: the patterns and the
 * recognizer depend on them.
 */
export function normalize(text: string): string {
  return text.trim().replace(/\u00a0/g, ' ');
}
