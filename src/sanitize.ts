const ILLEGAL_CHARACTERS = /[:*?<>|/\\"']/g;

export function sanitizeSegment(text: string, removeIllegalChars: boolean): string {
  if (!removeIllegalChars) {
    return text.trim();
  }

  return text.replace(ILLEGAL_CHARACTERS, '').replaceAll('...', '').trim();
}
