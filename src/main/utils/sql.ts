/** Lowercased `%term%` pattern for `LIKE ... ESCAPE '\'`. */
export function containsPattern(term: string): string {
  const escaped = term.toLowerCase().replace(/[\\%_]/g, (char) => `\\${char}`)
  return `%${escaped}%`
}

export function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ')
}
