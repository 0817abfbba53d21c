export function buildCitation(url: string): string {
  return `Source: FFIEC HMDA Data Browser API (${url})`
}
