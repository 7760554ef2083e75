import type { ActionDescription } from './action.js'

export function formatDescriptions(descriptions: ActionDescription[], explain = false): string {
  if (!descriptions.length) return 'No changes.'
  const lines: string[] = []
  for (const d of descriptions) {
    lines.push(`- ${d.description}`)
    if (!explain) continue
    for (const e of d.explanation) lines.push(`  * ${e}`)
  }
  return lines.join('\n')
}

export function formatSettings(settings: object): string {
  return Object.entries(settings)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `* ${k}: ${typeof v === 'string' ? v : JSON.stringify(v)}`)
    .join('\n')
}
