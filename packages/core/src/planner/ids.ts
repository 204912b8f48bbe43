import crypto from 'node:crypto'

// Same inputs, same id; regenerating a plan must not churn identifiers
export function stableId(prefix: string, ...parts: Array<string | number | Date>): string {
  const material = parts.map((p) => (p instanceof Date ? p.toISOString() : String(p))).join('|')
  return `${prefix}_${crypto.createHash('sha256').update(material).digest('hex').slice(0, 16)}`
}
