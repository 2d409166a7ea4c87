import { createHash } from 'node:crypto'

/** Short content fingerprint: first 16 hex chars of the sha256. */
export function computeRevision(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex').slice(0, 16)
}
