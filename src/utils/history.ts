import type {HistoryEntry} from '../types/rollout.js'

export const HISTORY_FORMAT = '%h, %an, %ad, %s'
export const HISTORY_DATE_FORMAT = '%Y-%m-%d %H:%M:%S'

export function parseHistoryEntry(line: string): HistoryEntry {
  const [revision = '', author = '', date = '', ...subject] = line.split(',')

  return {
    author: author.trim(),
    date: date.trim(),
    raw: line,
    revision: revision.trim(),
    subject: subject.join(',').trim(),
  }
}

export function parseHistory(output: string): HistoryEntry[] {
  const trimmed = output.trim()
  if (!trimmed) return []

  return trimmed.split(/\r?\n/).map((line) => parseHistoryEntry(line))
}

/**
 * Renders entries as a 1-based menu, right-aligning single-digit indices
 * against the two-digit ones.
 */
export function formatHistory(entries: HistoryEntry[]): string[] {
  return entries.map((entry, i) => `${String(i + 1).padStart(2)}. ${entry.raw}`)
}
