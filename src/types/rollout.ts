export interface HistoryEntry {
  author: string
  date: string
  raw: string // "abc123, Alice, 2024-01-01 10:00:00, subject"
  revision: string
  subject: string
}

export type RolloutFileSet = readonly string[]

export interface RollbackOutcome {
  file: string
  revision: string
  rolledBack: boolean
}

export interface RollbackSession {
  kind: 'directory' | 'file'
  outcomes: RollbackOutcome[]
  targetPath: string
}

export type RollbackResult =
  | {files: RolloutFileSet; status: 'aborted'}
  | {session: RollbackSession; status: 'completed'}
  | {status: 'not-applicable'; targetPath: string}
