import type {HistoryEntry} from '../types/rollout.js'

import {MAX_HISTORY_LIMIT, withProtectedBranches} from '../utils/config.js'
import {RollbackError, describeError} from '../utils/errors.js'
import {HISTORY_DATE_FORMAT, HISTORY_FORMAT, parseHistory} from '../utils/history.js'
import {type GitRunner, createGitRunner} from './git-runner.js'

export interface GitServiceOptions {
  historyLimit?: number
  protectedBranches?: string[]
  runner?: GitRunner
}

export class GitService {
  private runner: GitRunner
  private protectedBranches: string[]
  private historyLimit: number

  constructor(root: string = process.cwd(), options: GitServiceOptions = {}) {
    this.runner = options.runner ?? createGitRunner(root)
    this.protectedBranches = withProtectedBranches(options.protectedBranches ?? [])
    this.historyLimit = Math.min(options.historyLimit ?? MAX_HISTORY_LIMIT, MAX_HISTORY_LIMIT)
  }

  /**
   * Confirm we are inside a work tree on a branch that accepts rollback commits.
   * Returns the current branch name ('' on a detached HEAD).
   */
  ensureRepository(): string {
    let inside: string
    try {
      inside = this.runner.capture(['rev-parse', '--is-inside-work-tree']).trim()
    } catch (error) {
      throw new RollbackError('NotARepository', 'not a git repository', {cause: error})
    }

    if (inside !== 'true') {
      throw new RollbackError('NotARepository', 'not a git repository')
    }

    let branch: string
    try {
      branch = this.runner.capture(['branch', '--show-current']).trim()
    } catch (error) {
      throw new RollbackError('NotARepository', `failed to get the current branch: ${describeError(error)}`, {
        cause: error,
      })
    }

    if (this.protectedBranches.includes(branch)) {
      throw new RollbackError('ProtectedBranch', `current branch '${branch}' is a protected branch`, {branch})
    }

    return branch
  }

  /**
   * Most recent commits touching `filePath`, newest first.
   */
  getFileHistory(filePath: string): HistoryEntry[] {
    let output: string
    try {
      output = this.runner.capture([
        'log',
        `--pretty=format:${HISTORY_FORMAT}`,
        `--date=format:${HISTORY_DATE_FORMAT}`,
        '-n',
        String(this.historyLimit),
        '--',
        filePath,
      ])
    } catch (error) {
      throw new RollbackError('HistoryUnavailable', `failed to retrieve git history: ${describeError(error)}`, {
        cause: error,
      })
    }

    const history = parseHistory(output)
    if (history.length === 0) {
      throw new RollbackError('HistoryUnavailable', `no git history found for '${filePath}'`)
    }

    return history
  }

  /**
   * Restore `filePath` as of `revision` and commit only that path. A failed
   * commit leaves the restored file in the working tree.
   */
  rollbackFile(filePath: string, revision: string): void {
    try {
      this.runner.passthrough(['checkout', revision, '--', filePath])
    } catch (error) {
      throw new RollbackError('CheckoutFailed', `failed to checkout commit ${revision}: ${describeError(error)}`, {
        cause: error,
      })
    }

    try {
      this.runner.passthrough(['commit', '-m', rollbackCommitMessage(filePath, revision), '--', filePath])
    } catch (error) {
      throw new RollbackError(
        'CommitFailed',
        `failed to create commit: ${describeError(error)}. '${filePath}' has been restored to ${revision} but is NOT committed; the working tree is left modified`,
        {cause: error},
      )
    }
  }
}

export function rollbackCommitMessage(filePath: string, revision: string): string {
  return `Roll back '${filePath}' to commit ${revision}`
}
