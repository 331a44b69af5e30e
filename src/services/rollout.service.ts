import chalk from 'chalk'
import fs from 'fs-extra'
import ora from 'ora'

import type {HistoryEntry, RollbackOutcome, RollbackResult, RolloutFileSet} from '../types/rollout.js'
import type {Prompter} from '../utils/prompt.js'

import {DEFAULT_CONFIG} from '../utils/config.js'
import {RollbackError} from '../utils/errors.js'
import {formatHistory} from '../utils/history.js'
import {selectRevision} from '../utils/selector.js'
import {findRolloutFiles, isRolloutFile} from '../utils/walker.js'
import {GitService} from './git.service.js'

export interface RolloutServiceOptions {
  git: GitService
  log: (message: string) => void
  prompter: Prompter
  spinner?: boolean
  targetFileName?: string
}

export class RolloutService {
  private git: GitService
  private log: (message: string) => void
  private prompter: Prompter
  private spinner: boolean
  private targetFileName: string

  constructor(options: RolloutServiceOptions) {
    this.git = options.git
    this.log = options.log
    this.prompter = options.prompter
    this.spinner = options.spinner ?? true
    this.targetFileName = options.targetFileName ?? DEFAULT_CONFIG.targetFileName
  }

  async rollbackPath(targetPath: string): Promise<RollbackResult> {
    if (!(await fs.pathExists(targetPath))) {
      throw new RollbackError('PathNotFound', `The path '${targetPath}' does not exist.`)
    }

    this.git.ensureRepository()

    const stats = await fs.stat(targetPath)
    if (stats.isDirectory()) {
      return this.rollbackDirectory(targetPath)
    }

    if (!stats.isFile() || !isRolloutFile(targetPath, this.targetFileName)) {
      this.log(chalk.yellow(`'${targetPath}' is not a ${this.targetFileName} file; nothing to do.`))
      return {status: 'not-applicable', targetPath}
    }

    const outcome = await this.rollbackFile(targetPath)
    return {session: {kind: 'file', outcomes: [outcome], targetPath}, status: 'completed'}
  }

  /**
   * Show the file's history, ask which revision to restore and roll back to it.
   * Choosing entry 1 (the current revision) leaves the file untouched.
   */
  async rollbackFile(filePath: string): Promise<RollbackOutcome> {
    const spinner = this.startSpinner(`Reading git history for '${filePath}'...`)
    let history: HistoryEntry[]
    try {
      history = this.git.getFileHistory(filePath)
    } finally {
      spinner?.stop()
    }

    this.log('')
    this.log(chalk.cyan(`Git history for '${filePath}':`))
    for (const line of formatHistory(history)) {
      this.log(line)
    }

    const index = await selectRevision(history, this.prompter, this.log)
    const {revision} = history[index - 1]

    if (index === 1) {
      this.log(
        chalk.gray(`No rollback has been done for '${filePath}' because it is already at commit number 1.`),
      )
      return {file: filePath, revision, rolledBack: false}
    }

    this.git.rollbackFile(filePath, revision)
    this.log(chalk.green(`✓ Successfully rolled back '${filePath}' to commit ${revision}.`))
    return {file: filePath, revision, rolledBack: true}
  }

  private async rollbackDirectory(dirPath: string): Promise<RollbackResult> {
    const spinner = this.startSpinner(`Scanning '${dirPath}' for ${this.targetFileName} files...`)
    let files: RolloutFileSet
    try {
      files = await findRolloutFiles(dirPath, this.targetFileName)
    } finally {
      spinner?.stop()
    }

    this.log(chalk.cyan(`Found ${files.length} ${this.targetFileName} files:`))
    for (const file of files) {
      this.log(chalk.gray(file))
    }

    if (files.length === 0) {
      return {session: {kind: 'directory', outcomes: [], targetPath: dirPath}, status: 'completed'}
    }

    const response = await this.prompter.ask(
      `Would you like to continue with rolling back all ${files.length} of these files? (yes/no)`,
    )
    if (response.trim().toLowerCase() !== 'yes') {
      this.log(chalk.yellow('Operation aborted by the user.'))
      return {files, status: 'aborted'}
    }

    this.log(`Proceeding with rollback for all ${this.targetFileName} files...`)
    const outcomes: RollbackOutcome[] = []
    for (const file of files) {
      outcomes.push(await this.rollbackFile(file))
    }

    return {session: {kind: 'directory', outcomes, targetPath: dirPath}, status: 'completed'}
  }

  private startSpinner(text: string) {
    return this.spinner ? ora(text).start() : undefined
  }
}
