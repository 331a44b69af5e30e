import {Args, Command} from '@oclif/core'
import chalk from 'chalk'

import {GitService} from '../services/git.service.js'
import {RolloutService} from '../services/rollout.service.js'
import {ConfigManager} from '../utils/config.js'
import {isRollbackError} from '../utils/errors.js'
import {inquirerPrompter} from '../utils/prompt.js'

export default class Rollback extends Command {
  static args = {
    path: Args.string({
      description: 'A rollout.yaml file, or a directory to search for rollout.yaml files',
      required: true,
    }),
  }

  static description = 'Roll back rollout.yaml files to a previous git revision'

  static examples = ['<%= config.bin %> deploy/prod/rollout.yaml', '<%= config.bin %> deploy/']

  async run(): Promise<void> {
    const {args} = await this.parse(Rollback)
    const root = process.cwd()

    const config = await new ConfigManager(root, {warn: (message) => this.warn(message)}).loadConfig()
    const git = new GitService(root, {
      historyLimit: config.historyLimit,
      protectedBranches: config.protectedBranches,
    })
    const service = new RolloutService({
      git,
      log: (message) => this.log(message),
      prompter: inquirerPrompter,
      targetFileName: config.targetFileName,
    })

    try {
      await service.rollbackPath(args.path)
    } catch (error: unknown) {
      if (error instanceof Error && error.name === 'ExitPromptError') {
        this.exit(130)
      }

      if (isRollbackError(error)) {
        this.error(chalk.red(error.message), {exit: 1})
      }

      throw error
    }
  }
}
