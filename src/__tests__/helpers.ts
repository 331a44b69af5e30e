import type {GitRunner} from '../services/git-runner.js'
import type {Prompter} from '../utils/prompt.js'

type Reply = Error | string

/**
 * In-memory git keyed by subcommand (`rev-parse`, `branch`, `log`, ...).
 */
export class FakeGitRunner implements GitRunner {
  readonly calls: string[][] = []
  private replies: Record<string, Reply>

  constructor(replies: Record<string, Reply> = {}) {
    this.replies = {
      branch: 'feature/rollout\n',
      'rev-parse': 'true\n',
      ...replies,
    }
  }

  capture(args: string[]): string {
    this.calls.push(args)
    const reply = this.replies[args[0]] ?? ''
    if (reply instanceof Error) throw reply
    return reply
  }

  passthrough(args: string[]): void {
    this.calls.push(args)
    const reply = this.replies[args[0]]
    if (reply instanceof Error) throw reply
  }

  commands(): string[] {
    return this.calls.map((args) => args[0])
  }
}

export class ScriptedPrompter implements Prompter {
  readonly questions: Array<{defaultValue?: string; message: string}> = []
  private answers: string[]

  constructor(answers: string[]) {
    this.answers = [...answers]
  }

  async ask(message: string, defaultValue?: string): Promise<string> {
    this.questions.push({defaultValue, message})
    const answer = this.answers.shift()
    if (answer === undefined) {
      throw new Error(`Unexpected prompt: ${message}`)
    }

    // Mirror inquirer, which hands back the default for blank input.
    return answer === '' && defaultValue !== undefined ? defaultValue : answer
  }
}

export const SAMPLE_LOG = 'abc123, Alice, 2024-01-01 10:00:00, fix config\nabc000, Bob, 2023-12-31 09:00:00, initial'
