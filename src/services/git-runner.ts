import {execFileSync} from 'node:child_process'

export interface GitRunner {
  /** Runs git and returns its stdout; throws when git exits non-zero. */
  capture(args: string[]): string
  /** Runs git with the terminal's stdio so git's own diagnostics reach the operator. */
  passthrough(args: string[]): void
}

export function createGitRunner(cwd: string = process.cwd(), binary: string = 'git'): GitRunner {
  return {
    capture(args) {
      return execFileSync(binary, args, {cwd, encoding: 'utf8', stdio: ['ignore', 'pipe', 'pipe']})
    },

    passthrough(args) {
      execFileSync(binary, args, {cwd, stdio: 'inherit'})
    },
  }
}
