import chalk from 'chalk'

import type {HistoryEntry} from '../types/rollout.js'
import type {Prompter} from './prompt.js'

// Invalid answers are never raised as errors; they keep the selection pending.
export type SelectionState = {index: number; status: 'accepted'} | {status: 'pending'}

export function defaultSelection(length: number): number {
  return Math.min(2, length)
}

/**
 * Blank input takes `defaultIndex`; anything that is not a whole number in
 * [1, length] leaves the selection pending.
 */
export function parseSelection(raw: string, length: number, defaultIndex: number = defaultSelection(length)): SelectionState {
  const value = raw.trim()
  if (value === '') return {index: defaultIndex, status: 'accepted'}
  if (!/^\d+$/.test(value)) return {status: 'pending'}

  const index = Number.parseInt(value, 10)
  if (index < 1 || index > length) return {status: 'pending'}

  return {index, status: 'accepted'}
}

/**
 * Prompt until the operator picks a valid 1-based index into `history`.
 */
export async function selectRevision(
  history: HistoryEntry[],
  prompter: Prompter,
  log: (message: string) => void,
): Promise<number> {
  const defaultIndex = defaultSelection(history.length)
  let state: SelectionState = {status: 'pending'}

  while (state.status === 'pending') {
    const answer = await prompter.ask('Enter the number of the commit to rollback to', String(defaultIndex))
    state = parseSelection(answer, history.length, defaultIndex)
    if (state.status === 'pending') {
      log(chalk.yellow('Invalid number. Please try again.'))
    }
  }

  return state.index
}
