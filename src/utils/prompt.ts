import {input} from '@inquirer/prompts'

export interface Prompter {
  ask(message: string, defaultValue?: string): Promise<string>
}

// Inquirer substitutes the default on empty input, so callers never see ''
// when a default was given.
export const inquirerPrompter: Prompter = {
  ask(message, defaultValue) {
    return input({default: defaultValue, message})
  },
}
