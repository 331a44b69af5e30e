import * as dotenv from 'dotenv'
import fs from 'fs-extra'
import os from 'node:os'
import path from 'node:path'

export interface RollbackConfig {
  [key: string]: unknown
  historyLimit?: number
  protectedBranches?: string[]
  targetFileName?: string
}

export type ResolvedRollbackConfig = Required<Pick<RollbackConfig, 'historyLimit' | 'protectedBranches' | 'targetFileName'>>

// Always protected; configured branches are added to these, never replace them.
export const PROTECTED_BRANCHES: readonly string[] = ['master', 'develop', 'main']
export const MAX_HISTORY_LIMIT = 10

export const DEFAULT_CONFIG: ResolvedRollbackConfig = {
  historyLimit: MAX_HISTORY_LIMIT,
  protectedBranches: [...PROTECTED_BRANCHES],
  targetFileName: 'rollout.yaml',
}

export function withProtectedBranches(branches: readonly string[]): string[] {
  return [...new Set([...PROTECTED_BRANCHES, ...branches])]
}

const CONFIG_DIR_NAME = '.rollback'
const CONFIG_FILE_NAME = 'config.json'
const ENV_FILE_NAME = '.env'

export interface ConfigManagerOptions {
  env?: NodeJS.ProcessEnv
  homeDir?: string
  warn?: (message: string) => void
}

export class ConfigManager {
  private projectRoot: string
  private homeDir: string
  private env: NodeJS.ProcessEnv
  private warn: (message: string) => void

  constructor(projectRoot: string = process.cwd(), options: ConfigManagerOptions = {}) {
    this.projectRoot = projectRoot
    this.homeDir = options.homeDir ?? os.homedir()
    this.env = options.env ?? process.env
    this.warn = options.warn ?? ((message) => console.warn(`Warning: ${message}`))
  }

  // Get global config path (~/.rollback/config.json)
  public getGlobalConfigPath(): string {
    return path.join(this.homeDir, CONFIG_DIR_NAME, CONFIG_FILE_NAME)
  }

  public getProjectConfigPath(): string {
    return path.join(this.projectRoot, CONFIG_DIR_NAME, 'project.json')
  }

  // Load configuration with precedence (protectedBranches accumulate across layers):
  // 1. Overrides (passed as arg)
  // 2. Environment (process env over the project .env file)
  // 3. Project Config (.rollback/project.json)
  // 4. Global Config (~/.rollback/config.json)
  // 5. Defaults
  public async loadConfig(overrides: Partial<RollbackConfig> = {}): Promise<ResolvedRollbackConfig> {
    const globalConfig = await this.readJsonFile(this.getGlobalConfigPath())
    const projectConfig = await this.readJsonFile(this.getProjectConfigPath())
    const envConfig = await this.readEnvConfig()

    let resolved: ResolvedRollbackConfig = {...DEFAULT_CONFIG}
    for (const layer of [globalConfig, projectConfig, envConfig, overrides]) {
      resolved = this.applyLayer(resolved, layer)
    }

    return resolved
  }

  private applyLayer(base: ResolvedRollbackConfig, layer: Partial<RollbackConfig>): ResolvedRollbackConfig {
    const next = {...base}

    if (layer.historyLimit !== undefined) {
      if (!Number.isInteger(layer.historyLimit) || layer.historyLimit < 1) {
        this.warn(`Ignoring invalid historyLimit '${String(layer.historyLimit)}'`)
      } else if (layer.historyLimit > MAX_HISTORY_LIMIT) {
        this.warn(`historyLimit ${layer.historyLimit} exceeds ${MAX_HISTORY_LIMIT}; using ${MAX_HISTORY_LIMIT}`)
        next.historyLimit = MAX_HISTORY_LIMIT
      } else {
        next.historyLimit = layer.historyLimit
      }
    }

    if (layer.protectedBranches !== undefined) {
      const branches = Array.isArray(layer.protectedBranches)
        ? layer.protectedBranches.filter((branch) => typeof branch === 'string' && branch.length > 0)
        : []
      if (branches.length > 0) {
        next.protectedBranches = withProtectedBranches([...next.protectedBranches, ...branches])
      } else {
        this.warn('Ignoring empty protectedBranches list')
      }
    }

    if (layer.targetFileName !== undefined) {
      if (typeof layer.targetFileName === 'string' && layer.targetFileName.trim().length > 0) {
        next.targetFileName = layer.targetFileName.trim()
      } else {
        this.warn('Ignoring empty targetFileName')
      }
    }

    return next
  }

  private async readEnvConfig(): Promise<Partial<RollbackConfig>> {
    const envPath = path.join(this.projectRoot, ENV_FILE_NAME)
    const fileEnv = (await fs.pathExists(envPath)) ? dotenv.parse(await fs.readFile(envPath)) : {}
    const lookup = (key: string): string | undefined => this.env[key] ?? fileEnv[key]

    const config: Partial<RollbackConfig> = {}

    const branches = lookup('ROLLBACK_PROTECTED_BRANCHES')
    if (branches !== undefined) {
      config.protectedBranches = branches
        .split(',')
        .map((branch) => branch.trim())
        .filter(Boolean)
    }

    const target = lookup('ROLLBACK_TARGET_FILE')
    if (target !== undefined) {
      config.targetFileName = target
    }

    const limit = lookup('ROLLBACK_HISTORY_LIMIT')
    if (limit !== undefined) {
      if (/^\d+$/.test(limit.trim())) {
        config.historyLimit = Number.parseInt(limit, 10)
      } else {
        this.warn(`Ignoring invalid ROLLBACK_HISTORY_LIMIT '${limit}'`)
      }
    }

    return config
  }

  // Read a JSON file safely
  private async readJsonFile(filePath: string): Promise<Partial<RollbackConfig>> {
    if (await fs.pathExists(filePath)) {
      try {
        const data: unknown = await fs.readJson(filePath)
        if (data !== null && typeof data === 'object' && !Array.isArray(data)) {
          return {...data}
        }

        this.warn(`Config file at ${filePath} is not an object`)
      } catch {
        this.warn(`Failed to parse config file at ${filePath}`)
      }
    }

    return {}
  }
}
