import fs from 'fs-extra'
import path from 'node:path'

import type {RolloutFileSet} from '../types/rollout.js'

import {DEFAULT_CONFIG} from './config.js'
import {RollbackError, describeError} from './errors.js'

const byName = (a: {name: string}, b: {name: string}): number => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)

/**
 * Depth-first walk collecting regular files named `fileName` (any case).
 * Directory entries are visited in byte order of their names; symlinks are
 * neither followed nor matched. Any unreadable directory aborts the whole walk.
 */
export async function findRolloutFiles(
  root: string,
  fileName: string = DEFAULT_CONFIG.targetFileName,
): Promise<RolloutFileSet> {
  const target = fileName.toLowerCase()
  const files: string[] = []

  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.readdir(dir, {withFileTypes: true}).catch((error: unknown) => {
      throw new RollbackError('WalkFailed', `failed to read '${dir}': ${describeError(error)}`, {cause: error})
    })

    for (const entry of entries.sort(byName)) {
      const entryPath = path.join(dir, entry.name)
      if (entry.isDirectory()) {
        await walk(entryPath)
      } else if (entry.isFile() && entry.name.toLowerCase() === target) {
        files.push(entryPath)
      }
    }
  }

  await walk(root)
  return files
}

export function isRolloutFile(filePath: string, fileName: string = DEFAULT_CONFIG.targetFileName): boolean {
  return path.basename(filePath).toLowerCase() === fileName.toLowerCase()
}
