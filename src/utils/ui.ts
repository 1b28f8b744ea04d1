import type { ChalkInstance } from 'chalk'
import type { Ora } from 'ora'

/**
 * Terminal UI pieces for commands
 *
 * chalk and ora are loaded lazily and left out entirely in --json mode so
 * JSON output stays free of colour codes and spinner frames.
 */
export interface CommandUI {
  spinner: Ora | null
  chalk: ChalkInstance | null
}

export async function initializeUI(isJson: boolean): Promise<CommandUI> {
  if (isJson) {
    return { spinner: null, chalk: null }
  }
  const ora = (await import('ora')).default
  const chalk = (await import('chalk')).default
  return { spinner: ora(), chalk }
}
