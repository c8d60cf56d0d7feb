import ora, { type Ora } from 'ora'
import type { ProgressCallback } from '../../types'

/**
 * Create a spinner with consistent styling
 */
export function createSpinner(text: string): Ora {
  return ora({
    text,
    color: 'cyan',
    spinner: 'dots',
  })
}

/**
 * Run an async operation with a spinner whose text follows the
 * operation's progress reports
 */
export async function withSpinner<T>(
  text: string,
  operation: (onProgress: ProgressCallback) => Promise<T>,
): Promise<T> {
  const spinner = createSpinner(text)
  spinner.start()

  try {
    const result = await operation(({ message }) => {
      spinner.text = message
    })
    spinner.stop()
    return result
  } catch (err) {
    spinner.fail(err instanceof Error ? err.message : String(err))
    throw err
  }
}
