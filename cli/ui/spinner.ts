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
    // plain lines when piped
    isEnabled: process.stdout.isTTY === true,
  })
}

/**
 * Run an async operation with a spinner
 */
export async function withSpinner<T>(text: string, operation: () => Promise<T>): Promise<T> {
  const spinner = createSpinner(text)
  spinner.start()

  try {
    const result = await operation()
    spinner.succeed()
    return result
  } catch (error) {
    spinner.fail()
    throw error
  }
}

/**
 * Progress tracker for multi-step operations: every new stage closes the
 * previous one as succeeded
 */
export class ProgressTracker {
  private spinner: Ora | null = null
  private stage: string | null = null

  /**
   * Callback for the core's onProgress option
   */
  readonly onProgress: ProgressCallback = ({ stage, message }) => {
    if (this.spinner && stage === this.stage) {
      this.spinner.text = message
      return
    }
    this.spinner?.succeed()
    this.stage = stage
    this.spinner = createSpinner(message)
    this.spinner.start()
  }

  succeed(text?: string): void {
    this.spinner?.succeed(text)
    this.spinner = null
  }

  fail(text?: string): void {
    this.spinner?.fail(text)
    this.spinner = null
  }
}
