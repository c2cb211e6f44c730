/**
 * Transaction Manager
 *
 * Provides rollback support for multi-step cluster operations (create,
 * upgrade). Each forward step may register a compensating action; if a
 * later step fails, the compensations run in reverse order.
 */

import { logError, logDebug, ErrorCodes } from './error-handler'

export type RollbackAction = {
  description: string
  execute: () => Promise<void>
}

/**
 * A forward action paired with the action that undoes it.
 * `undo` receives whatever `run` returned.
 */
export type TransactionStep<T> = {
  description: string
  run: () => Promise<T>
  undo?: (result: T) => Promise<void>
}

/**
 * Manages a stack of rollback actions for transactional operations.
 *
 * Usage:
 * ```ts
 * const tx = new TransactionManager()
 *
 * try {
 *   await tx.step({
 *     description: 'Create configuration directory',
 *     run: () => mkdir(configDir),
 *     undo: () => rm(configDir, { recursive: true, force: true }),
 *   })
 *
 *   await tx.step({ description: 'Run initdb', run: () => initdb() })
 *
 *   tx.commit()
 * } catch (error) {
 *   await tx.rollback()
 *   throw error
 * }
 * ```
 */
export class TransactionManager {
  private rollbackStack: RollbackAction[] = []
  private committed = false
  private completed: string[] = []

  /**
   * Add a rollback action to the stack.
   * Actions are executed in reverse order during rollback.
   */
  addRollback(action: RollbackAction): void {
    if (this.committed) {
      throw new Error('Cannot add rollback action after commit')
    }
    this.rollbackStack.push(action)
    logDebug(`Added rollback action: ${action.description}`, {
      totalActions: this.rollbackStack.length,
    })
  }

  /**
   * Run one forward step and register its compensation once it succeeded
   */
  async step<T>(step: TransactionStep<T>): Promise<T> {
    if (this.committed) {
      throw new Error('Cannot run a step after commit')
    }
    logDebug(`Running step: ${step.description}`)
    const result = await step.run()
    this.completed.push(step.description)
    const undo = step.undo
    if (undo) {
      this.addRollback({
        description: step.description,
        execute: () => undo(result),
      })
    }
    return result
  }

  /**
   * Execute all rollbacks in reverse order.
   * Continues even if individual rollback actions fail.
   */
  async rollback(): Promise<void> {
    if (this.committed) {
      logDebug('Skipping rollback - transaction was committed')
      return
    }

    if (this.rollbackStack.length === 0) {
      logDebug('No rollback actions to execute')
      return
    }

    logDebug(`Starting rollback of ${this.rollbackStack.length} actions`)

    // LIFO
    for (
      let action = this.rollbackStack.pop();
      action !== undefined;
      action = this.rollbackStack.pop()
    ) {
      try {
        logDebug(`Executing rollback: ${action.description}`)
        await action.execute()
        logDebug(`Rollback successful: ${action.description}`)
      } catch (error) {
        logError({
          code: ErrorCodes.ROLLBACK_FAILED,
          message: `Failed to rollback: ${action.description}`,
          severity: 'warning',
          context: {
            error: error instanceof Error ? error.message : String(error),
          },
        })
      }
    }

    logDebug('Rollback complete')
  }

  /**
   * Mark the transaction as committed.
   * Clears the rollback stack since we don't need to undo anything.
   */
  commit(): void {
    if (this.committed) {
      return
    }

    logDebug(`Committing transaction with ${this.rollbackStack.length} actions`)
    this.rollbackStack = []
    this.committed = true
  }

  /**
   * Descriptions of the forward steps that finished, in order
   */
  getCompletedSteps(): string[] {
    return [...this.completed]
  }
}
