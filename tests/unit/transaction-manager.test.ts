import { describe, it } from 'node:test'
import { TransactionManager } from '../../core/transaction-manager'
import { assert, assertDeepEqual, assertEqual } from '../utils/assertions'

describe('TransactionManager', () => {
  describe('addRollback', () => {
    it('should add rollback actions to the stack', async () => {
      const tx = new TransactionManager()
      const executed: string[] = []

      tx.addRollback({
        description: 'Action 1',
        execute: async () => {
          executed.push('Action 1')
        },
      })
      tx.addRollback({
        description: 'Action 2',
        execute: async () => {
          executed.push('Action 2')
        },
      })
      await tx.rollback()

      assertEqual(executed.length, 2, 'Should have run 2 actions')
    })

    it('should throw if adding rollback after commit', () => {
      const tx = new TransactionManager()
      tx.commit()

      let threw = false
      try {
        tx.addRollback({
          description: 'Should fail',
          execute: async () => {},
        })
      } catch (error) {
        threw = true
        assert(
          error instanceof Error && error.message.includes('after commit'),
          'Error message should mention commit',
        )
      }

      assert(threw, 'Should have thrown an error')
    })
  })

  describe('rollback', () => {
    it('should execute rollback actions in reverse order', async () => {
      const tx = new TransactionManager()
      const executionOrder: number[] = []

      tx.addRollback({
        description: 'First added',
        execute: async () => {
          executionOrder.push(1)
        },
      })
      tx.addRollback({
        description: 'Second added',
        execute: async () => {
          executionOrder.push(2)
        },
      })
      tx.addRollback({
        description: 'Third added',
        execute: async () => {
          executionOrder.push(3)
        },
      })

      await tx.rollback()

      assertEqual(executionOrder.length, 3, 'All actions should execute')
      assertEqual(
        executionOrder[0],
        3,
        'Third added should execute first (LIFO)',
      )
      assertEqual(executionOrder[1], 2, 'Second added should execute second')
      assertEqual(executionOrder[2], 1, 'First added should execute last')
    })

    it('should continue rollback even if one action fails', async () => {
      const tx = new TransactionManager()
      const executionOrder: string[] = []

      tx.addRollback({
        description: 'Will succeed',
        execute: async () => {
          executionOrder.push('success1')
        },
      })
      tx.addRollback({
        description: 'Will fail',
        execute: async () => {
          executionOrder.push('fail')
          throw new Error('Rollback failed')
        },
      })
      tx.addRollback({
        description: 'Will also succeed',
        execute: async () => {
          executionOrder.push('success2')
        },
      })

      // Should not throw
      await tx.rollback()

      assertEqual(
        executionOrder.length,
        3,
        'All actions should attempt to execute',
      )
      assert(
        executionOrder.includes('fail'),
        'Failed action should have been attempted',
      )
      assert(
        executionOrder.includes('success1'),
        'Success actions should execute',
      )
      assert(
        executionOrder.includes('success2'),
        'Success actions should execute',
      )
    })

    it('should clear the stack after rollback', async () => {
      const tx = new TransactionManager()
      let runs = 0

      tx.addRollback({
        description: 'Action',
        execute: async () => {
          runs += 1
        },
      })

      await tx.rollback()
      await tx.rollback()

      assertEqual(runs, 1, 'Second rollback finds an empty stack')
    })

    it('should do nothing if stack is empty', async () => {
      const tx = new TransactionManager()

      // Should not throw
      await tx.rollback()
    })

    it('should skip rollback if already committed', async () => {
      const tx = new TransactionManager()
      let executed = false

      tx.addRollback({
        description: 'Should not execute',
        execute: async () => {
          executed = true
        },
      })

      tx.commit()
      await tx.rollback()

      assert(!executed, 'Rollback should not execute after commit')
    })
  })

  describe('commit', () => {
    it('should be idempotent', async () => {
      const tx = new TransactionManager()
      let executed = false

      tx.addRollback({
        description: 'Action',
        execute: async () => {
          executed = true
        },
      })

      tx.commit()
      tx.commit() // Should not throw
      await tx.rollback()

      assert(!executed, 'Should remain committed')
    })
  })

  describe('step', () => {
    it('should register the undo with the value run returned', async () => {
      const tx = new TransactionManager()
      const undone: string[] = []

      const created = await tx.step({
        description: 'Create directory',
        run: async () => '/srv/created',
        undo: async (path) => {
          undone.push(path)
        },
      })

      assertEqual(created, '/srv/created', 'Should return the result of run')

      await tx.rollback()
      assertDeepEqual(undone, ['/srv/created'], 'Undo should get the run result')
    })

    it('should not register an undo when run fails', async () => {
      const tx = new TransactionManager()
      let undone = false

      let threw = false
      try {
        await tx.step({
          description: 'Failing step',
          run: async () => {
            throw new Error('initdb failed')
          },
          undo: async () => {
            undone = true
          },
        })
      } catch {
        threw = true
      }
      await tx.rollback()

      assert(threw, 'Should rethrow the step failure')
      assert(!undone, 'Nothing to undo for a failed step')
      assertDeepEqual(tx.getCompletedSteps(), [], 'Failed step is not completed')
    })

    it('should record completed steps in order', async () => {
      const tx = new TransactionManager()

      await tx.step({ description: 'first', run: async () => 1 })
      await tx.step({ description: 'second', run: async () => 2 })

      assertDeepEqual(tx.getCompletedSteps(), ['first', 'second'], 'Completed steps in order')
    })

    it('should refuse steps after commit', async () => {
      const tx = new TransactionManager()
      tx.commit()

      let threw = false
      try {
        await tx.step({ description: 'late', run: async () => undefined })
      } catch (error) {
        threw = error instanceof Error && error.message.includes('after commit')
      }

      assert(threw, 'Should reject a step after commit')
    })
  })
})
