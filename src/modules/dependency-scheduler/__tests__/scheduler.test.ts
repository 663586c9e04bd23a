/**
 * Unit tests for dependency-resolver.ts and scheduler.ts
 */

import { describe, it, expect } from 'vitest'
import { PlanCycleError, PlanInvalidError } from '../../../core/errors.js'
import { detectCycle, validateDependencies } from '../dependency-resolver.js'
import { scheduleBatches, scheduleOrder, schedulePlan, validatePlan } from '../scheduler.js'
import { PlanSchema } from '../schemas.js'

function item(id: string, dependencyIds: number[] = []): { id: string; dependencyIds: number[] } {
  return { id, dependencyIds }
}

// ---------------------------------------------------------------------------
// detectCycle
// ---------------------------------------------------------------------------

describe('detectCycle', () => {
  it('returns null for independent items', () => {
    expect(detectCycle([item('a'), item('b')])).toBeNull()
  })

  it('returns null for a diamond', () => {
    const items = [item('a'), item('b', [0]), item('c', [0]), item('d', [1, 2])]
    expect(detectCycle(items)).toBeNull()
  })

  it('detects a two-item cycle as an index path', () => {
    expect(detectCycle([item('a', [1]), item('b', [0])])).toEqual([0, 1, 0])
  })

  it('detects a cycle that does not include item 0', () => {
    const items = [item('a'), item('b', [2]), item('c', [1])]
    expect(detectCycle(items)).toEqual([1, 2, 1])
  })

  it('ignores out-of-range indices', () => {
    expect(detectCycle([item('a', [7])])).toBeNull()
  })
})

// ---------------------------------------------------------------------------
// validateDependencies / validatePlan
// ---------------------------------------------------------------------------

describe('validateDependencies', () => {
  it('returns no problems for a sound plan', () => {
    expect(validateDependencies([item('a'), item('b', [0])])).toEqual([])
  })

  it('reports out-of-range indices', () => {
    expect(validateDependencies([item('a', [3])])).toEqual([
      'Work item "a" depends on index 3, outside 0..0',
    ])
  })

  it('reports negative and non-integer indices', () => {
    const problems = validateDependencies([item('a'), item('b', [-1, 0.5])])
    expect(problems).toEqual([
      'Work item "b" depends on index -1, outside 0..1',
      'Work item "b" has non-integer dependency index 0.5',
    ])
  })

  it('reports self-dependency', () => {
    expect(validateDependencies([item('a', [0])])).toEqual(['Work item "a" depends on itself'])
  })

  it('reports duplicate ids', () => {
    expect(validateDependencies([item('a'), item('a')])).toEqual([
      'Work item 1 reuses id "a" of work item 0',
    ])
  })
})

describe('validatePlan', () => {
  it('includes the cycle with item ids', () => {
    expect(validatePlan([item('a', [1]), item('b', [0])])).toEqual([
      'Circular dependency detected: a -> b -> a',
    ])
  })

  it('reports index problems without looking for cycles', () => {
    expect(validatePlan([item('a', [1]), item('b', [0, 9])])).toEqual([
      'Work item "b" depends on index 9, outside 0..1',
    ])
  })
})

// ---------------------------------------------------------------------------
// scheduleBatches / scheduleOrder
// ---------------------------------------------------------------------------

describe('scheduleBatches', () => {
  it('places an item and two dependents in two batches', () => {
    const items = [item('A'), item('B', [0]), item('C', [0])]
    expect(scheduleBatches(items)).toEqual([[0], [1, 2]])
  })

  it('keeps ascending order within each batch', () => {
    const items = [item('a', [3]), item('b'), item('c', [1]), item('d')]
    expect(scheduleBatches(items)).toEqual([[1, 3], [0, 2]])
  })

  it('layers a diamond', () => {
    const items = [item('a'), item('b', [0]), item('c', [0]), item('d', [1, 2])]
    expect(scheduleBatches(items)).toEqual([[0], [1, 2], [3]])
  })

  it('counts a repeated dependency once', () => {
    expect(scheduleBatches([item('a'), item('b', [0, 0])])).toEqual([[0], [1]])
  })

  it('throws PlanCycleError for a cycle', () => {
    expect(() => scheduleBatches([item('a', [1]), item('b', [0])])).toThrow(PlanCycleError)
  })
})

describe('scheduleOrder', () => {
  it('picks the lowest ready index first', () => {
    // d is ready before a, and a becomes ready after d
    const items = [item('a', [3]), item('b'), item('c', [1]), item('d')]
    expect(scheduleOrder(items)).toEqual([1, 2, 3, 0])
  })

  it('returns the identity order for independent items', () => {
    expect(scheduleOrder([item('a'), item('b'), item('c')])).toEqual([0, 1, 2])
  })
})

// ---------------------------------------------------------------------------
// schedulePlan
// ---------------------------------------------------------------------------

describe('schedulePlan', () => {
  it('returns batches and their flattened order', () => {
    const schedule = schedulePlan([item('A'), item('B', [0]), item('C', [0])])
    expect(schedule).toEqual({ batches: [[0], [1, 2]], order: [0, 1, 2] })
  })

  it('throws PlanCycleError carrying the cycle', () => {
    let caught: unknown
    try {
      schedulePlan([item('a', [1]), item('b', [0])])
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(PlanCycleError)
    expect(caught).toBeInstanceOf(PlanInvalidError)
    if (caught instanceof PlanCycleError) {
      expect(caught.cycle).toEqual([0, 1, 0])
      expect(caught.code).toBe('PLAN_INVALID')
      expect(caught.problems).toEqual(['Circular dependency detected: a -> b -> a'])
    }
  })

  it('throws PlanInvalidError with every index problem', () => {
    let caught: unknown
    try {
      schedulePlan([item('a', [5]), item('a', [0])])
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(PlanInvalidError)
    expect(caught).not.toBeInstanceOf(PlanCycleError)
    if (caught instanceof PlanInvalidError) {
      expect(caught.problems).toEqual([
        'Work item "a" depends on index 5, outside 0..1',
        'Work item 1 reuses id "a" of work item 0',
      ])
    }
  })

  it('rejects an empty plan', () => {
    expect(() => schedulePlan([])).toThrow(PlanInvalidError)
  })
})

// ---------------------------------------------------------------------------
// PlanSchema
// ---------------------------------------------------------------------------

describe('PlanSchema', () => {
  it('maps snake_case planner output onto a Plan with defaults', () => {
    const plan = PlanSchema.parse({
      summary: 'Add login',
      work_items: [{ id: 'w1', file_path: 'src/auth.ts', description: 'Write auth' }],
    })
    expect(plan).toEqual({
      summary: 'Add login',
      rationale: '',
      items: [
        {
          id: 'w1',
          filePath: 'src/auth.ts',
          fileStatus: 'new',
          mode: 'coder',
          description: 'Write auth',
          dependencyIds: [],
          tags: [],
        },
      ],
    })
  })

  it('rejects a plan without work items', () => {
    expect(PlanSchema.safeParse({ summary: 'x', work_items: [] }).success).toBe(false)
  })

  it('rejects an unknown file_status', () => {
    const result = PlanSchema.safeParse({
      work_items: [{ id: 'w1', file_path: 'a.ts', description: 'd', file_status: 'deleted' }],
    })
    expect(result.success).toBe(false)
  })
})
