/**
 * Dependency scheduler.
 *
 * Turns a validated list of work items into topological batches using
 * Kahn's algorithm. Items are referenced by their index in the plan.
 */

import { PlanCycleError, PlanInvalidError } from '../../core/errors.js'
import type { WorkItemDefinition } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { detectCycle, validateDependencies } from './dependency-resolver.js'

const logger = createLogger('dependency-scheduler')

type DependencyView = Pick<WorkItemDefinition, 'id' | 'dependencyIds'>

export interface Schedule {
  /** Topological batches of item indices, ascending within a batch */
  batches: number[][]
  /** Flattened execution order */
  order: number[]
}

// ---------------------------------------------------------------------------
// validatePlan
// ---------------------------------------------------------------------------

/**
 * Collect every structural problem in a plan. Cycles are reported only when
 * the indices themselves are sound.
 */
export function validatePlan(items: readonly DependencyView[]): string[] {
  const problems = validateDependencies(items)
  if (problems.length > 0) return problems

  const cycle = detectCycle(items)
  if (cycle !== null) {
    problems.push(`Circular dependency detected: ${formatCycle(cycle, items)}`)
  }
  return problems
}

// ---------------------------------------------------------------------------
// Kahn's algorithm
// ---------------------------------------------------------------------------

function buildGraph(items: readonly DependencyView[]): { indegree: number[]; dependents: number[][] } {
  const indegree = items.map(() => 0)
  const dependents: number[][] = items.map(() => [])
  items.forEach((item, index) => {
    // duplicate indices count once
    for (const dep of new Set(item.dependencyIds)) {
      indegree[index] = (indegree[index] ?? 0) + 1
      dependents[dep]?.push(index)
    }
  })
  return { indegree, dependents }
}

/**
 * Layered topological sort. Every item in batch k depends only on items in
 * batches before k. Assumes `validatePlan` found no problems.
 */
export function scheduleBatches(items: readonly DependencyView[]): number[][] {
  const { indegree, dependents } = buildGraph(items)
  const batches: number[][] = []
  let ready = indegree.flatMap((deg, index) => (deg === 0 ? [index] : []))
  let placed = 0

  while (ready.length > 0) {
    batches.push(ready)
    placed += ready.length
    const next: number[] = []
    for (const index of ready) {
      for (const dependent of dependents[index] ?? []) {
        const remaining = (indegree[dependent] ?? 0) - 1
        indegree[dependent] = remaining
        if (remaining === 0) next.push(dependent)
      }
    }
    ready = next.sort((a, b) => a - b)
  }

  if (placed !== items.length) {
    throw new PlanCycleError(detectCycle(items) ?? [], items.map((i) => i.id))
  }
  return batches
}

/**
 * Stable total order: among ready items, the lowest original index runs first.
 */
export function scheduleOrder(items: readonly DependencyView[]): number[] {
  const { indegree, dependents } = buildGraph(items)
  const ready = indegree.flatMap((deg, index) => (deg === 0 ? [index] : []))
  const order: number[] = []

  while (ready.length > 0) {
    ready.sort((a, b) => a - b)
    const index = ready.shift()
    if (index === undefined) break
    order.push(index)
    for (const dependent of dependents[index] ?? []) {
      const remaining = (indegree[dependent] ?? 0) - 1
      indegree[dependent] = remaining
      if (remaining === 0) ready.push(dependent)
    }
  }

  if (order.length !== items.length) {
    throw new PlanCycleError(detectCycle(items) ?? [], items.map((i) => i.id))
  }
  return order
}

// ---------------------------------------------------------------------------
// schedulePlan
// ---------------------------------------------------------------------------

/**
 * Validate then schedule. Throws PlanCycleError for a cycle and
 * PlanInvalidError for any other problem; nothing is scheduled in either case.
 */
export function schedulePlan(items: readonly DependencyView[]): Schedule {
  if (items.length === 0) {
    throw new PlanInvalidError(['Plan contains no work items'])
  }

  const problems = validateDependencies(items)
  if (problems.length > 0) {
    throw new PlanInvalidError(problems)
  }

  const cycle = detectCycle(items)
  if (cycle !== null) {
    throw new PlanCycleError(cycle, items.map((i) => i.id))
  }

  const batches = scheduleBatches(items)
  const order = batches.flat()
  logger.debug({ items: items.length, batches: batches.length }, 'Plan scheduled')
  return { batches, order }
}

function formatCycle(cycle: number[], items: readonly DependencyView[]): string {
  return cycle.map((index) => items[index]?.id ?? String(index)).join(' -> ')
}
