/**
 * Dependency checks for plans.
 *
 * Provides:
 *  - Structural validation of dependency indices and item ids
 *  - Cycle detection using DFS with visited/inStack sets
 */

import type { WorkItemDefinition } from '../../core/types.js'

type DependencyView = Pick<WorkItemDefinition, 'id' | 'dependencyIds'>

// ---------------------------------------------------------------------------
// validateDependencies
// ---------------------------------------------------------------------------

/**
 * Check that every dependency index points at another item of the same list
 * and that item ids are unique.
 *
 * @returns Problem descriptions (empty if the plan is structurally sound)
 */
export function validateDependencies(items: readonly DependencyView[]): string[] {
  const problems: string[] = []
  const seenIds = new Map<string, number>()

  items.forEach((item, index) => {
    const firstIndex = seenIds.get(item.id)
    if (firstIndex !== undefined) {
      problems.push(`Work item ${String(index)} reuses id "${item.id}" of work item ${String(firstIndex)}`)
    } else {
      seenIds.set(item.id, index)
    }

    for (const dep of item.dependencyIds) {
      if (!Number.isInteger(dep)) {
        problems.push(`Work item "${item.id}" has non-integer dependency index ${String(dep)}`)
      } else if (dep < 0 || dep >= items.length) {
        problems.push(
          `Work item "${item.id}" depends on index ${String(dep)}, outside 0..${String(items.length - 1)}`,
        )
      } else if (dep === index) {
        problems.push(`Work item "${item.id}" depends on itself`)
      }
    }
  })

  return problems
}

// ---------------------------------------------------------------------------
// detectCycle
// ---------------------------------------------------------------------------

/**
 * Detect a cycle in the dependency graph using depth-first search.
 * Out-of-range indices are ignored here; validateDependencies reports them.
 *
 * @returns The cycle as a path of indices (e.g. [0, 1, 0]), or null
 */
export function detectCycle(items: readonly DependencyView[]): number[] | null {
  const visited = new Set<number>()
  const inStack = new Set<number>()

  function dfs(node: number, path: number[]): number[] | null {
    visited.add(node)
    inStack.add(node)

    for (const dep of items[node]?.dependencyIds ?? []) {
      if (!Number.isInteger(dep) || dep < 0 || dep >= items.length) continue
      if (inStack.has(dep)) {
        const cycleStart = path.indexOf(dep)
        return [...path.slice(cycleStart), dep]
      }
      if (!visited.has(dep)) {
        const cycle = dfs(dep, [...path, dep])
        if (cycle) return cycle
      }
    }

    inStack.delete(node)
    return null
  }

  for (let i = 0; i < items.length; i++) {
    if (!visited.has(i)) {
      const cycle = dfs(i, [i])
      if (cycle) return cycle
    }
  }
  return null
}
