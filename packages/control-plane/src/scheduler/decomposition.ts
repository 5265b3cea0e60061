/**
 * Decomposition collaborator: turns a goal into ordered steps. Plan
 * generation itself (LLM prompting and the like) lives outside this
 * service; anything that can produce steps can be plugged in here.
 */

import type { DecomposedStep } from "./plan.js"

export interface Decomposer {
  decompose(goal: string): Promise<DecomposedStep[]>
}

/** Decomposer backed by a fixed table of goals, mostly for wiring and tests. */
export class StaticDecomposer implements Decomposer {
  private readonly table: ReadonlyMap<string, readonly DecomposedStep[]>

  constructor(table: Record<string, readonly DecomposedStep[]>) {
    this.table = new Map(Object.entries(table))
  }

  async decompose(goal: string): Promise<DecomposedStep[]> {
    const steps = this.table.get(goal)
    if (!steps) {
      throw new Error(`No decomposition for goal: ${goal}`)
    }
    return steps.map((s) => ({ ...s }))
  }
}
