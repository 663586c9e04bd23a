/**
 * ChatPlanner: Planner backed by a chat-completions model.
 */

import { PlanInvalidError } from '../core/errors.js'
import type { Plan } from '../core/types.js'
import { PlanSchema } from '../modules/dependency-scheduler/index.js'
import { createLogger } from '../utils/logger.js'
import type { ModelGateway } from './model-gateway.js'
import { PLANNER_SYSTEM_PROMPT } from './prompts.js'
import { readStructuredOutput } from './structured-output.js'
import type { Planner } from './types.js'

const logger = createLogger('planner')

const PLAN_TEMPERATURE = 0.1

export interface ChatPlannerOptions {
  gateway: ModelGateway
  model: string
  systemPrompt?: string
}

export class ChatPlanner implements Planner {
  private readonly _gateway: ModelGateway
  private readonly _model: string
  private readonly _systemPrompt: string

  constructor(options: ChatPlannerOptions) {
    this._gateway = options.gateway
    this._model = options.model
    this._systemPrompt = options.systemPrompt ?? PLANNER_SYSTEM_PROMPT
  }

  async plan(request: string): Promise<Plan> {
    const output = await this._gateway.complete({
      model: this._model,
      messages: [
        { role: 'system', content: this._systemPrompt },
        { role: 'user', content: request },
      ],
      temperature: PLAN_TEMPERATURE,
    })

    const parsed = readStructuredOutput(output, ['work_items'], PlanSchema)
    if (!parsed.ok) {
      logger.warn({ model: this._model, error: parsed.error }, 'Planner answer is not a plan')
      throw new PlanInvalidError([parsed.error], { model: this._model })
    }
    logger.info({ items: parsed.value.items.length }, 'Plan received')
    return parsed.value
  }
}
