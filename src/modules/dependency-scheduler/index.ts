export { detectCycle, validateDependencies } from './dependency-resolver.js'
export { validatePlan, scheduleBatches, scheduleOrder, schedulePlan } from './scheduler.js'
export type { Schedule } from './scheduler.js'
export {
  FileStatusSchema,
  RawWorkItemSchema,
  WorkItemDefinitionSchema,
  PlanSchema,
  PlanDefinitionSchema,
} from './schemas.js'
export type { RawWorkItem, RawPlan } from './schemas.js'
