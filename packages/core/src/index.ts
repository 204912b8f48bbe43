export * from './planner/types'
export * from './planner/time'
export * from './planner/intervals'
export * from './planner/busy'
export * from './planner/slots'
export * from './planner/walkability'
export * from './planner/scoring'
export * from './planner/algorithm'
export * from './planner/confidence'
export * from './planner/capacity'
export * from './planner/workout'
export * from './planner/conflicts'
export * from './planner/recurrence'
export * from './planner/plan'
export * from './planner/ids'

export * from './learning/types'
export * from './learning/patterns'
export * from './learning/adherence'
export * from './learning/learner'

export * from './autopilot/types'
export * from './autopilot/slots'
export * from './autopilot/policy'
export * from './autopilot/opportunities'
export * from './autopilot/scheduler'

export * from './streak/types'
export * from './streak/streak'
export * from './streak/tracker'

export * from './store/store'
export * from './store/schemas'

export * from './coordination/serial'
export * from './coordination/planCoordinator'

export * from './providers'
export * from './errors'
export * from './config'
export * from './env'
