import { AutopilotStateError } from '../errors'
import { AutopilotWalk, TrustLevel } from './types'

export type AutopilotAction = 'commit' | 'requestApproval' | 'suggest'

export function decideAutopilotAction(level: TrustLevel): AutopilotAction {
  switch (level) {
    case 'fullAuto':
      return 'commit'
    case 'confirmFirst':
      return 'requestApproval'
    case 'suggestOnly':
      return 'suggest'
    default: {
      const unreachable: never = level
      throw new AutopilotStateError(`Unknown trust level: ${String(unreachable)}`)
    }
  }
}

// Only pending walks outside suggest-only mode accept approve/reject/adjust
export function assertResolvable(walk: AutopilotWalk, action: string): void {
  if (walk.origin === 'suggestOnly') {
    throw new AutopilotStateError(`Cannot ${action} walk ${walk.id}: suggestions are display-only`)
  }
  if (walk.approvalState !== 'pending') {
    throw new AutopilotStateError(`Cannot ${action} walk ${walk.id}: it is already ${walk.approvalState}`)
  }
}
