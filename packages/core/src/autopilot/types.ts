import { DateKey } from '../planner/types'
import { CalendarWriteError } from '../errors'

export type TrustLevel = 'fullAuto' | 'confirmFirst' | 'suggestOnly'

export type ApprovalState = 'pending' | 'approved' | 'rejected'

export type AutopilotWalkType = 'micro' | 'short' | 'standard'

export interface AutopilotWalk {
  id: string
  date: DateKey
  startTime: Date
  durationMinutes: number
  type: AutopilotWalkType
  origin: TrustLevel // trust level in force when the walk was created
  approvalState: ApprovalState
  calendarEventId?: string
  lastError?: string
  createdAt: Date
}

export interface AutopilotSettings {
  isEnabled: boolean
  trustLevel: TrustLevel
  targetWalksPerDay: number
  includeMicroWalks: boolean
  minWalkDuration: number
  maxWalkDuration: number
  calendarTitle: string
}

export interface AutopilotState {
  lastScheduledDate: DateKey | null
  walks: AutopilotWalk[]
}

export type ScheduleStatus = 'scheduled' | 'skipped'

export interface ScheduleResult {
  status: ScheduleStatus
  date: DateKey
  walks: AutopilotWalk[]
  errors: CalendarWriteError[]
  reason?: string
}

export interface SlotSelection {
  startTime: Date
  durationMinutes: number
  category: string
}
