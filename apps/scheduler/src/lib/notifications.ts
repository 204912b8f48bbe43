import { AutopilotWalk, DateKey, NotificationDispatcher, walkDisplayName } from '@stridely/core'

function describeWalk(walk: AutopilotWalk, timeZone: string): string {
  const time = walk.startTime.toLocaleTimeString('en-US', { timeZone, hour: 'numeric', minute: '2-digit' })
  return `${walkDisplayName(walk.type)} at ${time} (${walk.durationMinutes} min)`
}

// Writes prompts to the log; a push or email channel would implement the same interface
export class ConsoleNotifications implements NotificationDispatcher {
  constructor(private readonly timeZone: string) {}

  async scheduleApprovalPrompt(walk: AutopilotWalk): Promise<void> {
    console.log(`🔔 Approve walk ${walk.id}? ${describeWalk(walk, this.timeZone)}`)
  }

  async scheduleSummary(date: DateKey, walks: AutopilotWalk[]): Promise<void> {
    console.log(`📅 ${walks.length} walk(s) added to your calendar for ${date}:`)
    for (const walk of walks) console.log(`   • ${describeWalk(walk, this.timeZone)}`)
  }
}
