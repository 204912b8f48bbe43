#!/usr/bin/env tsx

// Print the movement plan for a date (default today): `npm run plan -- 2025-03-11`

import { DailyMovementPlan, toLocal } from '@stridely/core'
import { createContainer } from '@/services/container'

function printPlan(plan: DailyMovementPlan, zone: string) {
  const clock = (d: Date) => toLocal(d, zone).toFormat('HH:mm')
  console.log(`\n${plan.date}: ${plan.currentSteps}/${plan.targetSteps} steps, ${plan.stepsNeeded} to go`)
  for (const a of plan.activities) {
    console.log(`  ${clock(a.startTime)}-${clock(a.endTime)}  ${a.title} (${a.estimatedSteps} steps, ${a.priority})  ${a.reason}`)
  }
  for (const m of plan.walkableMeetings.filter((w) => w.isRecommended)) {
    console.log(`  ${clock(m.start)}-${clock(m.end)}  Walk during "${m.title}" (~${m.estimatedSteps} steps)`)
  }
  for (const c of plan.conflicts) console.log(`  ⚠️  ${c.description}`)
  console.log(`\n${plan.reasoning} Confidence ${Math.round(plan.confidence * 100)}%.`)
}

async function run() {
  const c = await createContainer()
  try {
    const date = process.argv[2] ?? c.planning.today()
    if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) throw new Error(`Expected a date as YYYY-MM-DD, got "${date}"`)
    const result = await c.planning.generatePlan(date)
    printPlan(result.value, c.settings.preferences.timeZone)

    const split = await c.planning.planWalkAndWorkout(date)
    if (split.workout) console.log(`Workout: ${split.workout.title} at ${toLocal(split.workout.startTime, c.settings.preferences.timeZone).toFormat('HH:mm')}`)
  } finally {
    await c.close()
  }
}

run().then(() => process.exit(0)).catch(err => { console.error(err); process.exit(1) })
