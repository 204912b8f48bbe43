#!/usr/bin/env tsx

/**
 * Nightly worker
 * Refreshes learned patterns, closes out yesterday's streak and schedules tomorrow's walks.
 */

import { shiftDateKey } from '@stridely/core'
import { createContainer } from '@/services/container'

async function run() {
  console.log('🌙 Starting nightly planning run...')
  const startTime = Date.now()
  const c = await createContainer()

  try {
    const today = c.planning.today()
    const yesterday = shiftDateKey(today, -1)
    const goal = c.settings.preferences.dailyStepGoal

    const patterns = await c.learner.refreshFromProvider(c.activity, today, goal)
    console.log(`📊 Patterns: avg ${patterns.averageDailySteps} steps, peak hours ${patterns.peakActivityHours.join(', ') || 'none'}`)

    const steps = await c.activity.fetchSteps(yesterday).catch((error: unknown) => {
      console.warn(`Could not read steps for ${yesterday}:`, error)
      return 0
    })
    const streak = await c.planning.recordDailySteps(yesterday, steps)
    console.log(`🔥 Streak: ${streak.currentStreak} day(s), best ${streak.longestStreak}`)

    const retried = await c.autopilot.retryFailedCommits()
    if (retried.committed.length > 0 || retried.errors.length > 0) {
      console.log(`Retried calendar writes: ${retried.committed.length} committed, ${retried.errors.length} still failing`)
    }

    const result = await c.autopilot.runNightly({ force: process.argv.includes('--force') })
    console.log(`🚶 Autopilot ${result.status} for ${result.date}${result.reason ? ` (${result.reason})` : ''}: ${result.walks.length} walk(s)`)

    const plan = await c.planning.generatePlan(shiftDateKey(today, 1))
    console.log(`📋 Tomorrow: ${plan.value.reasoning}`)
  } finally {
    await c.close()
  }

  console.log(`🎉 Nightly run complete in ${Date.now() - startTime}ms`)
}

run().then(() => process.exit(0)).catch(err => { console.error(err); process.exit(1) })
