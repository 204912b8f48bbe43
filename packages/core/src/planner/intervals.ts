import { TimeInterval } from './types'
import { compareAsc, minutesBetween } from './time'

export function overlaps(a: TimeInterval, b: TimeInterval): boolean {
  return a.start < b.end && b.start < a.end
}

export function durationMinutes(interval: TimeInterval): number {
  return minutesBetween(interval.start, interval.end)
}

export function contains(outer: TimeInterval, inner: TimeInterval): boolean {
  return outer.start <= inner.start && inner.end <= outer.end
}

// Minutes between the end of one interval and the start of the other; 0 when they touch or overlap
export function gapMinutes(a: TimeInterval, b: TimeInterval): number {
  if (overlaps(a, b)) return 0
  return a.end <= b.start ? minutesBetween(a.end, b.start) : minutesBetween(b.end, a.start)
}

export function sortByStart<T extends TimeInterval>(intervals: T[]): T[] {
  return [...intervals].sort((a, b) => compareAsc(a.start, b.start) || compareAsc(a.end, b.end))
}

/**
 * Clamp an interval to a window. Returns null when nothing of it lies inside.
 */
export function clampToWindow<T extends TimeInterval>(interval: T, window: TimeInterval): T | null {
  const start = interval.start < window.start ? window.start : interval.start
  const end = interval.end > window.end ? window.end : interval.end
  if (start >= end) return null
  return { ...interval, start: new Date(start), end: new Date(end) }
}

// Union of overlapping or touching intervals, sorted by start
export function mergeIntervals(intervals: TimeInterval[]): TimeInterval[] {
  const merged: TimeInterval[] = []
  for (const current of sortByStart(intervals)) {
    const last = merged[merged.length - 1]
    if (last && current.start <= last.end) {
      if (current.end > last.end) last.end = new Date(current.end)
    } else {
      merged.push({ start: new Date(current.start), end: new Date(current.end) })
    }
  }
  return merged
}
