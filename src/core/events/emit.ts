import type { ReleaseEvent, ReleaseSummary } from './types'

export function evt(args: Omit<ReleaseEvent, 'action'>): ReleaseEvent {
  return { action: 'release', ...args }
}

export function summary(args: Omit<ReleaseSummary, 'action' | 'final'>): ReleaseSummary {
  return { action: 'release', ...args, final: true }
}
