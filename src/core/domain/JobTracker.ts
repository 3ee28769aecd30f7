/**
 * Job state tracking for submitted prompts.
 *
 * One store per execution client. Every handle gets its own record; the
 * polling loop is the only writer of status transitions, and a record in a
 * terminal state never changes again. Finished records are removed once the
 * caller is done with them, so a long-running client does not accumulate them.
 */

import { createStore } from 'zustand/vanilla'
import { isTerminalStatus, type JobStatus, type OutputReference } from '@/shared/types/app/IGeneration'

// ============================================================================
// Types
// ============================================================================

export type TrackedStatus = 'Submitted' | JobStatus

export interface StatusTransition {
  status: TrackedStatus
  at: number
}

export interface TrackedJob {
  promptId: string
  status: TrackedStatus
  history: StatusTransition[]
  polling: boolean
  output?: OutputReference
  reason?: string
}

interface JobTrackerState {
  jobs: Record<string, TrackedJob>
  registerJob: (promptId: string, at: number) => void
  transition: (promptId: string, status: JobStatus, at: number, detail?: { output?: OutputReference; reason?: string }) => void
  setPolling: (promptId: string, polling: boolean) => void
  removeJob: (promptId: string) => void
}

export type JobTrackerStore = ReturnType<typeof createJobTracker>

// ============================================================================
// Store
// ============================================================================

export function isTrackedTerminal(job: TrackedJob): boolean {
  return job.status !== 'Submitted' && isTerminalStatus(job.status)
}

export function createJobTracker() {
  return createStore<JobTrackerState>()((set, get) => ({
    jobs: {},

    registerJob: (promptId, at) => {
      if (get().jobs[promptId]) {
        throw new Error(`Job ${promptId} is already tracked`)
      }
      set((state) => ({
        jobs: {
          ...state.jobs,
          [promptId]: {
            promptId,
            status: 'Submitted',
            history: [{ status: 'Submitted', at }],
            polling: false,
          },
        },
      }))
    },

    transition: (promptId, status, at, detail = {}) => {
      const job = get().jobs[promptId]
      if (!job) {
        throw new Error(`Job ${promptId} is not tracked`)
      }
      if (isTrackedTerminal(job)) {
        throw new Error(`Job ${promptId} already finished as ${job.status}`)
      }
      // repeated observations of the same state are not transitions
      if (job.status === status) return

      set((state) => ({
        jobs: {
          ...state.jobs,
          [promptId]: {
            ...job,
            status,
            history: [...job.history, { status, at }],
            ...(detail.output ? { output: detail.output } : {}),
            ...(detail.reason ? { reason: detail.reason } : {}),
          },
        },
      }))
    },

    setPolling: (promptId, polling) => {
      const job = get().jobs[promptId]
      if (!job) {
        throw new Error(`Job ${promptId} is not tracked`)
      }
      set((state) => ({ jobs: { ...state.jobs, [promptId]: { ...job, polling } } }))
    },

    // only finished records can go; a live job must stay visible to its poller
    removeJob: (promptId) => {
      const job = get().jobs[promptId]
      if (!job) return
      if (!isTrackedTerminal(job) || job.polling) {
        throw new Error(`Job ${promptId} is still ${job.status}`)
      }
      set((state) => ({
        jobs: Object.fromEntries(Object.entries(state.jobs).filter(([id]) => id !== promptId)),
      }))
    },
  }))
}
