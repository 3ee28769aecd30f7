/**
 * Generation Types
 *
 * Roles, jobs and artifacts flowing between the template resolver, the
 * execution client and the generation service.
 */

import type { IComfyApiWorkflow, IComfyOutputFile } from '../comfy/IComfyAPI'

export const NodeRole = {
  POSITIVE_TEXT: 'PositiveText',
  NEGATIVE_TEXT: 'NegativeText',
  OUTPUT: 'Output',
  FILE_PATH: 'FilePath',
  LATENT_IMAGE: 'LatentImage',
} as const

export type NodeRole = typeof NodeRole[keyof typeof NodeRole]

export const JobStatus = {
  QUEUED: 'Queued',
  RUNNING: 'Running',
  COMPLETED: 'Completed',
  FAILED: 'Failed',
  TIMED_OUT: 'TimedOut',
} as const

export type JobStatus = typeof JobStatus[keyof typeof JobStatus]

export type TerminalJobStatus =
  | typeof JobStatus.COMPLETED
  | typeof JobStatus.FAILED
  | typeof JobStatus.TIMED_OUT

export function isTerminalStatus(status: JobStatus): status is TerminalJobStatus {
  return (
    status === JobStatus.COMPLETED ||
    status === JobStatus.FAILED ||
    status === JobStatus.TIMED_OUT
  )
}

export type OutputMode = 'file' | 'url'

export interface RoleBindings {
  positive: string
  negative?: string
  output: string
  filePath?: string
  latentImage?: string
}

export interface ResolvedJob {
  readonly workflow: IComfyApiWorkflow
  readonly roles: RoleBindings
}

export interface SubmissionHandle {
  readonly promptId: string
  readonly number?: number
  readonly submittedAt: number
}

export type OutputReference = IComfyOutputFile

export interface PollOptions {
  pollIntervalMs: number
  maxWaitMs: number
  outputNodeId: string
}

export interface PollResult {
  status: TerminalJobStatus
  output?: OutputReference
  reason?: string
  attempts: number
  transientErrors: number
  elapsedMs: number
}

export type SavedImage =
  | { kind: 'url'; url: string }
  | { kind: 'file'; path: string; bytes: Buffer; bytesWritten: number }

export interface ImageDimensions {
  width?: number
  height?: number
}
