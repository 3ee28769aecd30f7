/**
 * Generation configuration, read from environment variables.
 *
 * Blank variables count as unset. The returned value is frozen.
 */

import path from 'node:path'
import { z } from 'zod'
import { ConfigError } from '@/shared/errors/ComfyErrors'
import { formatZodIssues } from '@/shared/validation/workflowSchemas'

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional())

const url = (label: string) =>
  z.preprocess(
    blankToUndefined,
    z
      .string({ required_error: `${label} is required` })
      .trim()
      .url(`${label} must be a valid URL`)
      .transform((value) => value.replace(/\/+$/, ''))
  )

const milliseconds = (label: string, fallback: number) =>
  z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: `${label} must be a number` })
      .int(`${label} must be a whole number of milliseconds`)
      .positive(`${label} must be positive`)
      .default(fallback)
  )

export const generationConfigSchema = z.object({
  comfyUrl: url('COMFY_URL'),
  comfyUrlExternal: z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .url('COMFY_URL_EXTERNAL must be a valid URL')
      .transform((value) => value.replace(/\/+$/, ''))
      .optional()
  ),
  workflowFile: z.preprocess(
    blankToUndefined,
    z.string({ required_error: 'COMFY_WORKFLOW_JSON_FILE is required' }).trim()
  ),
  positiveNodeId: optionalString,
  legacyPromptNodeId: optionalString,
  negativeNodeId: optionalString,
  filePathNodeId: optionalString,
  outputNodeId: optionalString,
  latentImageNodeId: optionalString,
  outputMode: z.preprocess(
    blankToUndefined,
    z.enum(['file', 'url'], { errorMap: () => ({ message: 'OUTPUT_MODE must be "file" or "url"' }) }).default('file')
  ),
  workingDir: optionalString,
  filenamePattern: z.preprocess(blankToUndefined, z.string().default('{timestamp}')),
  pollIntervalMs: milliseconds('COMFY_POLL_INTERVAL_MS', 5000),
  maxWaitMs: milliseconds('COMFY_MAX_WAIT_MS', 300000),
  requestTimeoutMs: milliseconds('COMFY_REQUEST_TIMEOUT_MS', 30000),
})

export interface GenerationConfig {
  readonly comfyUrl: string
  readonly comfyUrlExternal: string
  readonly workflowFile: string
  readonly nodeIds: Readonly<{
    positive?: string
    negative?: string
    filePath?: string
    output?: string
    latentImage?: string
  }>
  readonly outputMode: 'file' | 'url'
  readonly saveDir: string
  readonly filenamePattern: string
  readonly pollIntervalMs: number
  readonly maxWaitMs: number
  readonly requestTimeoutMs: number
}

export function loadGenerationConfig(env: NodeJS.ProcessEnv = process.env): GenerationConfig {
  const parsed = generationConfigSchema.safeParse({
    comfyUrl: env.COMFY_URL,
    comfyUrlExternal: env.COMFY_URL_EXTERNAL,
    workflowFile: env.COMFY_WORKFLOW_JSON_FILE,
    positiveNodeId: env.POS_PROMPT_NODE_ID,
    legacyPromptNodeId: env.PROMPT_NODE_ID,
    negativeNodeId: env.NEG_PROMPT_NODE_ID,
    filePathNodeId: env.FILEPATH_NODE_ID,
    outputNodeId: env.OUTPUT_NODE_ID,
    latentImageNodeId: env.LATENT_IMAGE_NODE_ID,
    outputMode: env.OUTPUT_MODE,
    workingDir: env.COMFY_WORKING_DIR,
    filenamePattern: env.COMFY_FILENAME_PATTERN,
    pollIntervalMs: env.COMFY_POLL_INTERVAL_MS,
    maxWaitMs: env.COMFY_MAX_WAIT_MS,
    requestTimeoutMs: env.COMFY_REQUEST_TIMEOUT_MS,
  })

  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error)
    console.error('❌ [GenerationConfig] Invalid configuration:', issues)
    throw new ConfigError(issues)
  }

  const values = parsed.data
  const nodeIds: GenerationConfig['nodeIds'] = Object.freeze({
    positive: values.positiveNodeId ?? values.legacyPromptNodeId,
    negative: values.negativeNodeId,
    filePath: values.filePathNodeId,
    output: values.outputNodeId,
    latentImage: values.latentImageNodeId,
  })

  return Object.freeze({
    comfyUrl: values.comfyUrl,
    comfyUrlExternal: values.comfyUrlExternal ?? values.comfyUrl,
    workflowFile: values.workflowFile,
    nodeIds,
    outputMode: values.outputMode,
    saveDir: values.workingDir ? path.join(values.workingDir, 'img') : './img',
    filenamePattern: values.filenamePattern,
    pollIntervalMs: values.pollIntervalMs,
    maxWaitMs: values.maxWaitMs,
    requestTimeoutMs: values.requestTimeoutMs,
  })
}
