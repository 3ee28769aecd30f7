/**
 * Structural validation of the two on-disk workflow representations and of
 * the backend responses. Only the fields the resolver and the client read are
 * kept; everything else is stripped on parse.
 */

import { z } from 'zod'
import type { JsonValue } from '@/shared/types/comfy/IComfyAPI'

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
)

const nodeIdSchema = z.union([z.number(), z.string()])

const editorNodeInputSchema = z.object({
  name: z.string(),
  type: z.string().optional(),
  link: z.number().nullable().optional(),
  widget: z.union([z.boolean(), z.object({ name: z.string() })]).optional(),
  slot_index: z.number().optional(),
})

const editorNodeOutputSchema = z.object({
  name: z.string().optional(),
  type: z.string().optional(),
  links: z.array(z.number()).nullable().optional(),
  slot_index: z.number().optional(),
})

const editorNodeSchema = z.object({
  id: nodeIdSchema,
  type: z.string(),
  title: z.string().optional(),
  inputs: z.array(editorNodeInputSchema).optional(),
  outputs: z.array(editorNodeOutputSchema).optional(),
  widgets_values: z.union([z.array(jsonValueSchema), z.record(jsonValueSchema)]).optional(),
  mode: z.number().optional(),
})

const editorLinkTupleSchema = z
  .tuple([z.number(), nodeIdSchema, z.number(), nodeIdSchema, z.number()])
  .rest(jsonValueSchema)

const editorLinkObjectSchema = z.object({
  id: z.number(),
  origin_id: nodeIdSchema,
  origin_slot: z.number(),
  target_id: nodeIdSchema,
  target_slot: z.number(),
  type: z.string().optional(),
})

export const editorWorkflowSchema = z.object({
  nodes: z.array(editorNodeSchema),
  links: z.array(z.union([editorLinkTupleSchema, editorLinkObjectSchema])).default([]),
  last_node_id: z.number().optional(),
  last_link_id: z.number().optional(),
  version: z.number().optional(),
})

export const apiNodeSchema = z.object({
  class_type: z.string(),
  inputs: z.record(jsonValueSchema).default({}),
  _meta: z.object({ title: z.string().optional() }).optional(),
})

export const apiWorkflowSchema = z.record(apiNodeSchema)

// ----------------------------------------------------------------------------
// Backend responses
// ----------------------------------------------------------------------------

export const promptResponseSchema = z.object({
  prompt_id: z.string().min(1),
  number: z.number().optional(),
  node_errors: z.record(jsonValueSchema).optional(),
})

const outputFileSchema = z.object({
  filename: z.string(),
  subfolder: z.string().default(''),
  type: z.string().default('output'),
})

export const historyEntrySchema = z.object({
  outputs: z.record(z.object({ images: z.array(outputFileSchema).optional() })).default({}),
  status: z
    .object({
      status_str: z.string().optional(),
      completed: z.boolean().default(false),
      messages: z.array(z.tuple([z.string(), jsonValueSchema])).optional(),
    })
    .default({ completed: false }),
})

export type HistoryEntry = z.output<typeof historyEntrySchema>

export const historyResponseSchema = z.record(historyEntrySchema)

export const queueResponseSchema = z.object({
  queue_running: z.array(z.array(jsonValueSchema)).default([]),
  queue_pending: z.array(z.array(jsonValueSchema)).default([]),
})

/**
 * Flattens zod issues into "path: message" lines.
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)'
    return `${where}: ${issue.message}`
  })
}
