/**
 * Editor → execution representation conversion.
 *
 * Pure: takes the node-list-plus-link-list export of the graph editor and
 * returns the id-keyed mapping accepted by POST /prompt. Every editor node
 * becomes one execution node and every link becomes one
 * [sourceNodeId, outputSlot] reference.
 *
 * Input:
 * ```json
 * {
 *   "nodes": [
 *     { "id": 4, "type": "CheckpointLoaderSimple", "widgets_values": ["model.safetensors"] },
 *     { "id": 6, "type": "CLIPTextEncode", "title": "Positive Prompt",
 *       "inputs": [{ "name": "clip", "link": 3 }, { "name": "text", "widget": { "name": "text" } }],
 *       "widgets_values": ["a fox"] }
 *   ],
 *   "links": [[3, 4, 1, 6, 0, "CLIP"]]
 * }
 * ```
 *
 * Output:
 * ```json
 * {
 *   "4": { "class_type": "CheckpointLoaderSimple", "inputs": { "ckpt_name": "model.safetensors" } },
 *   "6": { "class_type": "CLIPTextEncode", "inputs": { "clip": ["4", 1], "text": "a fox" },
 *          "_meta": { "title": "Positive Prompt" } }
 * }
 * ```
 */

import { TemplateError } from '@/shared/errors/ComfyErrors'
import {
  CONTROL_AFTER_GENERATE_VALUES,
  KNOWN_WIDGET_NAMES,
  SEED_WIDGET_NAMES,
} from '@/shared/constants/widgetNames'
import type { IComfyJson, IComfyJsonLink, IComfyJsonNode } from '@/shared/types/app/IComfyJson'
import type { IComfyApiNode, IComfyApiWorkflow, JsonValue } from '@/shared/types/comfy/IComfyAPI'

const OPERATION = 'convertEditorToApiFormat'

export interface ConversionResult {
  apiWorkflow: IComfyApiWorkflow
  nodeCount: number
  linkCount: number
}

interface NormalizedLink {
  id: number
  originId: string
  originSlot: number
  targetId: string
  targetSlot: number
}

function normalizeLink(link: IComfyJsonLink): NormalizedLink {
  if (Array.isArray(link)) {
    return { id: link[0], originId: String(link[1]), originSlot: link[2], targetId: String(link[3]), targetSlot: link[4] }
  }
  return {
    id: link.id,
    originId: String(link.origin_id),
    originSlot: link.origin_slot,
    targetId: String(link.target_id),
    targetSlot: link.target_slot,
  }
}

function malformed(message: string, nodeId?: string): TemplateError {
  return new TemplateError('Malformed', message, { operation: OPERATION, nodeId })
}

function isControlValue(value: JsonValue | undefined): boolean {
  return typeof value === 'string' && CONTROL_AFTER_GENERATE_VALUES.has(value)
}

/**
 * Widget names in widgets_values order: the inputs the node declares as
 * widgets, or the known names of its type for exports that omit them.
 */
function widgetNamesFor(node: IComfyJsonNode): readonly string[] {
  const declared = (node.inputs ?? []).filter((input) => input.widget).map((input) => input.name)
  if (declared.length > 0) return declared
  return KNOWN_WIDGET_NAMES.get(node.type) ?? []
}

function applyWidgetArray(node: IComfyJsonNode, values: JsonValue[], apiInputs: Record<string, JsonValue>, linked: Set<string>): void {
  const names = widgetNamesFor(node)
  let valueIndex = 0
  let nameIndex = 0

  while (valueIndex < values.length && nameIndex < names.length) {
    const name = names[nameIndex]
    const value = values[valueIndex]
    valueIndex++
    nameIndex++

    // a linked widget input still occupies its slot in widgets_values
    if (!linked.has(name)) {
      apiInputs[name] = value
    }

    if (SEED_WIDGET_NAMES.has(name) && isControlValue(values[valueIndex])) {
      valueIndex++
    }
  }

  let paramIndex = 0
  while (valueIndex < values.length) {
    apiInputs[`param_${paramIndex}`] = values[valueIndex]
    paramIndex++
    valueIndex++
  }
}

function applyWidgetObject(values: { [widgetName: string]: JsonValue }, apiInputs: Record<string, JsonValue>, linked: Set<string>): void {
  for (const [name, value] of Object.entries(values)) {
    if (!linked.has(name)) {
      apiInputs[name] = value
    }
  }
}

/**
 * Every source node and every source link survives: each link lands on the
 * input its target node declares for it, or on the input at its target slot.
 */
export function convertEditorToApiFormat(workflow: IComfyJson): ConversionResult {
  const nodesById = new Map<string, IComfyJsonNode>()
  for (const node of workflow.nodes) {
    const nodeId = String(node.id)
    if (nodesById.has(nodeId)) {
      throw malformed(`Duplicate node id ${nodeId} in editor workflow`, nodeId)
    }
    nodesById.set(nodeId, node)
  }

  const links = new Map<number, NormalizedLink>()
  for (const rawLink of workflow.links) {
    const link = normalizeLink(rawLink)
    if (links.has(link.id)) {
      throw malformed(`Duplicate link id ${link.id} in editor workflow`)
    }
    if (!nodesById.has(link.originId)) {
      throw malformed(`Link ${link.id} starts at missing node ${link.originId}`, link.originId)
    }
    if (!nodesById.has(link.targetId)) {
      throw malformed(`Link ${link.id} ends at missing node ${link.targetId}`, link.targetId)
    }
    links.set(link.id, link)
  }

  // target node id -> input name -> link
  const placed = new Map<string, Map<string, NormalizedLink>>()
  const placedIds = new Set<number>()
  const place = (nodeId: string, inputName: string, link: NormalizedLink) => {
    const inputs = placed.get(nodeId) ?? new Map<string, NormalizedLink>()
    const existing = inputs.get(inputName)
    if (existing && existing.id !== link.id) {
      throw malformed(`Node ${nodeId} input "${inputName}" is fed by both link ${existing.id} and link ${link.id}`, nodeId)
    }
    inputs.set(inputName, link)
    placed.set(nodeId, inputs)
    placedIds.add(link.id)
  }

  for (const node of workflow.nodes) {
    const nodeId = String(node.id)
    for (const input of node.inputs ?? []) {
      if (input.link === null || input.link === undefined) continue

      const link = links.get(input.link)
      if (!link) {
        console.warn(`⚠️ [WorkflowFormatConverter] Node ${nodeId} input "${input.name}" references unknown link ${input.link}, leaving it unset`)
        continue
      }
      if (link.targetId !== nodeId) {
        console.warn(`⚠️ [WorkflowFormatConverter] Node ${nodeId} input "${input.name}" references link ${link.id}, which ends at node ${link.targetId}; ignoring the reference`)
        continue
      }
      place(nodeId, input.name, link)
    }
  }

  // links the target node does not list on any input
  for (const link of links.values()) {
    if (placedIds.has(link.id)) continue
    const target = nodesById.get(link.targetId)
    const inputName = target?.inputs?.[link.targetSlot]?.name
    if (inputName === undefined) {
      throw malformed(`Link ${link.id} targets slot ${link.targetSlot} of node ${link.targetId}, which declares no input there`, link.targetId)
    }
    place(link.targetId, inputName, link)
  }

  const apiWorkflow: IComfyApiWorkflow = {}
  let linkCount = 0

  for (const node of workflow.nodes) {
    const nodeId = String(node.id)
    const apiInputs: Record<string, JsonValue> = {}
    const linked = new Set<string>()

    for (const [inputName, link] of placed.get(nodeId) ?? []) {
      apiInputs[inputName] = [link.originId, link.originSlot]
      linked.add(inputName)
      linkCount++
    }

    if (Array.isArray(node.widgets_values)) {
      applyWidgetArray(node, node.widgets_values, apiInputs, linked)
    } else if (node.widgets_values) {
      applyWidgetObject(node.widgets_values, apiInputs, linked)
    }

    const apiNode: IComfyApiNode = { class_type: node.type, inputs: apiInputs }
    if (node.title) {
      apiNode._meta = { title: node.title }
    }
    apiWorkflow[nodeId] = apiNode
  }

  if (linkCount !== workflow.links.length || Object.keys(apiWorkflow).length !== workflow.nodes.length) {
    throw malformed(`Converted ${Object.keys(apiWorkflow).length} nodes and ${linkCount} links from ${workflow.nodes.length} nodes and ${workflow.links.length} links`)
  }

  console.log(`✅ [WorkflowFormatConverter] Converted ${workflow.nodes.length} nodes, ${linkCount} links`)
  return { apiWorkflow, nodeCount: workflow.nodes.length, linkCount }
}
