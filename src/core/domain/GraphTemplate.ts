/**
 * Loaded graph template and accessors over it.
 *
 * The template keeps the representation it was loaded from, but always
 * carries the execution form: that is what roles are resolved against and
 * what jobs are built from. `nodes` preserves the source order, which is the
 * iteration order node discovery relies on.
 */

import type { IComfyApiNode, IComfyApiWorkflow } from '@/shared/types/comfy/IComfyAPI'
import { isNodeLink } from '@/shared/types/comfy/IComfyAPI'

export type TemplateRepresentation = 'editor' | 'execution'

export interface TemplateNode {
  id: string
  type: string
  title?: string
}

export interface GraphTemplate {
  readonly path: string
  readonly representation: TemplateRepresentation
  readonly nodes: readonly TemplateNode[]
  readonly workflow: IComfyApiWorkflow
  readonly linkCount: number
}

export function createGraphTemplate(
  path: string,
  representation: TemplateRepresentation,
  workflow: IComfyApiWorkflow,
  order: readonly string[] = Object.keys(workflow),
  linkCount: number = countLinks(workflow)
): GraphTemplate {
  const nodes = order.map((id) => {
    const node = workflow[id]
    const title = node._meta?.title
    return title ? { id, type: node.class_type, title } : { id, type: node.class_type }
  })
  return { path, representation, nodes, workflow, linkCount }
}

export function hasNode(template: GraphTemplate, nodeId: string): boolean {
  return Object.prototype.hasOwnProperty.call(template.workflow, nodeId)
}

export function getNode(workflow: IComfyApiWorkflow, nodeId: string): IComfyApiNode | undefined {
  return Object.prototype.hasOwnProperty.call(workflow, nodeId) ? workflow[nodeId] : undefined
}

export function findNodesByType(template: GraphTemplate, type: string): TemplateNode[] {
  return template.nodes.filter((node) => node.type === type)
}

/**
 * Nodes whose title equals one of `titles`, ignoring case and surrounding
 * whitespace.
 */
export function findNodesByTitle(template: GraphTemplate, titles: readonly string[]): TemplateNode[] {
  const wanted = new Set(titles.map((title) => title.trim().toLowerCase()))
  return template.nodes.filter((node) => node.title !== undefined && wanted.has(node.title.trim().toLowerCase()))
}

/**
 * Number of [sourceNodeId, outputSlot] references across all node inputs.
 */
export function countLinks(workflow: IComfyApiWorkflow): number {
  let count = 0
  for (const node of Object.values(workflow)) {
    for (const value of Object.values(node.inputs)) {
      if (isNodeLink(value)) count++
    }
  }
  return count
}

/**
 * "[6] CLIPTextEncode ("Positive Prompt")" per node, in iteration order.
 */
export function describeNodes(template: GraphTemplate): string[] {
  return template.nodes.map((node) => {
    const title = node.title ? ` ("${node.title}")` : ''
    return `[${node.id}] ${node.type}${title}`
  })
}
