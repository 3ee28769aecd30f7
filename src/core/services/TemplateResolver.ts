/**
 * TemplateResolver - Graph Template Loading and Node Resolution
 *
 * Turns a template file plus prompt text into a ResolvedJob:
 * - Loads editor or execution JSON and normalizes it to the execution form
 * - Binds node roles (positive/negative text, output, ...) to node ids, from
 *   configured ids or by title/type discovery
 * - Injects prompt text, dimensions and save paths into a per-call copy
 *
 * Required roles are checked here, at resolve time, never at load time.
 */

import { readFile } from 'node:fs/promises'
import {
  createGraphTemplate,
  describeNodes,
  findNodesByTitle,
  findNodesByType,
  getNode,
  hasNode,
  type GraphTemplate,
} from '@/core/domain/GraphTemplate'
import { convertEditorToApiFormat } from '@/core/services/WorkflowFormatConverter'
import { ROLE_DEFAULTS } from '@/shared/constants/nodeRoles'
import { TemplateError } from '@/shared/errors/ComfyErrors'
import {
  NodeRole,
  type ImageDimensions,
  type ResolvedJob,
  type RoleBindings,
} from '@/shared/types/app/IGeneration'
import type { JsonValue } from '@/shared/types/comfy/IComfyAPI'
import {
  apiWorkflowSchema,
  editorWorkflowSchema,
  formatZodIssues,
} from '@/shared/validation/workflowSchemas'

export type RoleOverrides = Partial<Record<keyof RoleBindings, string>>

// binding order; discovery for later roles skips nodes taken by earlier ones
const ROLE_ORDER: ReadonlyArray<readonly [keyof RoleBindings, NodeRole]> = [
  ['positive', NodeRole.POSITIVE_TEXT],
  ['negative', NodeRole.NEGATIVE_TEXT],
  ['output', NodeRole.OUTPUT],
  ['filePath', NodeRole.FILE_PATH],
  ['latentImage', NodeRole.LATENT_IMAGE],
]

export interface ResolveRoleOptions {
  // node ids already bound to other roles; skipped during discovery
  exclude?: ReadonlySet<string>
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function hasOwn(record: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key)
}

function roleBinding(roles: RoleBindings, role: NodeRole): string | undefined {
  switch (role) {
    case NodeRole.POSITIVE_TEXT:
      return roles.positive
    case NodeRole.NEGATIVE_TEXT:
      return roles.negative
    case NodeRole.OUTPUT:
      return roles.output
    case NodeRole.FILE_PATH:
      return roles.filePath
    case NodeRole.LATENT_IMAGE:
      return roles.latentImage
  }
}

export class TemplateResolver {
  /**
   * Read and parse a template file in either representation.
   */
  async load(path: string): Promise<GraphTemplate> {
    let raw: string
    try {
      raw = await readFile(path, 'utf-8')
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? String(error.code) : 'unknown'
      throw new TemplateError('NotFound', `Workflow template not readable at ${path} (${code})`, {
        operation: 'load',
        cause: error,
      })
    }

    let data: unknown
    try {
      data = JSON.parse(raw)
    } catch (error) {
      throw new TemplateError('Malformed', `Workflow template ${path} is not valid JSON`, {
        operation: 'load',
        cause: error,
      })
    }

    const template = this.fromJson(path, data)
    console.log(`📂 [TemplateResolver] Loaded ${template.representation} template ${path}: ${template.nodes.length} nodes, ${template.linkCount} links`)
    return template
  }

  /**
   * Detect the representation by shape and normalize to a GraphTemplate.
   * An object with a `nodes` array is an editor export; an object whose
   * every value has a `class_type` is an execution graph.
   */
  fromJson(path: string, data: unknown): GraphTemplate {
    if (isRecord(data) && Array.isArray(data.nodes)) {
      const parsed = editorWorkflowSchema.safeParse(data)
      if (!parsed.success) {
        throw new TemplateError('Malformed', `Editor workflow ${path} is malformed:\n${formatZodIssues(parsed.error).join('\n')}`, {
          operation: 'load',
          cause: parsed.error,
        })
      }
      const { apiWorkflow, linkCount } = convertEditorToApiFormat(parsed.data)
      const order = parsed.data.nodes.map((node) => String(node.id))
      return createGraphTemplate(path, 'editor', apiWorkflow, order, linkCount)
    }

    const looksExecutable =
      isRecord(data) &&
      Object.keys(data).length > 0 &&
      Object.values(data).every((node) => isRecord(node) && 'class_type' in node)

    if (looksExecutable) {
      const parsed = apiWorkflowSchema.safeParse(data)
      if (!parsed.success) {
        throw new TemplateError('Malformed', `Execution workflow ${path} is malformed:\n${formatZodIssues(parsed.error).join('\n')}`, {
          operation: 'load',
          cause: parsed.error,
        })
      }
      return createGraphTemplate(path, 'execution', parsed.data)
    }

    throw new TemplateError('Malformed', `Workflow ${path} is neither an editor export (nodes + links) nor an execution graph (id -> class_type)`, {
      operation: 'load',
    })
  }

  /**
   * Bind one role to a node id.
   *
   * An explicit id is only checked for existence. Otherwise: nodes with a
   * matching title and one of the types first, then nodes matching a type
   * alone. Types are tried in hint order; when several nodes share the first
   * matching type, the first in iteration order wins.
   */
  resolveRole(
    template: GraphTemplate,
    role: NodeRole,
    explicitId?: string,
    titleHint?: string | readonly string[],
    typeHint?: string | readonly string[],
    options: ResolveRoleOptions = {}
  ): string {
    if (explicitId !== undefined) {
      if (hasNode(template, explicitId)) return explicitId
      throw new TemplateError('NodeNotFound', `${role} node "${explicitId}" not found in ${template.path}. Available nodes:\n${describeNodes(template).join('\n')}`, {
        operation: 'resolveRole',
        nodeId: explicitId,
        role,
      })
    }

    const defaults = ROLE_DEFAULTS[role]
    const titles = titleHint === undefined ? defaults.titleHints : typeof titleHint === 'string' ? [titleHint] : titleHint
    const types = typeHint === undefined ? defaults.typeHints : typeof typeHint === 'string' ? [typeHint] : typeHint
    const exclude = options.exclude ?? new Set<string>()

    const titled = findNodesByTitle(template, titles).filter((node) => !exclude.has(node.id))
    for (const type of types) {
      const match = titled.find((node) => node.type === type)
      if (match) return match.id
    }

    for (const type of types) {
      const typed = findNodesByType(template, type).filter((node) => !exclude.has(node.id))
      if (typed.length > 1) {
        console.warn(`⚠️ [TemplateResolver] ${role}: ${typed.length} ${type} nodes and none titled ${titles.join(' / ')}; using node ${typed[0].id}. Configure the node id to choose explicitly.`)
      }
      if (typed.length > 0) return typed[0].id
    }

    throw new TemplateError('NodeNotFound', `Could not discover a ${role} node (${types.join(' or ')} titled ${titles.join(' / ')}) in ${template.path}. Available nodes:\n${describeNodes(template).join('\n')}`, {
      operation: 'resolveRole',
      role,
    })
  }

  /**
   * Bind every role. Configured ids are checked and reserved first, so
   * discovery never lands on a node another role was configured to use, and
   * no node is bound to two roles. Roles that are not required stay unbound
   * when not configured and not discovered.
   */
  resolveRoles(template: GraphTemplate, overrides: RoleOverrides = {}): RoleBindings {
    const taken = new Map<string, NodeRole>()

    for (const [key, role] of ROLE_ORDER) {
      const explicitId = overrides[key]
      if (explicitId === undefined) continue
      this.resolveRole(template, role, explicitId)
      this.claim(taken, explicitId, role)
    }

    const bind = (key: keyof RoleBindings, role: NodeRole): string | undefined => {
      const explicitId = overrides[key]
      if (explicitId !== undefined) return explicitId
      try {
        const nodeId = this.resolveRole(template, role, undefined, undefined, undefined, { exclude: new Set(taken.keys()) })
        this.claim(taken, nodeId, role)
        return nodeId
      } catch (error) {
        if (!ROLE_DEFAULTS[role].required && error instanceof TemplateError && error.kind === 'NodeNotFound') return undefined
        throw error
      }
    }

    const bound: Partial<Record<keyof RoleBindings, string>> = {}
    for (const [key, role] of ROLE_ORDER) {
      const nodeId = bind(key, role)
      if (nodeId !== undefined) bound[key] = nodeId
    }

    const { positive, output } = bound
    if (positive === undefined || output === undefined) {
      throw new TemplateError('NodeNotFound', `Template ${template.path} has no ${positive === undefined ? NodeRole.POSITIVE_TEXT : NodeRole.OUTPUT} node`, {
        operation: 'resolveRoles',
        role: positive === undefined ? NodeRole.POSITIVE_TEXT : NodeRole.OUTPUT,
      })
    }

    const roles: RoleBindings = { ...bound, positive, output }
    console.log(`🔍 [TemplateResolver] Roles for ${template.path}:`, roles)
    return roles
  }

  /**
   * Per-call copy of the template's execution graph.
   */
  createJob(template: GraphTemplate, roles: RoleBindings): ResolvedJob {
    return { workflow: structuredClone(template.workflow), roles: { ...roles } }
  }

  /**
   * Set the role's text input to `text`. Returns a new job; the given job and
   * every other input are left untouched.
   */
  injectPrompt(job: ResolvedJob, role: NodeRole, text: string): ResolvedJob {
    const field = ROLE_DEFAULTS[role].textField
    if (field === undefined) {
      throw new TemplateError('InputNotFound', `${role} nodes take no text input`, {
        operation: 'injectPrompt',
        role,
      })
    }
    return this.setInputs(job, role, { [field]: text }, 'injectPrompt')
  }

  injectDimensions(job: ResolvedJob, dimensions: ImageDimensions): ResolvedJob {
    const patch: Record<string, JsonValue> = {}
    if (dimensions.width !== undefined) patch.width = dimensions.width
    if (dimensions.height !== undefined) patch.height = dimensions.height
    if (Object.keys(patch).length === 0) return job
    return this.setInputs(job, NodeRole.LATENT_IMAGE, patch, 'injectDimensions')
  }

  private claim(taken: Map<string, NodeRole>, nodeId: string, role: NodeRole): void {
    const holder = taken.get(nodeId)
    if (holder !== undefined && holder !== role) {
      throw new TemplateError('RoleConflict', `Node "${nodeId}" cannot be both the ${holder} and the ${role} node`, {
        operation: 'resolveRoles',
        nodeId,
        role,
      })
    }
    taken.set(nodeId, role)
  }

  private setInputs(job: ResolvedJob, role: NodeRole, patch: Record<string, JsonValue>, operation: string): ResolvedJob {
    const nodeId = roleBinding(job.roles, role)
    if (nodeId === undefined) {
      throw new TemplateError('NodeNotFound', `No ${role} node is bound for this job`, { operation, role })
    }
    const node = getNode(job.workflow, nodeId)
    if (!node) {
      throw new TemplateError('NodeNotFound', `${role} node "${nodeId}" is not part of the job graph`, {
        operation,
        role,
        nodeId,
      })
    }
    for (const field of Object.keys(patch)) {
      if (!hasOwn(node.inputs, field)) {
        throw new TemplateError('InputNotFound', `${role} node "${nodeId}" (${node.class_type}) has no "${field}" input`, {
          operation,
          role,
          nodeId,
        })
      }
    }

    return {
      roles: job.roles,
      workflow: {
        ...job.workflow,
        [nodeId]: { ...node, inputs: { ...node.inputs, ...patch } },
      },
    }
  }
}
