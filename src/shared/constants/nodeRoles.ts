/**
 * Discovery defaults for each node role.
 *
 * Title hints are compared case-insensitively against a node's title; type
 * hints are class types, tried in order. Roles with a text field receive the
 * injected string through that input. Discovery failure of a role that is not
 * required leaves it unbound.
 */

import { NodeRole } from '@/shared/types/app/IGeneration'

export interface RoleDefaults {
  titleHints: readonly string[]
  typeHints: readonly string[]
  textField?: string
  required: boolean
}

export const ROLE_DEFAULTS: Readonly<Record<NodeRole, RoleDefaults>> = {
  [NodeRole.POSITIVE_TEXT]: {
    titleHints: ['Positive Prompt', 'Positive'],
    typeHints: ['CLIPTextEncode'],
    textField: 'text',
    required: true,
  },
  [NodeRole.NEGATIVE_TEXT]: {
    titleHints: ['Negative Prompt', 'Negative'],
    typeHints: ['CLIPTextEncode'],
    textField: 'text',
    required: false,
  },
  [NodeRole.OUTPUT]: {
    titleHints: ['Save Image', 'Output', 'Image Save'],
    // WAS "Image Save" writes to the path held by the FilePath node
    typeHints: ['SaveImage', 'Image Save'],
    required: true,
  },
  [NodeRole.FILE_PATH]: {
    titleHints: ['Path', 'Save Path'],
    typeHints: ['Text String'],
    textField: 'text',
    required: false,
  },
  [NodeRole.LATENT_IMAGE]: {
    titleHints: ['Empty Latent Image', 'Latent'],
    typeHints: ['EmptyLatentImage'],
    required: false,
  },
}
