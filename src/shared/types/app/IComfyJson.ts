/**
 * ComfyUI JSON Types
 *
 * Editor representation of a workflow: the node list plus link list that the
 * graph editor exports via "Save". It has to be converted before the backend
 * will accept it (see WorkflowFormatConverter).
 */

import type { JsonValue } from '../comfy/IComfyAPI'

export type IComfyNodeId = number | string

export interface IComfyJson {
  last_node_id?: number;
  last_link_id?: number;
  nodes: IComfyJsonNode[];
  links: IComfyJsonLink[];
  groups?: JsonValue[];
  config?: JsonValue;
  extra?: JsonValue;
  version?: number;
  id?: string;
  revision?: number;
}

export interface IComfyJsonNodeInput {
  name: string;
  type?: string;
  link?: number | null;
  // true in hand-written files, { name } in editor exports
  widget?: boolean | { name: string };
  slot_index?: number;
}

export interface IComfyJsonNodeOutput {
  name?: string;
  type?: string;
  links?: number[] | null;
  slot_index?: number;
}

export interface IComfyJsonNode {
  id: IComfyNodeId;
  type: string;
  title?: string;
  pos?: JsonValue;
  size?: JsonValue;
  widgets_values?: JsonValue[] | { [widgetName: string]: JsonValue };
  inputs?: IComfyJsonNodeInput[];
  outputs?: IComfyJsonNodeOutput[];
  flags?: JsonValue;
  order?: number;
  mode?: number;
  properties?: JsonValue;
}

/**
 * [linkId, originNodeId, originSlot, targetNodeId, targetSlot, dataType]
 */
export type IComfyJsonLinkTuple = [
  number,
  IComfyNodeId,
  number,
  IComfyNodeId,
  number,
  ...JsonValue[],
]

export interface IComfyJsonLinkObject {
  id: number;
  origin_id: IComfyNodeId;
  origin_slot: number;
  target_id: IComfyNodeId;
  target_slot: number;
  type?: string;
}

export type IComfyJsonLink = IComfyJsonLinkTuple | IComfyJsonLinkObject
