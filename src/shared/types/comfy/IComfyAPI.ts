/**
 * ComfyUI Service Types
 *
 * Execution representation of a workflow. Backend response shapes are
 * inferred from their schemas in shared/validation.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * Connection to another node's output: [sourceNodeId, outputSlot]
 */
export type IComfyNodeLink = [string, number];

export interface IComfyApiNode {
  class_type: string;
  inputs: Record<string, JsonValue>;
  _meta?: {
    title?: string;
  };
}

/**
 * Execution representation, the body of POST /prompt: node id -> node
 */
export type IComfyApiWorkflow = Record<string, IComfyApiNode>;

export interface IComfyPromptRequest {
  prompt: IComfyApiWorkflow;
  client_id: string;
}

export interface IComfyOutputFile {
  filename: string;
  subfolder: string;
  type: string;
}

export function isNodeLink(value: JsonValue | undefined): value is IComfyNodeLink {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === 'string' &&
    typeof value[1] === 'number'
  );
}
