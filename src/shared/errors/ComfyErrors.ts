/**
 * Error taxonomy shared by the resolver, the execution client and the
 * generation service. Every fatal error names the operation that raised it
 * and keeps the underlying cause.
 */

import axios from 'axios';

export type TemplateErrorKind = 'NotFound' | 'Malformed' | 'NodeNotFound' | 'InputNotFound' | 'RoleConflict';
export type NetworkErrorKind = 'SubmitFailed' | 'FetchFailed';
export type IOErrorKind = 'WriteFailed';
export type PollErrorKind = 'StatusQueryFailed';
export type ConfigErrorKind = 'Invalid';

export interface ComfyErrorOptions {
  operation: string;
  cause?: unknown;
}

export abstract class ComfyRunnerError<K extends string = string> extends Error {
  readonly kind: K;
  readonly operation: string;

  constructor(kind: K, message: string, options: ComfyErrorOptions) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.kind = kind;
    this.operation = options.operation;
  }
}

export class TemplateError extends ComfyRunnerError<TemplateErrorKind> {
  readonly nodeId?: string;
  readonly role?: string;

  constructor(
    kind: TemplateErrorKind,
    message: string,
    options: ComfyErrorOptions & { nodeId?: string; role?: string }
  ) {
    super(kind, message, options);
    this.nodeId = options.nodeId;
    this.role = options.role;
  }
}

export class NetworkError extends ComfyRunnerError<NetworkErrorKind> {
  readonly status?: number;

  constructor(kind: NetworkErrorKind, message: string, options: ComfyErrorOptions & { status?: number }) {
    super(kind, message, options);
    this.status = options.status;
  }
}

/**
 * Raised inside the polling loop only; the loop counts and absorbs it.
 */
export class PollError extends ComfyRunnerError<PollErrorKind> {}

export class IOError extends ComfyRunnerError<IOErrorKind> {
  readonly path: string;

  constructor(kind: IOErrorKind, message: string, options: ComfyErrorOptions & { path: string }) {
    super(kind, message, options);
    this.path = options.path;
  }
}

export class ConfigError extends ComfyRunnerError<ConfigErrorKind> {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('Invalid', ['Invalid generation configuration:', ...issues].join('\n'), {
      operation: 'loadGenerationConfig',
    });
    this.issues = issues;
  }
}

/**
 * One-line description of a transport failure, HTTP status included when the
 * server answered at all.
 */
export function describeHttpError(error: unknown, url: string): { detail: string; status?: number } {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return {
        detail: `Server returned ${error.response.status}: ${error.response.statusText || 'no status text'} (${url})`,
        status: error.response.status,
      };
    }
    if (error.code) {
      return { detail: `No response from server - ${error.code} (${url})` };
    }
    return { detail: `No response from server - ${error.message} (${url})` };
  }
  return { detail: error instanceof Error ? error.message : String(error) };
}
