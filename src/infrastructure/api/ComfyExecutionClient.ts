import axios, { type AxiosInstance } from 'axios';
import path from 'node:path';
import type { z } from 'zod';
import { createJobTracker, isTrackedTerminal, type JobTrackerStore } from '@/core/domain/JobTracker';
import { ImageFileStorage } from '@/infrastructure/storage/ImageFileStorage';
import { NetworkError, PollError, describeHttpError } from '@/shared/errors/ComfyErrors';
import {
  JobStatus,
  type OutputMode,
  type OutputReference,
  type PollOptions,
  type PollResult,
  type ResolvedJob,
  type SavedImage,
  type SubmissionHandle,
} from '@/shared/types/app/IGeneration';
import type {
  IComfyApiWorkflow,
  IComfyPromptRequest,
  JsonValue,
} from '@/shared/types/comfy/IComfyAPI';
import { substituteTokens } from '@/shared/utils/timeTokens';
import {
  type HistoryEntry,
  historyResponseSchema,
  promptResponseSchema,
  queueResponseSchema,
} from '@/shared/validation/workflowSchemas';

/**
 * ComfyUI Execution Client - one job from submission to a saved image
 *
 * Endpoints used:
 * - POST /prompt          submit the execution graph, returns prompt_id
 * - GET  /history/{id}    completion state and output files
 * - GET  /queue           queued vs running while history is still empty
 * - GET  /view            raw image bytes
 *
 * Submission and download are never retried: resubmitting risks a duplicate
 * job, and both surface a NetworkError at once. Status queries are retried
 * until the polling budget runs out.
 */

export interface ComfyExecutionClientOptions {
  serverUrl: string;
  // Base URL handed out in `url` output mode; defaults to serverUrl
  externalUrl?: string;
  requestTimeoutMs?: number;
  // Saved filename, before the extension; supports time tokens
  filenamePattern?: string;
  clientId?: string;
  http?: AxiosInstance;
  storage?: ImageFileStorage;
  tracker?: JobTrackerStore;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

type ObservedStatus =
  | { status: typeof JobStatus.QUEUED | typeof JobStatus.RUNNING }
  | { status: typeof JobStatus.COMPLETED; output: OutputReference }
  | { status: typeof JobStatus.FAILED; reason: string };

const generateClientId = (): string => {
  return `comfy-graph-runner-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
};

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function freezeWorkflow(workflow: IComfyApiWorkflow): IComfyApiWorkflow {
  for (const node of Object.values(workflow)) {
    Object.freeze(node.inputs);
    if (node._meta) Object.freeze(node._meta);
    Object.freeze(node);
  }
  return Object.freeze(workflow);
}

function asObject(value: JsonValue): { [key: string]: JsonValue } | null {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? value : null;
}

/**
 * Human-readable failure reason from a history entry's status messages.
 */
function extractFailureReason(entry: HistoryEntry): string {
  for (const [eventType, data] of entry.status.messages ?? []) {
    const details = asObject(data);
    if (eventType === 'execution_error' && details) {
      const message = typeof details.exception_message === 'string' ? details.exception_message.trim() : 'unknown error';
      const nodeType = typeof details.node_type === 'string' ? details.node_type : 'node';
      const nodeId = typeof details.node_id === 'string' || typeof details.node_id === 'number' ? ` ${details.node_id}` : '';
      return `${nodeType}${nodeId} failed: ${message}`;
    }
    if (eventType === 'execution_interrupted') {
      return 'Execution was interrupted on the server';
    }
  }
  return `Server reported status "${entry.status.status_str ?? 'unknown'}"`;
}

export class ComfyExecutionClient {
  private readonly serverUrl: string;
  private readonly externalUrl: string;
  private readonly filenamePattern: string;
  private readonly clientId: string;
  private readonly http: AxiosInstance;
  private readonly storage: ImageFileStorage;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  readonly tracker: JobTrackerStore;

  constructor(options: ComfyExecutionClientOptions) {
    this.serverUrl = options.serverUrl.replace(/\/$/, ''); // Remove trailing slash
    this.externalUrl = (options.externalUrl ?? options.serverUrl).replace(/\/$/, '');
    this.filenamePattern = options.filenamePattern ?? '{timestamp}';
    this.clientId = options.clientId ?? generateClientId();
    this.http = options.http ?? axios.create({ timeout: options.requestTimeoutMs ?? 30000 });
    this.storage = options.storage ?? new ImageFileStorage();
    this.tracker = options.tracker ?? createJobTracker();
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Submit the job's execution graph. The graph is frozen from here on.
   */
  async submit(job: ResolvedJob): Promise<SubmissionHandle> {
    const url = `${this.serverUrl}/prompt`;
    const payload: IComfyPromptRequest = {
      prompt: freezeWorkflow(job.workflow),
      client_id: this.clientId,
    };

    console.log('[ComfyExecutionClient] 📤 Submitting workflow:', {
      nodeCount: Object.keys(payload.prompt).length,
      positive: job.roles.positive,
      output: job.roles.output,
    });

    let data: unknown;
    try {
      const response = await this.http.post(url, payload, {
        headers: { 'Content-Type': 'application/json' },
      });
      data = response.data;
    } catch (error) {
      const { detail, status } = describeHttpError(error, url);
      if (axios.isAxiosError(error) && error.response) {
        console.error('[ComfyExecutionClient] ❌ Submission rejected, raw server response:', error.response.data);
      }
      throw new NetworkError('SubmitFailed', `Workflow submission failed: ${detail}`, {
        operation: 'submit',
        status,
        cause: error,
      });
    }

    const parsed = promptResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new NetworkError('SubmitFailed', 'Workflow submission failed: response carried no prompt_id', {
        operation: 'submit',
        cause: parsed.error,
      });
    }
    const { prompt_id: promptId, number, node_errors: nodeErrors } = parsed.data;
    if (nodeErrors && Object.keys(nodeErrors).length > 0) {
      throw new NetworkError('SubmitFailed', `Workflow submission failed: Node errors: ${JSON.stringify(nodeErrors)}`, {
        operation: 'submit',
      });
    }

    const handle: SubmissionHandle = { promptId, number, submittedAt: this.now() };
    this.tracker.getState().registerJob(promptId, handle.submittedAt);
    console.log(`[ComfyExecutionClient] ✅ Workflow submitted, prompt_id ${promptId}`);
    return handle;
  }

  /**
   * Poll until the job reaches a terminal state or `maxWaitMs` has elapsed.
   *
   * Failed status queries are counted and the loop carries on; they only
   * become visible as an eventual TimedOut. A TimedOut result does not stop
   * the job on the server.
   */
  async pollForCompletion(handle: SubmissionHandle, options: PollOptions): Promise<PollResult> {
    const { promptId } = handle;
    const tracked = this.tracker.getState().jobs[promptId];
    if (!tracked) {
      throw new Error(`Prompt ${promptId} was not submitted through this client`);
    }
    if (isTrackedTerminal(tracked)) {
      throw new Error(`Prompt ${promptId} already finished as ${tracked.status}; submit a new job instead`);
    }
    if (tracked.polling) {
      throw new Error(`Prompt ${promptId} is already being polled`);
    }

    const { transition, setPolling } = this.tracker.getState();
    setPolling(promptId, true);

    const start = this.now();
    let attempts = 0;
    let transientErrors = 0;

    try {
      while (true) {
        attempts++;
        try {
          const observed = await this.queryStatus(promptId, options.outputNodeId);
          const at = this.now();

          if (observed.status === JobStatus.COMPLETED) {
            transition(promptId, observed.status, at, { output: observed.output });
            console.log(`[ComfyExecutionClient] ✅ Prompt ${promptId} completed after ${attempts} checks`);
            return { status: observed.status, output: observed.output, attempts, transientErrors, elapsedMs: at - start };
          }
          if (observed.status === JobStatus.FAILED) {
            transition(promptId, observed.status, at, { reason: observed.reason });
            console.error(`[ComfyExecutionClient] ❌ Prompt ${promptId} failed: ${observed.reason}`);
            return { status: observed.status, reason: observed.reason, attempts, transientErrors, elapsedMs: at - start };
          }
          transition(promptId, observed.status, at);
          console.log(`[ComfyExecutionClient] ⏳ Prompt ${promptId}: ${observed.status}`);
        } catch (error) {
          if (!(error instanceof PollError)) throw error;
          transientErrors++;
          console.warn(`[ComfyExecutionClient] ⚠️ Status check ${attempts} for ${promptId} failed (${transientErrors} so far): ${error.message}`);
        }

        const elapsedMs = this.now() - start;
        if (elapsedMs >= options.maxWaitMs) {
          const reason = `No result after ${elapsedMs}ms (limit ${options.maxWaitMs}ms)`;
          transition(promptId, JobStatus.TIMED_OUT, this.now(), { reason });
          console.warn(`[ComfyExecutionClient] ⌛ Prompt ${promptId} timed out: ${reason}`);
          return { status: JobStatus.TIMED_OUT, reason, attempts, transientErrors, elapsedMs };
        }

        await this.sleep(options.pollIntervalMs);
      }
    } finally {
      setPolling(promptId, false);
    }
  }

  /**
   * Drop the tracking record of a finished job. Returns false, and keeps the
   * record, while the job is still live.
   */
  release(promptId: string): boolean {
    const tracked = this.tracker.getState().jobs[promptId];
    if (!tracked) return false;
    if (!isTrackedTerminal(tracked) || tracked.polling) return false;
    this.tracker.getState().removeJob(promptId);
    return true;
  }

  /**
   * `url` mode hands back a /view locator; `file` mode downloads the bytes
   * and writes them under `saveDir`. Neither is retried.
   */
  async fetchAndSave(
    outputRef: OutputReference,
    outputMode: OutputMode,
    saveDir: string,
    now: Date = new Date(this.now())
  ): Promise<SavedImage> {
    const query = new URLSearchParams({
      filename: outputRef.filename,
      subfolder: outputRef.subfolder,
      type: outputRef.type,
    });

    if (outputMode === 'url') {
      return { kind: 'url', url: `${this.externalUrl}/view?${query.toString()}` };
    }

    const url = `${this.serverUrl}/view?${query.toString()}`;
    let bytes: Buffer;
    try {
      const response = await this.http.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
      bytes = Buffer.from(response.data);
    } catch (error) {
      const { detail, status } = describeHttpError(error, url);
      console.error(`[ComfyExecutionClient] ❌ Failed to download ${outputRef.filename}: ${detail}`);
      throw new NetworkError('FetchFailed', `Image download failed: ${detail}`, {
        operation: 'fetchAndSave',
        status,
        cause: error,
      });
    }

    const extension = path.extname(outputRef.filename) || '.png';
    const filename = `${substituteTokens(this.filenamePattern, now)}${extension}`;
    const stored = await this.storage.save(substituteTokens(saveDir, now), filename, bytes);
    return { kind: 'file', path: stored.path, bytes, bytesWritten: stored.bytesWritten };
  }

  private async queryStatus(promptId: string, outputNodeId: string): Promise<ObservedStatus> {
    const history = await this.getJson(`${this.serverUrl}/history/${encodeURIComponent(promptId)}`, historyResponseSchema);
    const entry = history[promptId];

    if (entry) {
      if (entry.status.status_str === 'error') {
        return { status: JobStatus.FAILED, reason: extractFailureReason(entry) };
      }
      if (entry.status.completed) {
        const image = entry.outputs[outputNodeId]?.images?.[0];
        if (!image) {
          return { status: JobStatus.FAILED, reason: `Output node ${outputNodeId} produced no images` };
        }
        return { status: JobStatus.COMPLETED, output: image };
      }
      return { status: JobStatus.RUNNING };
    }

    const queue = await this.getJson(`${this.serverUrl}/queue`, queueResponseSchema);
    const running = queue.queue_running.some((item) => item[1] === promptId);
    return { status: running ? JobStatus.RUNNING : JobStatus.QUEUED };
  }

  private async getJson<T extends z.ZodTypeAny>(url: string, schema: T): Promise<z.output<T>> {
    let data: unknown;
    try {
      const response = await this.http.get(url);
      data = response.data;
    } catch (error) {
      throw new PollError('StatusQueryFailed', describeHttpError(error, url).detail, {
        operation: 'pollForCompletion',
        cause: error,
      });
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new PollError('StatusQueryFailed', `Unexpected response from ${url}`, {
        operation: 'pollForCompletion',
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
