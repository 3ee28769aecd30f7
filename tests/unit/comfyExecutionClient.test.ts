import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ComfyExecutionClient } from '@/infrastructure/api/ComfyExecutionClient'
import { IOError, NetworkError } from '@/shared/errors/ComfyErrors'
import type { ResolvedJob } from '@/shared/types/app/IGeneration'
import {
  COMFY_URL,
  IMAGE_BYTES,
  PROMPT_ID,
  comfyHandlers,
  completedHistory,
  failedHistory,
  runningHistory,
  useMockComfyServer,
  type MockComfyOptions,
} from '../utils/mockComfyServer'
import { txt2imgWorkflow } from '../utils/workflowFactory'

const POLL = { pollIntervalMs: 1000, maxWaitMs: 10000, outputNodeId: '9' }

function createJob(): ResolvedJob {
  return { workflow: txt2imgWorkflow(), roles: { positive: '6', negative: '7', output: '9' } }
}

describe('ComfyExecutionClient', () => {
  const server = useMockComfyServer()
  let clock: number
  let sleeps: number[]

  beforeEach(() => {
    clock = 0
    sleeps = []
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  function setup(options: MockComfyOptions = {}, clientOptions: { externalUrl?: string; filenamePattern?: string } = {}) {
    const { handlers, recorder } = comfyHandlers(options)
    server.use(...handlers)
    const client = new ComfyExecutionClient({
      serverUrl: `${COMFY_URL}/`,
      clientId: 'test-client',
      sleep: async (ms) => {
        sleeps.push(ms)
        clock += ms
      },
      now: () => clock,
      ...clientOptions,
    })
    return { client, recorder }
  }

  describe('submit', () => {
    it('posts the graph with the client id and returns the prompt id', async () => {
      const { client, recorder } = setup()
      const job = createJob()

      const handle = await client.submit(job)

      expect(handle).toEqual({ promptId: PROMPT_ID, number: 1, submittedAt: 0 })
      expect(recorder.submissions).toHaveLength(1)
      expect(recorder.submissions[0].client_id).toBe('test-client')
      expect(recorder.submissions[0].prompt).toEqual(txt2imgWorkflow())
      expect(client.tracker.getState().jobs[PROMPT_ID].status).toBe('Submitted')
    })

    it('freezes the submitted graph', async () => {
      const { client } = setup()
      const job = createJob()

      await client.submit(job)

      expect(Object.isFrozen(job.workflow)).toBe(true)
      expect(Object.isFrozen(job.workflow['6'].inputs)).toBe(true)
    })

    it('fails with SubmitFailed on a server error and never polls', async () => {
      const { client, recorder } = setup({ submit: { status: 500, body: { error: 'boom' } } })

      const error = await client.submit(createJob()).catch((caught: unknown) => caught)

      expect(error).toBeInstanceOf(NetworkError)
      expect(error).toMatchObject({ kind: 'SubmitFailed', operation: 'submit', status: 500 })
      expect(recorder.historyCalls).toBe(0)
      expect(client.tracker.getState().jobs).toEqual({})
    })

    it('fails with SubmitFailed when the server reports node errors', async () => {
      const { client } = setup({
        submit: { status: 200, body: { prompt_id: PROMPT_ID, node_errors: { '3': { errors: ['bad seed'] } } } },
      })

      await expect(client.submit(createJob())).rejects.toMatchObject({ kind: 'SubmitFailed' })
    })

    it('fails with SubmitFailed when the response has no prompt id', async () => {
      const { client } = setup({ submit: { status: 200, body: { number: 3 } } })

      await expect(client.submit(createJob())).rejects.toThrow('Workflow submission failed: response carried no prompt_id')
    })
  })

  describe('pollForCompletion', () => {
    it('completes on the third status check after two sleeps', async () => {
      const { client, recorder } = setup({
        history: [{ body: {} }, { body: {} }, { body: completedHistory(PROMPT_ID, '9') }],
        queue: ['pending', 'running'],
      })
      const handle = await client.submit(createJob())

      const result = await client.pollForCompletion(handle, POLL)

      expect(result).toEqual({
        status: 'Completed',
        output: { filename: 'ComfyUI_00001_.png', subfolder: '', type: 'output' },
        attempts: 3,
        transientErrors: 0,
        elapsedMs: 2000,
      })
      expect(sleeps).toEqual([1000, 1000])
      expect(recorder.historyCalls).toBe(3)
      expect(recorder.queueCalls).toBe(2)
      const tracked = client.tracker.getState().jobs[PROMPT_ID]
      expect(tracked.history.map((entry) => entry.status)).toEqual(['Submitted', 'Queued', 'Running', 'Completed'])
      expect(tracked.polling).toBe(false)
    })

    it('releases a finished job but not a live one', async () => {
      const { client } = setup({ history: [{ body: completedHistory(PROMPT_ID, '9') }] })
      const handle = await client.submit(createJob())

      expect(client.release(PROMPT_ID)).toBe(false)
      await client.pollForCompletion(handle, POLL)

      expect(client.release(PROMPT_ID)).toBe(true)
      expect(client.tracker.getState().jobs).toEqual({})
      expect(client.release(PROMPT_ID)).toBe(false)
    })

    it('treats an unfinished history entry as running', async () => {
      const { client, recorder } = setup({
        history: [{ body: runningHistory(PROMPT_ID) }, { body: completedHistory(PROMPT_ID, '9') }],
      })
      const handle = await client.submit(createJob())

      await client.pollForCompletion(handle, POLL)

      expect(recorder.queueCalls).toBe(0)
      expect(client.tracker.getState().jobs[PROMPT_ID].history.map((entry) => entry.status)).toEqual([
        'Submitted',
        'Running',
        'Completed',
      ])
    })

    it('times out once the wait budget is spent', async () => {
      const { client } = setup({ history: [{ body: {} }], queue: ['pending'] })
      const handle = await client.submit(createJob())

      const result = await client.pollForCompletion(handle, { ...POLL, maxWaitMs: 2500 })

      expect(result).toEqual({
        status: 'TimedOut',
        reason: 'No result after 3000ms (limit 2500ms)',
        attempts: 4,
        transientErrors: 0,
        elapsedMs: 3000,
      })
      expect(sleeps).toEqual([1000, 1000, 1000])
    })

    it('absorbs failed status checks and keeps polling', async () => {
      const { client } = setup({
        history: [{ status: 502 }, { status: 503 }, { body: completedHistory(PROMPT_ID, '9') }],
      })
      const handle = await client.submit(createJob())

      const result = await client.pollForCompletion(handle, POLL)

      expect(result.status).toBe('Completed')
      expect(result.attempts).toBe(3)
      expect(result.transientErrors).toBe(2)
      expect(console.warn).toHaveBeenCalledTimes(2)
    })

    it('times out when every status check fails', async () => {
      const { client } = setup({ history: [{ status: 500 }] })
      const handle = await client.submit(createJob())

      const result = await client.pollForCompletion(handle, { ...POLL, maxWaitMs: 1000 })

      expect(result).toMatchObject({ status: 'TimedOut', attempts: 2, transientErrors: 2 })
    })

    it('reports the execution error of a failed job', async () => {
      const { client } = setup({
        history: [
          {
            body: failedHistory(PROMPT_ID, [
              ['execution_start', { prompt_id: PROMPT_ID }],
              ['execution_error', { node_id: '3', node_type: 'KSampler', exception_message: 'out of memory\n' }],
            ]),
          },
        ],
      })
      const handle = await client.submit(createJob())

      const result = await client.pollForCompletion(handle, POLL)

      expect(result).toMatchObject({ status: 'Failed', reason: 'KSampler 3 failed: out of memory', attempts: 1 })
      expect(client.tracker.getState().jobs[PROMPT_ID].reason).toBe('KSampler 3 failed: out of memory')
    })

    it('reports an interrupted job as failed', async () => {
      const { client } = setup({
        history: [{ body: failedHistory(PROMPT_ID, [['execution_interrupted', { prompt_id: PROMPT_ID }]]) }],
      })
      const handle = await client.submit(createJob())

      const result = await client.pollForCompletion(handle, POLL)

      expect(result.reason).toBe('Execution was interrupted on the server')
    })

    it('fails a completed job whose output node has no images', async () => {
      const { client } = setup({ history: [{ body: completedHistory(PROMPT_ID, '12') }] })
      const handle = await client.submit(createJob())

      const result = await client.pollForCompletion(handle, POLL)

      expect(result).toMatchObject({ status: 'Failed', reason: 'Output node 9 produced no images' })
    })

    it('rejects a second poll of the same handle', async () => {
      let release = () => {}
      const gate = new Promise<void>((resolve) => {
        release = resolve
      })
      let markSleeping = () => {}
      const sleeping = new Promise<void>((resolve) => {
        markSleeping = resolve
      })

      const { handlers } = comfyHandlers({ history: [{ body: {} }] })
      server.use(...handlers)
      const client = new ComfyExecutionClient({
        serverUrl: COMFY_URL,
        now: () => clock,
        sleep: (ms) => {
          clock += ms
          markSleeping()
          return gate
        },
      })
      const handle = await client.submit(createJob())

      const first = client.pollForCompletion(handle, { ...POLL, maxWaitMs: 1000 })
      await sleeping

      await expect(client.pollForCompletion(handle, POLL)).rejects.toThrow(`Prompt ${PROMPT_ID} is already being polled`)

      release()
      await expect(first).resolves.toMatchObject({ status: 'TimedOut', attempts: 2 })
      await expect(client.pollForCompletion(handle, POLL)).rejects.toThrow('already finished as TimedOut')
    })

    it('rejects a handle this client never submitted', async () => {
      const { client } = setup()

      await expect(client.pollForCompletion({ promptId: 'elsewhere', submittedAt: 0 }, POLL)).rejects.toThrow(
        'Prompt elsewhere was not submitted through this client'
      )
    })
  })

  describe('fetchAndSave', () => {
    let tmpDir: string

    beforeEach(async () => {
      tmpDir = await mkdtemp(path.join(os.tmpdir(), 'execution-client-'))
    })

    afterEach(async () => {
      await rm(tmpDir, { recursive: true, force: true })
    })

    it('returns an external view URL without downloading in url mode', async () => {
      const { client, recorder } = setup({}, { externalUrl: 'http://public.example:8188/' })

      const saved = await client.fetchAndSave(
        { filename: 'fox.png', subfolder: 'renders/day 1', type: 'output' },
        'url',
        tmpDir
      )

      expect(saved).toEqual({
        kind: 'url',
        url: 'http://public.example:8188/view?filename=fox.png&subfolder=renders%2Fday+1&type=output',
      })
      expect(recorder.viewQueries).toHaveLength(0)
    })

    it('downloads and writes the image under the expanded save path in file mode', async () => {
      const { client, recorder } = setup({}, { filenamePattern: '{date}_fox' })
      const now = new Date(2024, 0, 2, 3, 4, 5)

      const saved = await client.fetchAndSave(
        { filename: 'ComfyUI_00001_.png', subfolder: '', type: 'output' },
        'file',
        path.join(tmpDir, 'out', '[time(%Y)]'),
        now
      )

      const expectedPath = path.join(tmpDir, 'out', '2024', '2024-01-02_fox.png')
      expect(saved).toMatchObject({ kind: 'file', path: expectedPath, bytesWritten: IMAGE_BYTES.byteLength })
      expect(new Uint8Array(await readFile(expectedPath))).toEqual(IMAGE_BYTES)
      expect(recorder.viewQueries[0].get('filename')).toBe('ComfyUI_00001_.png')
      expect(recorder.viewQueries[0].get('type')).toBe('output')
    })

    it('falls back to .png when the output has no extension', async () => {
      const { client } = setup({}, { filenamePattern: 'plain' })

      const saved = await client.fetchAndSave({ filename: 'latent', subfolder: '', type: 'temp' }, 'file', tmpDir)

      expect(saved).toMatchObject({ kind: 'file', path: path.join(tmpDir, 'plain.png') })
    })

    it('fails with FetchFailed when the image cannot be downloaded', async () => {
      const { client } = setup({ image: { status: 404 } })

      const error = await client
        .fetchAndSave({ filename: 'gone.png', subfolder: '', type: 'output' }, 'file', tmpDir)
        .catch((caught: unknown) => caught)

      expect(error).toBeInstanceOf(NetworkError)
      expect(error).toMatchObject({ kind: 'FetchFailed', operation: 'fetchAndSave', status: 404 })
    })

    it('fails with WriteFailed when the save directory cannot be created', async () => {
      const blocker = path.join(tmpDir, 'blocker')
      await writeFile(blocker, 'not a directory')
      const { client } = setup({}, { filenamePattern: 'fox' })

      const error = await client
        .fetchAndSave({ filename: 'fox.png', subfolder: '', type: 'output' }, 'file', path.join(blocker, 'sub'))
        .catch((caught: unknown) => caught)

      expect(error).toBeInstanceOf(IOError)
      expect(error).toMatchObject({ kind: 'WriteFailed', path: path.join(blocker, 'sub', 'fox.png') })
    })
  })
})
