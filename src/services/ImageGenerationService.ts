/**
 * Image Generation Service
 *
 * One call runs one prompt through the configured template:
 * resolve roles -> build job -> submit -> poll -> fetch/save.
 * Every failure is returned as a value; nothing escapes generateImage.
 */

import type { GenerationConfig } from '@/config/generationConfig'
import type { GraphTemplate } from '@/core/domain/GraphTemplate'
import { TemplateResolver, type RoleOverrides } from '@/core/services/TemplateResolver'
import { ComfyExecutionClient } from '@/infrastructure/api/ComfyExecutionClient'
import { ComfyRunnerError } from '@/shared/errors/ComfyErrors'
import {
  JobStatus,
  NodeRole,
  type ImageDimensions,
  type ResolvedJob,
  type SavedImage,
} from '@/shared/types/app/IGeneration'

export interface GenerateImageRequest {
  positivePrompt: string
  negativePrompt?: string
  // overrides the configured save directory; written into the FilePath node when one is bound
  savePath?: string
  width?: number
  height?: number
}

export interface GenerationErrorInfo {
  name: string
  kind: string
  operation: string
  message: string
}

export type GenerateImageResult =
  | { success: true; image: SavedImage; promptId: string }
  | { success: false; error: GenerationErrorInfo; promptId?: string }

export interface ImageGenerationServiceDeps {
  resolver?: TemplateResolver
  client?: ComfyExecutionClient
}

export class ImageGenerationService {
  private readonly resolver: TemplateResolver
  private readonly client: ComfyExecutionClient
  private templatePromise: Promise<GraphTemplate> | null = null

  constructor(private readonly config: GenerationConfig, deps: ImageGenerationServiceDeps = {}) {
    this.resolver = deps.resolver ?? new TemplateResolver()
    this.client =
      deps.client ??
      new ComfyExecutionClient({
        serverUrl: config.comfyUrl,
        externalUrl: config.comfyUrlExternal,
        requestTimeoutMs: config.requestTimeoutMs,
        filenamePattern: config.filenamePattern,
      })
  }

  async generateImage(request: GenerateImageRequest): Promise<GenerateImageResult> {
    let promptId: string | undefined
    try {
      const template = await this.getTemplate()
      const roles = this.resolver.resolveRoles(template, this.roleOverrides())
      const saveDir = request.savePath ?? this.config.saveDir

      const job = this.buildJob(this.resolver.createJob(template, roles), request, saveDir)

      const handle = await this.client.submit(job)
      promptId = handle.promptId

      const result = await this.client.pollForCompletion(handle, {
        pollIntervalMs: this.config.pollIntervalMs,
        maxWaitMs: this.config.maxWaitMs,
        outputNodeId: roles.output,
      })

      if (result.status !== JobStatus.COMPLETED || !result.output) {
        return {
          success: false,
          promptId,
          error: {
            name: 'GenerationFailed',
            kind: result.status === JobStatus.TIMED_OUT ? 'TimedOut' : 'Failed',
            operation: 'pollForCompletion',
            message: result.reason ?? `Generation ended as ${result.status}`,
          },
        }
      }

      const image = await this.client.fetchAndSave(result.output, this.config.outputMode, saveDir)
      console.log(`🎨 [ImageGenerationService] Prompt ${promptId} done:`, image.kind === 'url' ? image.url : image.path)
      return { success: true, image, promptId }
    } catch (error) {
      if (error instanceof ComfyRunnerError) {
        console.error(`❌ [ImageGenerationService] ${error.name} (${error.kind}) in ${error.operation}: ${error.message}`)
        return {
          success: false,
          promptId,
          error: { name: error.name, kind: error.kind, operation: error.operation, message: error.message },
        }
      }
      console.error('❌ [ImageGenerationService] Unexpected error:', error)
      return {
        success: false,
        promptId,
        error: {
          name: error instanceof Error ? error.name : 'Error',
          kind: 'Unexpected',
          operation: 'generateImage',
          message: error instanceof Error ? error.message : String(error),
        },
      }
    } finally {
      if (promptId !== undefined) this.client.release(promptId)
    }
  }

  /**
   * Loaded once per service; a failed load is retried on the next call.
   */
  private getTemplate(): Promise<GraphTemplate> {
    if (!this.templatePromise) {
      this.templatePromise = this.resolver.load(this.config.workflowFile).catch((error: unknown) => {
        this.templatePromise = null
        throw error
      })
    }
    return this.templatePromise
  }

  private roleOverrides(): RoleOverrides {
    const overrides: RoleOverrides = {}
    const { nodeIds } = this.config
    if (nodeIds.positive !== undefined) overrides.positive = nodeIds.positive
    if (nodeIds.negative !== undefined) overrides.negative = nodeIds.negative
    if (nodeIds.output !== undefined) overrides.output = nodeIds.output
    if (nodeIds.filePath !== undefined) overrides.filePath = nodeIds.filePath
    if (nodeIds.latentImage !== undefined) overrides.latentImage = nodeIds.latentImage
    return overrides
  }

  private buildJob(base: ResolvedJob, request: GenerateImageRequest, saveDir: string): ResolvedJob {
    let job = this.resolver.injectPrompt(base, NodeRole.POSITIVE_TEXT, request.positivePrompt)

    if (request.negativePrompt && job.roles.negative !== undefined) {
      job = this.resolver.injectPrompt(job, NodeRole.NEGATIVE_TEXT, request.negativePrompt)
    }

    if (job.roles.filePath !== undefined) {
      job = this.resolver.injectPrompt(job, NodeRole.FILE_PATH, saveDir)
    }

    const dimensions: ImageDimensions = { width: request.width, height: request.height }
    if (dimensions.width !== undefined || dimensions.height !== undefined) {
      if (job.roles.latentImage !== undefined) {
        job = this.resolver.injectDimensions(job, dimensions)
      } else {
        console.warn('⚠️ [ImageGenerationService] Width/height given but the template has no latent image node; ignoring')
      }
    }

    return job
  }
}
