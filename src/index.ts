export * from './shared'
export * from './infrastructure'
export * from './core/domain/GraphTemplate'
export * from './core/domain/JobTracker'
export * from './core/services/TemplateResolver'
export * from './core/services/WorkflowFormatConverter'
export * from './config/generationConfig'
export * from './services/ImageGenerationService'
