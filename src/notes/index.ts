export { NotesPipeline } from './cascade'
export type { NotesPipelineDeps, PipelineRun, Tier, TierOutcome } from './cascade'
export { generateContent, placeholderContent } from './contentStage'
export * from './errors'
export { generateAll } from './fanOut'
export { mapTopicContent, mapTopicList } from './mapper'
export { fromPlainText } from './plainText'
export { repairJson } from './repair'
export { createSpellCorrector } from './spellCorrection'
export type { SpellCorrector } from './spellCorrection'
export { extractTopics } from './topicExtraction'
export * from './types'
export { WorkerPool } from './workerPool'
