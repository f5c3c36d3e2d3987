export * from './game/othello'
export * from './ai/evaluation'
export * from './ai/search'
export { TranspositionCache, BoundType, classifyBound, type NodeRole, type CacheStats } from './ai/transposition'
export {
  EngineRegistry,
  DEFAULT_ENGINE_CONFIG,
  type EngineConfig,
  type EngineType,
  type MoveResult,
  type SearchEngine,
  type SearchInfo,
} from './ai/engine'
export { engineRegistry, minimaxEngine, alphaBetaEngine } from './ai/engines'
export { runAgent, AGENT_NAME, PASS_REPLY, type AgentOptions, type AgentSummary } from './protocol/agent'
export { ProtocolError, getErrorMessage, logError } from './lib/errorUtils'
export { parseAgentConfig, parseBoard, parseStatusLine, loadEnvironment, type AgentConfig } from './lib/schemas'
