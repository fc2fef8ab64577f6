/**
 * FeedSim - Main Entry Points
 */

export * from './types.js';
export * from './errors.js';
export {
  parseConfig,
  loadConfig,
  heavySlotsFor,
  type SimulationConfig,
  type GrowthRate,
  type ResourceBudget,
  type OpinionDynamics,
  type PageFeed,
} from './config/schema.js';
export { applyOverrides, type CliOverrides } from './config/overrides.js';
export { createStorage, SQLiteStorage, type Storage } from './storage/sqlite.js';
export { loadPopulationSnapshot, savePopulationSnapshot, parsePopulationSnapshot, toSnapshot } from './storage/snapshot.js';
export { createModelRouter, ModelRouter, OpenAICompatibleClient, AnthropicClient, type LanguageBackend } from './models/router.js';
export { HttpContentService, type ContentService } from './service/client.js';
export { RssFeedReader, type Article, type NewsSource } from './news/feeds.js';
export { ServiceRecommenderGateway, type RecommenderGateway } from './recsys/gateway.js';
export { CONTENT_STRATEGIES, FOLLOW_STRATEGIES, parseContentStrategy, parseFollowStrategy } from './recsys/strategies.js';
export { LocalPool, SequentialExecutor, createPools, type Executor } from './queue/pool.js';
export { SimulationClock } from './simulation/clock.js';
export { ActivitySampler } from './simulation/activity.js';
export { ACTION_TABLE, selectAction } from './simulation/actions.js';
export { Dispatcher } from './simulation/dispatcher.js';
export { FollowGraph } from './simulation/graph.js';
export { ActorRegistry, PopulationManager, growthCount } from './simulation/population.js';
export { buildSummary, formatSummary } from './simulation/summary.js';
export { boundedConfidence, opinionGroup, describeOpinions, type OpinionView } from './simulation/opinions.js';
export { runSimulation, type SimulationResult } from './simulation/tick.js';
export { ActorFactory } from './actors/factory.js';
export { createApp, startServer } from './api/server.js';
