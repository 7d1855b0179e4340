export { extractParameters, detectAnalysisType, hasAnalyticsKeyword, hasRankingKeyword, isFollowUpPhrase } from './core/extractor.js';
export { IntentClassifier, classifyByPatterns, type Classification, type LLMIntentClassifier } from './core/classifier.js';
export { ConversationMemory } from './core/memory.js';
export { resolveIntent, mergeParameters, validateQuery } from './core/resolve.js';
export { Router, type RouterDeps, type RouterResponse, type TurnStage } from './core/router.js';
export { SessionRegistry, SessionBusyError } from './core/session_store.js';
export type { FlightStatusLookup, FlightStatusLookupResult, FareAnalyticsWarehouse } from './core/adapters.js';
export type { TurnError, TurnErrorCode } from './core/errors.js';
export { createServices } from './core/services.js';
export { createLlmIntentClassifier, parseIntentLabel } from './core/llm.js';
export { createAviationstackLookup } from './tools/aviationstack.js';
export { createFareWarehouse } from './tools/fare_warehouse.js';
export { createPool, asSqlClient, type SqlClient } from './db/pool.js';
export { formatResponse } from './presentation/format.js';
export { loadAppConfig } from './config/app.js';
export * from './schemas/query.js';
