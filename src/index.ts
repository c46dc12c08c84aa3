export { buildApp } from './app';
export type { AppContext, BuildAppOptions } from './app';
export { createEngine } from './engine/create-engine';
export type { Engine, EngineOverrides } from './engine/create-engine';
export { ContextEngineService } from './engine/context-engine-service';
export type {
  Interaction,
  IngestResult,
  FragmentList,
  SimilarResults,
  DeletionResult,
} from './engine/context-engine-service';
export { IdentityResolver } from './identity/identity-resolver';
export { normalizeIdentifier, normalizePhone, normalizeEmail, extractPhoneFromGatewayEmail } from './identity/normalizer';
export type { IdentityDirectory, IdentityRecord, LinkResult, ResolutionResult, ResolutionSignals } from './identity/types';
export type { SemanticStore, ConversationFragment, FragmentMetadata, ScoredFragment } from './store/types';
export type { EmbeddingProvider } from './embedding/embedding-service';
export { OpenAIEmbeddingProvider, HashEmbeddingProvider } from './embedding/embedding-service';
export type { CustomerProfile } from './profile/types';
export type { ContextSummary, GetContextOptions } from './context/types';
export type { ContextItem } from './scoring/relevance-scorer';
export type { ConversationThread } from './threading/conversation-threader';
export { StoreUnavailableError, MalformedRecordError, OperationCancelledError } from './errors/errors';
