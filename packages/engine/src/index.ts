export { ConversationRuntime, type RuntimeOptions, type EngineReply } from "./runtime.js";

// Collaborator contracts
export {
  BroadcastError,
  toBroadcastFailure,
  isUnknownBroadcastOutcome,
  type Collaborators,
  type WalletSnapshot,
  type WalletTransaction,
  type WalletStateProvider,
  type PriceService,
  type FeeService,
  type FeeEstimates,
  type TransactionBroadcaster,
  type BroadcastRequest,
  type BroadcastResult,
  type BroadcastFailureKind,
  type AddressProvider,
} from "./collaborators.js";

// Pipeline stages
export {
  extractEntities,
  extractAddress,
  extractAmount,
  extractCurrency,
  extractCount,
  extractFeeLevel,
  extractTxid,
} from "./extraction/entity-extractor.js";
export { inspectAddress, isValidAddress, isTestnetAddress, type AddressInfo } from "./extraction/address-validator.js";
export { parseBip21, type Bip21Payment } from "./extraction/bip21.js";
export { PatternClassifier, type CategoryMatch } from "./classifier/pattern-classifier.js";
export {
  IntentClassifier,
  type ClassificationContext,
  type ClassificationResult,
} from "./classifier/intent-classifier.js";
export { splitIfCompound } from "./segmenter/multi-intent.js";
export { ReferenceResolver, type ResolvedReferences, type ReferenceKind } from "./references/reference-resolver.js";
export { analyzeMeaning, detectEmotion, detectLanguage, type SentenceMeaning } from "./meaning/sentence-meaning.js";
export { FlowController, type FlowAction, type FlowContext, type SettledSend } from "./flow/flow-controller.js";
export {
  FlowTransitionError,
  canTransition,
  type FlowState,
  type PendingTransaction,
  type SendDraft,
} from "./flow/flow-state.js";
export { MeaningDispatcher, type ResponseDirective, type Attachment } from "./dispatch/meaning-dispatcher.js";
export { ResponsePicker, STANDARD_STYLE, type ReplyStyle } from "./dispatch/responses.js";
export { TipsEngine } from "./dispatch/tips.js";
export { replyStyleFor } from "./dispatch/personality.js";
export { looksLikeRecoveryPhrase } from "./security/seed-phrase.js";

// Memory and persistence
export {
  ConversationMemory,
  type ConversationTurn,
  type MemoryView,
  type ShownData,
} from "./memory/conversation-memory.js";
export { getDatabase, closeDatabase, runMigrations } from "./memory/database.js";
export {
  SqliteConversationStore,
  autoTitle,
  REDACTED_MESSAGE,
  type ConversationStore,
} from "./memory/conversation-store.js";

export {
  ALL_AMOUNT,
  HALF_AMOUNT,
  intentsEqual,
  type WalletIntent,
  type IntentType,
  type IntentScore,
  type ParsedEntity,
  type AmountUnit,
  type FeeLevel,
} from "./intent/types.js";
export { formatBtc, truncateAddress } from "./dispatch/formatting.js";
export { DEFAULT_FEE_RATES, feeForRate } from "./flow/fees.js";
export { SATS_PER_BTC, btcToSats, satsToBtc } from "./extraction/units.js";
