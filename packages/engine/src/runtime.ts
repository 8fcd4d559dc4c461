import { randomUUID } from "node:crypto";
import { clearLane, conversationLane, emitHook, enqueueInLane, errorMessage, getLogger, withTimeout } from "@hodlchat/core";
import type { ConversationSummary, MessageRecord } from "@hodlchat/core";
import type { Collaborators, WalletSnapshot } from "./collaborators.js";
import { IntentClassifier } from "./classifier/intent-classifier.js";
import type { ClassificationResult } from "./classifier/intent-classifier.js";
import { formatBtc, truncateAddress } from "./dispatch/formatting.js";
import { MeaningDispatcher } from "./dispatch/meaning-dispatcher.js";
import type { Attachment, ConversationPreferences, ResponseDirective, ResponseKind } from "./dispatch/meaning-dispatcher.js";
import { replyStyleFor } from "./dispatch/personality.js";
import { ResponsePicker } from "./dispatch/responses.js";
import type { ReplyStyle } from "./dispatch/responses.js";
import { createRandom } from "./dispatch/rng.js";
import type { RandomSource } from "./dispatch/rng.js";
import { TipsEngine } from "./dispatch/tips.js";
import { extractAmount } from "./extraction/entity-extractor.js";
import { FlowController } from "./flow/flow-controller.js";
import type { FlowContext } from "./flow/flow-controller.js";
import { isSendInFlight } from "./flow/flow-state.js";
import type { FlowStateKind, PendingTransaction } from "./flow/flow-state.js";
import type { IntentType, ParsedEntity, WalletIntent } from "./intent/types.js";
import { ConversationMemory } from "./memory/conversation-memory.js";
import type { ShownData } from "./memory/conversation-memory.js";
import { REDACTED_MESSAGE } from "./memory/conversation-store.js";
import type { ConversationStore } from "./memory/conversation-store.js";
import { decodeShown, encodeShown } from "./memory/shown-codec.js";
import { ReferenceResolver, withoutRelativeAmount } from "./references/reference-resolver.js";
import type { ResolvedReferences } from "./references/reference-resolver.js";
import { looksLikeRecoveryPhrase } from "./security/seed-phrase.js";
import { splitIfCompound } from "./segmenter/multi-intent.js";

const logger = getLogger("runtime");

export interface RuntimeOptions {
  collaborators: Collaborators;
  /** Omit to keep conversations in memory only. */
  store?: ConversationStore;
  defaultCurrency?: string;
  minIntentConfidence?: number;
  collaboratorTimeoutMs?: number;
  collaboratorMaxAttempts?: number;
  /** Seed for phrasing selection; unset picks at random. */
  responseSeed?: number;
  random?: RandomSource;
  /** Append a command-discovery tip to every few plain answers. Off unless set. */
  tips?: boolean;
}

export interface EngineReply {
  conversationId: string;
  text: string;
  kind: ResponseKind;
  intent: IntentType;
  confidence: number;
  flowState: FlowStateKind;
  pending?: PendingTransaction;
  attachments: Attachment[];
}

interface ConversationSession {
  id: string;
  memory: ConversationMemory;
  flow: FlowController;
  preferences: ConversationPreferences;
  tips: TipsEngine;
}

interface SegmentOutcome {
  classified: ClassificationResult;
  directive: ResponseDirective;
}

/**
 * Runs each message through the full pipeline: recovery-phrase guard,
 * reference resolution, segmentation, classification, the send flow and
 * dispatch. Messages of one conversation are handled strictly one at a
 * time; memory changes only after a message has been fully processed.
 */
export class ConversationRuntime {
  private collaborators: Collaborators;
  private store?: ConversationStore;
  private classifier: IntentClassifier;
  private resolver = new ReferenceResolver();
  private dispatcher: MeaningDispatcher;
  private responses: ResponsePicker;
  private random: RandomSource;
  private tipsEnabled: boolean;
  private timeoutMs: number;
  private sessions = new Map<string, ConversationSession>();

  constructor(options: RuntimeOptions) {
    this.collaborators = options.collaborators;
    this.store = options.store;
    this.timeoutMs = options.collaboratorTimeoutMs ?? 8_000;
    this.classifier = new IntentClassifier({
      defaultCurrency: options.defaultCurrency,
      minConfidence: options.minIntentConfidence,
    });
    this.random = options.random ?? createRandom(options.responseSeed);
    this.tipsEnabled = options.tips ?? false;
    this.responses = new ResponsePicker(this.random);
    this.dispatcher = new MeaningDispatcher({
      collaborators: options.collaborators,
      responses: this.responses,
      defaultCurrency: options.defaultCurrency ?? "USD",
      timeoutMs: this.timeoutMs,
      maxAttempts: options.collaboratorMaxAttempts ?? 2,
    });
  }

  handleMessage(conversationId: string, text: string): Promise<EngineReply> {
    return enqueueInLane(conversationLane(conversationId), () => this.process(conversationId, text));
  }

  // ─── Conversation Management ──────────────────────────────

  createConversation(title?: string): ConversationSummary {
    if (this.store) return this.store.create(title ? { title } : {});
    const now = new Date().toISOString();
    const id = randomUUID();
    this.session(id);
    emitHook("conversation", "created", { conversationId: id });
    return { id, title: title ?? "New conversation", createdAt: now, updatedAt: now, messageCount: 0 };
  }

  listConversations(): ConversationSummary[] {
    return this.store?.list() ?? [];
  }

  renameConversation(id: string, title: string): boolean {
    return this.store?.rename(id, title) ?? false;
  }

  deleteConversation(id: string): boolean {
    const dropped = clearLane(conversationLane(id));
    if (dropped > 0) logger.info({ conversationId: id, dropped }, "Dropped queued messages of deleted conversation");
    this.sessions.delete(id);
    return this.store?.delete(id) ?? false;
  }

  /**
   * Switches to a stored conversation, rebuilding its memory by running
   * every stored user message back through extraction and classification
   * and restoring what each stored reply displayed.
   */
  openConversation(id: string): ConversationSummary | undefined {
    const summary = this.store?.get(id);
    if (!this.store || !summary) return undefined;

    const session = this.freshSession(id);
    let previousIntent: WalletIntent | undefined;
    let replayed = 0;
    for (const message of this.store.messages(id)) {
      if (message.role === "assistant") {
        session.memory.recordAIResponse(message.content, message.shown ? decodeShown(message.shown) : {});
        continue;
      }
      if (message.content === REDACTED_MESSAGE) continue;
      const references = this.references(message.content, session, previousIntent);
      const enriched = this.resolver.enrichWithReferences(message.content, references);
      const classified = this.classifier.classify(enriched, { references, previousIntent });
      const intent = classified.top.intent;
      session.memory.recordUserMessage(message.content, intent, recordable(message.content, intent, classified.entities));
      previousIntent = classified.top.intent;
      replayed += 1;
    }

    this.sessions.set(id, session);
    emitHook("conversation", "replayed", { conversationId: id, messages: replayed });
    logger.info({ conversationId: id, replayed }, "Conversation replayed");
    return summary;
  }

  /** Clears memory and any draft; stored history is kept. */
  resetConversation(id: string): void {
    const session = this.sessions.get(id);
    if (session) {
      session.memory.reset();
      session.flow.reset();
      session.tips.reset();
      session.preferences.balanceHidden = false;
    }
    emitHook("conversation", "reset", { conversationId: id });
  }

  /** Read-only view of a conversation's memory, mainly for hosts and tests. */
  memoryOf(id: string): ConversationMemory {
    return this.session(id).memory;
  }

  // ─── Pipeline ─────────────────────────────────────────────

  private async process(conversationId: string, text: string): Promise<EngineReply> {
    const session = this.session(conversationId);

    if (looksLikeRecoveryPhrase(text)) {
      return this.blockRecoveryPhrase(session);
    }

    let snapshot: WalletSnapshot;
    try {
      snapshot = await withTimeout("wallet", this.timeoutMs, async () => this.collaborators.wallet.getSnapshot());
    } catch (err) {
      logger.error({ conversationId, err: errorMessage(err) }, "Wallet snapshot unavailable");
      const reply = this.responses.say("networkUnknown");
      this.persist(conversationId, [
        { role: "user", content: text },
        { role: "assistant", content: reply, intentType: "error" },
      ]);
      return {
        conversationId,
        text: reply,
        kind: "error",
        intent: "unknown",
        confidence: 0,
        flowState: session.flow.state.kind,
        attachments: [],
      };
    }

    const { memory, flow } = session;
    const settled = flow.reconcile(snapshot.transactions);
    const style = replyStyleFor(memory.behavior);
    const dispatcher = this.dispatcher.styled(style);
    const responses = this.responses.styled(style);

    let previousIntent = memory.lastClassifiedIntent;
    const references = this.references(text, session, previousIntent);
    const enriched = this.resolver.enrichWithReferences(text, references);
    const segments = splitIfCompound(enriched);

    const outcomes: SegmentOutcome[] = [];
    for (const segment of segments) {
      const classified = this.classifier.classify(segment, {
        references,
        previousIntent,
        sendInFlight: isSendInFlight(flow.state),
      });
      const flowContext = await this.flowContext(classified, session, snapshot);
      const action = flow.decide(classified, flowContext);
      const directive = await dispatcher.resolve(classified, action, {
        snapshot,
        memory,
        flow,
        preferences: session.preferences,
        previousIntent,
      });
      outcomes.push({ classified, directive });
      previousIntent = classified.top.intent;
    }

    const primary = outcomes[0];
    const parts = outcomes.map((outcome) => outcome.directive.text);
    if (settled) {
      parts.unshift(
        responses.say("unconfirmedSettled", {
          amount: formatBtc(settled.amount),
          address: truncateAddress(settled.address),
          txid: settled.txid,
        }),
      );
    }
    const tip = this.tipFor(session, outcomes, style);
    if (tip) parts.push(responses.say("tip", { tip }));
    const replyText = parts.join("\n\n");
    const shown = outcomes.reduce<ShownData>(
      (acc, outcome) => ({ ...acc, ...outcome.directive.shown }),
      settled ? { sentTransaction: settled } : {},
    );
    // Earlier segments win when two of them name the same entity.
    const entities = outcomes.reduceRight<ParsedEntity>(
      (acc, outcome) => ({ ...acc, ...outcome.classified.entities }),
      {},
    );
    const last = outcomes[outcomes.length - 1].directive;

    memory.recordUserMessage(text, primary.classified.top.intent, recordable(text, primary.classified.top.intent, entities));
    memory.recordAIResponse(replyText, shown);
    memory.setFlowState(flow.state);

    const shownPayload = encodeShown(shown);
    this.persist(conversationId, [
      { role: "user", content: text, intentType: primary.classified.top.intent.type },
      {
        role: "assistant",
        content: replyText,
        ...(last.kind === "error" ? { intentType: "error" } : {}),
        ...(shownPayload ? { shown: shownPayload } : {}),
      },
    ]);

    logger.info(
      {
        conversationId,
        intent: primary.classified.top.intent.type,
        confidence: primary.classified.top.confidence,
        segments: segments.length,
        flowState: flow.state.kind,
      },
      "Message processed",
    );

    const reply: EngineReply = {
      conversationId,
      text: replyText,
      kind: last.kind,
      intent: primary.classified.top.intent.type,
      confidence: primary.classified.top.confidence,
      flowState: flow.state.kind,
      attachments: outcomes.flatMap((outcome) => (outcome.directive.attachment ? [outcome.directive.attachment] : [])),
    };
    const pending = outcomes.find((outcome) => outcome.directive.pending)?.directive.pending;
    if (pending) reply.pending = pending;
    return reply;
  }

  /**
   * References in `text`. A relative amount ("a bit more", "double it")
   * scales the last send, so outside a send it only applies when the
   * message itself reads as one or as nothing else.
   */
  private references(text: string, session: ConversationSession, previousIntent: WalletIntent | undefined): ResolvedReferences {
    const references = this.resolver.resolve(text, session.memory);
    if (!references.kinds.includes("relativeAmount") || isSendInFlight(session.flow.state)) return references;
    const type = this.classifier.classify(text, { previousIntent }).top.intent.type;
    if (type === "send" || type === "unknown") return references;
    logger.debug({ intent: type }, "Relative amount ignored outside a send");
    return withoutRelativeAmount(references);
  }

  /** Tips only follow plain answers, never a prompt, a confirmation or an error. */
  private tipFor(session: ConversationSession, outcomes: SegmentOutcome[], style: ReplyStyle): string | undefined {
    if (!this.tipsEnabled || style.brief) return undefined;
    const state = session.flow.state.kind;
    if (state !== "idle" && state !== "completed") return undefined;
    const plain = outcomes.every(({ directive }) => directive.kind === "reply" || directive.kind === "completed");
    if (!plain) return undefined;
    return session.tips.next(outcomes[outcomes.length - 1].classified.top.intent.type);
  }

  /** Live fee estimates are only fetched when a send needs pricing. */
  private async flowContext(
    classified: ClassificationResult,
    session: ConversationSession,
    snapshot: WalletSnapshot,
  ): Promise<FlowContext> {
    const context: FlowContext = { balance: snapshot.balance };
    if (snapshot.fiatRates) context.fiatRates = snapshot.fiatRates;
    const needsFees = classified.top.intent.type === "send" || isSendInFlight(session.flow.state);
    const feeEstimates = needsFees ? await this.dispatcher.feeEstimates(snapshot) : snapshot.feeEstimates;
    if (feeEstimates) context.feeEstimates = feeEstimates;
    return context;
  }

  private blockRecoveryPhrase(session: ConversationSession): EngineReply {
    const reply = this.responses.say("recoveryPhrase");
    emitHook("security", "recovery_phrase_blocked", { conversationId: session.id });
    logger.warn({ conversationId: session.id }, "Recovery phrase blocked");
    this.persist(session.id, [
      { role: "user", content: REDACTED_MESSAGE },
      { role: "assistant", content: reply },
    ]);
    return {
      conversationId: session.id,
      text: reply,
      kind: "security",
      intent: "unknown",
      confidence: 0,
      flowState: session.flow.state.kind,
      attachments: [],
    };
  }

  private persist(conversationId: string, records: MessageRecord[]): void {
    const store = this.store;
    if (!store) return;
    try {
      if (!store.get(conversationId)) store.create({ id: conversationId });
      for (const record of records) store.append(conversationId, record);
    } catch (err) {
      logger.error({ conversationId, err: errorMessage(err) }, "Failed to persist messages");
    }
  }

  private session(id: string): ConversationSession {
    let session = this.sessions.get(id);
    if (!session) {
      session = this.freshSession(id);
      this.sessions.set(id, session);
    }
    return session;
  }

  private freshSession(id: string): ConversationSession {
    return {
      id,
      memory: new ConversationMemory(),
      flow: new FlowController(),
      preferences: { balanceHidden: false },
      tips: new TipsEngine(this.random),
    };
  }
}

/** An amount only filled in from memory is not remembered again, except by a send. */
function recordable(text: string, intent: WalletIntent, entities: ParsedEntity): ParsedEntity {
  if (intent.type === "send" || !entities.amount || extractAmount(text)) return entities;
  const { amount: _amount, unit: _unit, ...rest } = entities;
  return rest;
}
