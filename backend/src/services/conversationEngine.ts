import { randomUUID } from 'crypto';
import type {
  ApplicantRecord,
  ContextSnapshot,
  Conversation,
  ConversationState,
  Err,
  Message,
  MessageRole,
  Result,
  ServiceErrorCode
} from '../models/structures';
import { KeyedLock, withTimeout } from '../utils/concurrency';
import { logger as rootLogger, type Logger } from '../utils/logger';
import type { ConversationRepository } from './conversationRepository';
import type { FrustrationDetector } from './frustrationDetector';
import { DEFAULT_QUOTE, type QuoteProvider } from './quoteProvider';
import {
  applyAcceptedValue,
  buildContextSnapshot,
  createApplicantRecord,
  openNewVehicle
} from './recordMutator';
import { FALLBACK_REPLIES, HISTORY_LIMIT, type ReplyGenerator } from './replyGenerator';
import { isComplete, nextState, progressStep, type ProgressStep } from './stateMachine';
import { validateInput } from './validators';
import type { VehicleLookup } from './vehicleLookup';

export const WELCOME_MESSAGE =
  "👋 Hi there! Welcome to our insurance onboarding. I'll help you get set up quickly. Let's start with your ZIP code - what is it?";

export const CLOSING_STATEMENT =
  'Thank you! Your information has been collected successfully. You can now start a new session if needed.';

export function frustrationReply(quote: string): string {
  return `I understand this can be frustrating. Here's something to brighten your day:\n\n${quote}\n\nI'm here to help. Let's continue when you're ready.`;
}

export type EngineDependencies = {
  repository: ConversationRepository;
  lookup: VehicleLookup;
  replyGenerator: ReplyGenerator;
  frustrationDetector: FrustrationDetector;
  quoteProvider: QuoteProvider;
  replyTimeoutMs?: number;
  logger?: Logger;
  now?: () => Date;
  newId?: () => string;
};

export type TurnKind = 'accepted' | 'rejected' | 'frustrated' | 'closed';

export type TurnOutcome = {
  conversationId: string;
  reply: string;
  kind: TurnKind;
  state: ConversationState;
  progress: ProgressStep;
  isComplete: boolean;
  context: ContextSnapshot;
};

export type StartOutcome = {
  conversationId: string;
  message: string;
  state: ConversationState;
  progress: ProgressStep;
};

const DEFAULT_REPLY_TIMEOUT_MS = 15_000;

function err(code: ServiceErrorCode, message: string): Err {
  return { ok: false, error: { code, message } };
}

/**
 * Drives the intake conversation one turn at a time.
 *
 * Turns for one conversation are serialized; different conversations proceed
 * independently. Every turn yields reply text: generator failures fall back to
 * a fixed sentence for the current state.
 */
export class ConversationEngine {
  private readonly repository: ConversationRepository;
  private readonly lookup: VehicleLookup;
  private readonly replyGenerator: ReplyGenerator;
  private readonly frustrationDetector: FrustrationDetector;
  private readonly quoteProvider: QuoteProvider;
  private readonly replyTimeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly newId: () => string;
  private readonly lock = new KeyedLock();

  constructor(deps: EngineDependencies) {
    this.repository = deps.repository;
    this.lookup = deps.lookup;
    this.replyGenerator = deps.replyGenerator;
    this.frustrationDetector = deps.frustrationDetector;
    this.quoteProvider = deps.quoteProvider;
    this.replyTimeoutMs = deps.replyTimeoutMs ?? DEFAULT_REPLY_TIMEOUT_MS;
    this.logger = deps.logger ?? rootLogger;
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? randomUUID;
  }

  private append(conversation: Conversation, role: MessageRole, content: string): Conversation {
    const timestamp = this.now().toISOString();
    const message: Message = { role, content, seq: conversation.messages.length, createdAt: timestamp };
    return { ...conversation, messages: [...conversation.messages, message], updatedAt: timestamp };
  }

  private withRecord(conversation: Conversation, record: ApplicantRecord): Conversation {
    return { ...conversation, record, updatedAt: this.now().toISOString() };
  }

  // Create a conversation in the first state and greet the applicant
  async startConversation(): Promise<StartOutcome> {
    const timestamp = this.now().toISOString();
    const created: Conversation = {
      id: this.newId(),
      createdAt: timestamp,
      updatedAt: timestamp,
      record: createApplicantRecord(),
      messages: []
    };
    const conversation = this.append(created, 'assistant', WELCOME_MESSAGE);
    await this.repository.create(conversation);
    this.logger.info('Conversation started', { conversationId: conversation.id });

    return {
      conversationId: conversation.id,
      message: WELCOME_MESSAGE,
      state: conversation.record.currentState,
      progress: progressStep(conversation.record.currentState)
    };
  }

  async getConversation(conversationId: string): Promise<Result<Conversation>> {
    const conversation = await this.repository.findById(conversationId);
    if (!conversation) return err('CONVERSATION_NOT_FOUND', 'Conversation not found');
    return { ok: true, data: conversation };
  }

  async processMessage(conversationId: string, text: string): Promise<Result<TurnOutcome>> {
    return this.lock.run(conversationId, () => this.runTurn(conversationId, text));
  }

  private async runTurn(conversationId: string, text: string): Promise<Result<TurnOutcome>> {
    const log = this.logger.child({ conversationId });
    const found = await this.repository.findById(conversationId);
    if (!found) return err('CONVERSATION_NOT_FOUND', 'Conversation not found');

    let conversation = this.append(found, 'user', text);
    await this.repository.save(conversation);

    const startState = conversation.record.currentState;
    let kind: TurnKind;
    let reply: string;

    if (isComplete(startState)) {
      kind = 'closed';
      reply = CLOSING_STATEMENT;
    } else if (this.frustrationDetector.isFrustrated(text)) {
      kind = 'frustrated';
      reply = frustrationReply(await this.fetchQuote(log));
      log.info('Frustration detected; state left unchanged', { state: startState });
    } else {
      const outcome = await validateInput(startState, text, conversation.record, this.lookup);
      let guidance: string | undefined;

      if (outcome.accepted) {
        const applied = applyAcceptedValue(conversation.record, outcome.value);
        if (applied.ok) {
          const state = nextState(outcome.value, applied.data);
          let record: ApplicantRecord = { ...applied.data, currentState: state };
          if (state === 'vehicle_choice') {
            record = openNewVehicle(record);
          }
          conversation = this.withRecord(conversation, record);
          await this.repository.save(conversation);
          kind = 'accepted';
          if (outcome.warning) log.warn('Accepted with warning', { state: startState, warning: outcome.warning });
          log.info('Answer accepted', { from: startState, to: state });
        } else {
          log.error('Accepted value could not be applied', { state: startState, error: applied.error.message });
          kind = 'rejected';
          guidance = "The user's input was invalid. Error: That answer could not be recorded, please try again.";
        }
      } else {
        kind = 'rejected';
        if (outcome.reason) {
          guidance = `The user's input was invalid. Error: ${outcome.reason}`;
        }
        log.debug('Answer rejected', { state: startState, reason: outcome.reason });
      }

      reply = await this.generateReply(conversation, text, guidance, log);
    }

    conversation = this.append(conversation, 'assistant', reply);
    await this.repository.save(conversation);

    const state = conversation.record.currentState;
    return {
      ok: true,
      data: {
        conversationId,
        reply,
        kind,
        state,
        progress: progressStep(state),
        isComplete: isComplete(state),
        context: buildContextSnapshot(conversation.record)
      }
    };
  }

  private async fetchQuote(log: Logger): Promise<string> {
    try {
      return await this.quoteProvider.getQuote();
    } catch (error) {
      log.warn('Quote provider failed; using default quote', { error: String(error) });
      return DEFAULT_QUOTE;
    }
  }

  private async generateReply(
    conversation: Conversation,
    userText: string,
    guidance: string | undefined,
    log: Logger
  ): Promise<string> {
    const state = conversation.record.currentState;
    try {
      return await withTimeout(
        this.replyGenerator.generate({
          state,
          userText,
          history: conversation.messages.slice(-HISTORY_LIMIT),
          context: buildContextSnapshot(conversation.record),
          guidance
        }),
        this.replyTimeoutMs
      );
    } catch (error) {
      log.warn('Reply generation failed; using fallback', { state, error: String(error) });
      return FALLBACK_REPLIES[state];
    }
  }
}
