import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SESSION_STORAGE, SessionStorage } from '../session-storage';
import {
  ConversationState,
  InboundEvent,
  ReplySink,
  Sender,
  Session,
} from './conversation.types';
import {
  BUTTON_TAGS,
  COMMANDS,
  KEEP_ALIVE_TEXT,
  MESSAGES,
  NEW_REQUEST_BUTTONS,
  VIN_CHOICE_BUTTONS,
} from './conversation.messages';
import { validateContact, validateParts, validateVin } from './validators';
import { OrderSubmissionService } from '../../modules/orders/order-submission.service';
import { NewOrder } from '../../modules/orders/entities/order.entity';
import { UsageLogService } from '../../modules/usage-log/usage-log.service';
import { InteractionType } from '../../modules/usage-log/entities/usage-log-entry.entity';
import { UnknownChoicePolicy } from '../../config/configuration';
import { KeyedSerialQueue } from '../../common/utils/keyed-serial-queue';
import { escapeHtml } from '../../common/utils/escape-html';
import { getErrorMessage, getErrorStack } from '../../common/utils/errors';
import { captureException } from '../../config/sentry.config';

type CommandEvent = Extract<InboundEvent, { kind: 'command' }>;
type CallbackEvent = Extract<InboundEvent, { kind: 'callback' }>;
type TextEvent = Extract<InboundEvent, { kind: 'text' }>;

const FALLBACK_DETAIL_LIMIT = 100;

/**
 * The parts-request dialogue. Events of one user are handled strictly one
 * after another; different users proceed independently.
 *
 * Returns the state the user is left in, or undefined when there is no
 * conversation (idle hints, ignored keep-alives).
 */
@Injectable()
export class ConversationService {
  private readonly logger = new Logger(ConversationService.name);
  private readonly queue = new KeyedSerialQueue();

  constructor(
    @Inject(SESSION_STORAGE) private readonly sessions: SessionStorage,
    private readonly orderSubmission: OrderSubmissionService,
    private readonly usageLog: UsageLogService,
    private readonly configService: ConfigService,
  ) {}

  dispatch(event: InboundEvent, reply: ReplySink): Promise<ConversationState | undefined> {
    const key = String(event.from.id);
    return this.queue.run(key, () => this.process(key, event, reply));
  }

  private async process(
    key: string,
    event: InboundEvent,
    reply: ReplySink,
  ): Promise<ConversationState | undefined> {
    try {
      const session = await this.sessions.read(key);
      return await this.route(key, session, event, reply);
    } catch (error) {
      return this.terminateOnError(key, event, reply, error);
    }
  }

  private route(
    key: string,
    session: Session | undefined,
    event: InboundEvent,
    reply: ReplySink,
  ): Promise<ConversationState | undefined> {
    switch (event.kind) {
      case 'command':
        return this.onCommand(key, session, event, reply);
      case 'callback':
        return this.onCallback(key, session, event, reply);
      case 'text':
        return this.onText(key, session, event, reply);
      case 'unsupported':
        return this.fallback(session, event, reply);
    }
  }

  private onCommand(
    key: string,
    session: Session | undefined,
    event: CommandEvent,
    reply: ReplySink,
  ): Promise<ConversationState | undefined> {
    if (event.name === COMMANDS.START) {
      return this.begin(key, event.from, 'command', reply);
    }
    if (event.name === COMMANDS.CANCEL) {
      return this.cancel(key, event.from, reply);
    }
    return this.fallback(session, event, reply);
  }

  private async onCallback(
    key: string,
    session: Session | undefined,
    event: CallbackEvent,
    reply: ReplySink,
  ): Promise<ConversationState | undefined> {
    if (event.tag === BUTTON_TAGS.NEW_REQUEST) {
      return this.begin(key, event.from, 'button', reply);
    }

    if (!session) {
      this.logger.debug(`Stale button "${event.tag}" pressed by user ${event.from.id}`);
      await reply({ kind: 'send', text: MESSAGES.sessionExpired });
      return undefined;
    }

    if (session.state === ConversationState.AskVinKnown) {
      return this.chooseVinBranch(key, session, event, reply);
    }
    return this.fallback(session, event, reply);
  }

  private async onText(
    key: string,
    session: Session | undefined,
    event: TextEvent,
    reply: ReplySink,
  ): Promise<ConversationState | undefined> {
    if (event.text === KEEP_ALIVE_TEXT) {
      this.logger.log(`Keep-alive message from user ${event.from.id} ignored`);
      return session?.state;
    }

    if (!session) {
      await reply({ kind: 'send', text: MESSAGES.noActiveRequest });
      return undefined;
    }

    switch (session.state) {
      case ConversationState.GetVin:
        return this.acceptVin(key, session, event, reply);
      case ConversationState.GetContact:
        return this.acceptContact(key, session, event, reply);
      case ConversationState.GetParts:
        return this.acceptParts(key, session, event, reply);
      case ConversationState.AskVinKnown:
        return this.fallback(session, event, reply);
    }
  }

  /** Discards whatever was in progress and starts a fresh request. */
  private async begin(
    key: string,
    from: Sender,
    via: 'command' | 'button',
    reply: ReplySink,
  ): Promise<ConversationState> {
    if (via === 'command') {
      this.track(from, 'command', '/start');
    } else {
      this.track(from, 'callback_restart', BUTTON_TAGS.NEW_REQUEST);
    }
    this.logger.log(`User ${from.id} started a new request (via ${via})`);

    const session: Session = { state: ConversationState.AskVinKnown, userId: from.id };
    if (from.username) session.username = from.username;
    if (from.firstName) session.firstName = from.firstName;
    await this.sessions.write(key, session);

    const mention = this.mention(from);
    await reply({
      kind: 'send',
      text: via === 'command' ? MESSAGES.welcome(mention) : MESSAGES.welcomeBack(mention),
      html: true,
      removeKeyboard: true,
    });
    await reply({ kind: 'send', text: MESSAGES.askVinKnown, buttons: VIN_CHOICE_BUTTONS });

    return ConversationState.AskVinKnown;
  }

  private async cancel(key: string, from: Sender, reply: ReplySink): Promise<ConversationState> {
    this.track(from, 'command', '/cancel');
    this.logger.log(`User ${from.id} cancelled the conversation`);

    try {
      await reply({ kind: 'send', text: MESSAGES.cancelled, removeKeyboard: true });
    } finally {
      await this.sessions.delete(key);
    }
    return ConversationState.Cancelled;
  }

  private async chooseVinBranch(
    key: string,
    session: Session,
    event: CallbackEvent,
    reply: ReplySink,
  ): Promise<ConversationState> {
    this.track(event.from, 'callback_query', event.tag);

    if (event.tag === BUTTON_TAGS.VIN_YES) {
      await this.sessions.write(key, { ...session, state: ConversationState.GetVin });
      await reply({ kind: 'edit', text: MESSAGES.askVin });
      return ConversationState.GetVin;
    }

    if (event.tag === BUTTON_TAGS.VIN_NO) {
      await this.sessions.write(key, { ...session, state: ConversationState.GetContact });
      await reply({ kind: 'edit', text: MESSAGES.askContactWithoutVin });
      return ConversationState.GetContact;
    }

    this.logger.warn(`User ${event.from.id} sent unexpected choice: ${event.tag}`);
    const policy =
      this.configService.get<UnknownChoicePolicy>('conversation.unknownChoicePolicy') ?? 'reprompt';

    if (policy === 'terminate') {
      try {
        await reply({ kind: 'edit', text: MESSAGES.unknownChoice });
      } finally {
        await this.sessions.delete(key);
      }
      return ConversationState.End;
    }

    await reply({ kind: 'send', text: MESSAGES.pickAnOption, buttons: VIN_CHOICE_BUTTONS });
    return ConversationState.AskVinKnown;
  }

  private async acceptVin(
    key: string,
    session: Session,
    event: TextEvent,
    reply: ReplySink,
  ): Promise<ConversationState> {
    const result = validateVin(event.text.trim());
    if (!result.valid) {
      this.logger.log(`User ${event.from.id} provided an invalid VIN: ${event.text}`);
      await reply({ kind: 'send', text: MESSAGES.invalidVin });
      return ConversationState.GetVin;
    }

    await this.sessions.write(key, {
      ...session,
      vin: result.value,
      state: ConversationState.GetContact,
    });
    this.track(event.from, 'action_completed', 'vin_provided');
    await reply({ kind: 'send', text: MESSAGES.askContactAfterVin, removeKeyboard: true });
    return ConversationState.GetContact;
  }

  private async acceptContact(
    key: string,
    session: Session,
    event: TextEvent,
    reply: ReplySink,
  ): Promise<ConversationState> {
    const result = validateContact(event.text);
    if (!result.valid) {
      this.logger.log(`User ${event.from.id} provided an invalid contact`);
      await reply({ kind: 'send', text: MESSAGES.invalidContact });
      return ConversationState.GetContact;
    }

    await this.sessions.write(key, {
      ...session,
      contact: result.value,
      state: ConversationState.GetParts,
    });
    this.track(event.from, 'action_completed', 'contact_provided');
    await reply({ kind: 'send', text: MESSAGES.askParts, removeKeyboard: true });
    return ConversationState.GetParts;
  }

  private async acceptParts(
    key: string,
    session: Session,
    event: TextEvent,
    reply: ReplySink,
  ): Promise<ConversationState> {
    const result = validateParts(event.text);
    if (!result.valid) {
      await reply({ kind: 'send', text: MESSAGES.emptyParts });
      return ConversationState.GetParts;
    }
    return this.complete(key, session, result.value, event.from, reply);
  }

  /** The session is gone afterwards whatever the outcome. */
  private async complete(
    key: string,
    session: Session,
    parts: string,
    from: Sender,
    reply: ReplySink,
  ): Promise<ConversationState> {
    try {
      const contact = session.contact;
      if (!contact) {
        this.logger.error(`Contact missing for user ${session.userId} when completing the request`);
        await reply({ kind: 'send', text: MESSAGES.missingData });
        return ConversationState.End;
      }

      this.track(from, 'action_completed', 'parts_provided');

      const order: NewOrder = {
        telegramUserId: session.userId,
        contactInfo: contact,
        partsNeeded: parts,
      };
      if (session.username) order.telegramUsername = session.username;
      if (session.vin) order.vin = session.vin;

      const saved = await this.orderSubmission.submit(order);
      if (saved) {
        this.logger.log(`Order saved for user ${session.userId}`);
        this.track(from, 'action_completed', 'order_saved_successfully');
        await reply({ kind: 'send', text: MESSAGES.orderSaved, buttons: NEW_REQUEST_BUTTONS });
      } else {
        this.track(from, 'action_failed', 'order_save_failed');
        await reply({ kind: 'send', text: MESSAGES.orderFailed, buttons: NEW_REQUEST_BUTTONS });
      }
      return ConversationState.End;
    } finally {
      await this.sessions.delete(key);
    }
  }

  private async fallback(
    session: Session | undefined,
    event: InboundEvent,
    reply: ReplySink,
  ): Promise<ConversationState | undefined> {
    if (!session) {
      await reply({ kind: 'send', text: MESSAGES.noActiveRequest });
      return undefined;
    }

    const detail = this.describe(event);
    this.logger.warn(
      `Unexpected input from user ${event.from.id} in state ${session.state}: ${detail}`,
    );
    this.track(event.from, 'fallback', [...detail].slice(0, FALLBACK_DETAIL_LIMIT).join(''));

    await reply({
      kind: 'send',
      text:
        event.kind === 'command'
          ? MESSAGES.unexpectedCommand(`/${event.name}`)
          : MESSAGES.unexpectedInput,
    });
    return session.state;
  }

  private async terminateOnError(
    key: string,
    event: InboundEvent,
    reply: ReplySink,
    error: unknown,
  ): Promise<ConversationState> {
    this.logger.error(
      `Error handling ${event.kind} from user ${event.from.id}: ${getErrorMessage(error)}`,
      getErrorStack(error),
    );
    captureException(error, { userId: event.from.id, eventKind: event.kind });

    try {
      await this.sessions.delete(key);
    } catch (cleanupError) {
      this.logger.error(
        `Failed to clear session for user ${event.from.id}: ${getErrorMessage(cleanupError)}`,
      );
    }

    try {
      await reply({ kind: 'send', text: MESSAGES.internalError });
    } catch (replyError) {
      this.logger.warn(
        `Failed to tell user ${event.from.id} about the error: ${getErrorMessage(replyError)}`,
      );
    }

    return ConversationState.End;
  }

  private describe(event: InboundEvent): string {
    switch (event.kind) {
      case 'command':
      case 'text':
        return event.text;
      case 'callback':
        return event.tag;
      case 'unsupported':
        return '[non-text message]';
    }
  }

  private mention(from: Sender): string {
    const name = from.firstName ?? from.username ?? String(from.id);
    return `<a href="tg://user?id=${from.id}">${escapeHtml(name)}</a>`;
  }

  private track(from: Sender, interactionType: InteractionType, detail: string): void {
    this.usageLog.record({
      userId: from.id,
      username: from.username,
      firstName: from.firstName,
      interactionType,
      detail,
    });
  }
}
