export enum ConversationState {
  AskVinKnown = 'ask_vin_known',
  GetVin = 'get_vin',
  GetContact = 'get_contact',
  GetParts = 'get_parts',
  End = 'end',
  Cancelled = 'cancelled',
}

export type ActiveState =
  | ConversationState.AskVinKnown
  | ConversationState.GetVin
  | ConversationState.GetContact
  | ConversationState.GetParts;

const ACTIVE_STATES: readonly string[] = [
  ConversationState.AskVinKnown,
  ConversationState.GetVin,
  ConversationState.GetContact,
  ConversationState.GetParts,
];

export interface Session {
  state: ActiveState;
  userId: number;
  username?: string;
  firstName?: string;
  vin?: string;
  contact?: string;
}

export interface Sender {
  id: number;
  username?: string;
  firstName?: string;
}

export type InboundEvent =
  | { kind: 'command'; from: Sender; name: string; text: string }
  | { kind: 'callback'; from: Sender; tag: string }
  | { kind: 'text'; from: Sender; text: string }
  | { kind: 'unsupported'; from: Sender };

export interface ReplyButton {
  text: string;
  tag: string;
}

export interface SendReply {
  kind: 'send';
  text: string;
  html?: boolean;
  buttons?: ReplyButton[][];
  removeKeyboard?: boolean;
}

/** Replaces the text (and buttons) of the message whose button was pressed. */
export interface EditReply {
  kind: 'edit';
  text: string;
  buttons?: ReplyButton[][];
}

export type OutboundReply = SendReply | EditReply;

export type ReplySink = (reply: OutboundReply) => Promise<void>;

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

// Records read back from a persistent store are checked before use
export function isSession(value: unknown): value is Session {
  if (typeof value !== 'object' || value === null) return false;

  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.state === 'string' &&
    ACTIVE_STATES.includes(record.state) &&
    typeof record.userId === 'number' &&
    isOptionalString(record.username) &&
    isOptionalString(record.firstName) &&
    isOptionalString(record.vin) &&
    isOptionalString(record.contact)
  );
}
