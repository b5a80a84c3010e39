import type { Logger } from '../logger.js';
import type {
  ChatClient, ChatErrorKind, ChatMessage, ChatReply, ChatTurn, ContextBlob, ConversationState,
} from '../types.js';
import { STAKEHOLDERS, type StakeholderId } from './stakeholders.js';

const FALLBACKS: Record<ChatErrorKind, string> = {
  Unauthorized: "Sorry, I can't reach the assistant service right now because it rejected our credentials. The dashboard data above is still current.",
  RateLimited: "Sorry, the assistant is handling too many requests at the moment. Please try again in a minute.",
  Unreachable: "Sorry, I couldn't reach the assistant service. Please try again shortly; the dashboard readings are still available.",
  MalformedResponse: "Sorry, the assistant sent back a reply I couldn't read. Please try asking again.",
  Busy: "I'm still working on your previous question. Please wait for that answer first.",
  Unexpected: "Sorry, something went wrong while preparing an answer. Please try again.",
};

export function fallbackMessage(kind: ChatErrorKind): string {
  return FALLBACKS[kind];
}

/** One conversation. History only ever grows; state flips Idle ⇄ AwaitingReply. */
export class ChatSession {
  readonly history: ChatTurn[] = [];
  state: ConversationState = 'Idle';
  lastActiveAt: number;

  constructor(
    readonly id: string,
    public stakeholder: StakeholderId,
    private readonly now: () => number = Date.now,
  ) {
    this.lastActiveAt = now();
  }

  append(role: ChatTurn['role'], text: string): ChatTurn {
    const turn: ChatTurn = { role, text, timestamp: new Date(this.now()).toISOString() };
    this.history.push(turn);
    this.lastActiveAt = this.now();
    return turn;
  }

  touch() {
    this.lastActiveAt = this.now();
  }

  /** Claim the session for one message. False while another is in flight. */
  begin(): boolean {
    if (this.state === 'AwaitingReply') return false;
    this.state = 'AwaitingReply';
    this.touch();
    return true;
  }

  end() {
    this.state = 'Idle';
    this.touch();
  }
}

export function systemPrompt(stakeholder: StakeholderId): string {
  const s = STAKEHOLDERS[stakeholder];
  return [
    'You are a climate assistant for Bengaluru city stakeholders.',
    `You are talking to: ${s.label}. Focus on ${s.focus}.`,
    'Ground every number you mention in the context provided. If a data source is missing from the context, say it is currently unavailable instead of guessing.',
    'Lake health and comfort scores are heuristic estimates, not measurements; say so when you use them.',
    'Keep answers short and practical.',
  ].join(' ');
}

/** Expects the new user message to be the last turn in the session history. */
export function buildPrompt(session: ChatSession, context: ContextBlob): ChatMessage[] {
  return [
    { role: 'system', content: systemPrompt(session.stakeholder) },
    { role: 'system', content: `Current environmental context:\n${context.text}` },
    ...session.history.map((t): ChatMessage => ({ role: t.role, content: t.text })),
  ];
}

export type ContextSource = ContextBlob | (() => Promise<ContextBlob>);

/**
 * Answer one user message. Always resolves to something displayable:
 * adapter failures become an apology that is recorded like any other reply.
 * The session is busy from the moment the message is accepted, including
 * while a lazily gathered context is being fetched.
 */
export async function respond(
  session: ChatSession,
  userText: string,
  context: ContextSource,
  chat: ChatClient,
  logger: Logger,
): Promise<ChatReply> {
  if (!session.begin()) {
    return { ok: false, text: fallbackMessage('Busy'), error: 'Busy' };
  }
  session.append('user', userText);

  let reply: ChatReply;
  try {
    const blob = typeof context === 'function' ? await context() : context;
    const res = await chat.complete(buildPrompt(session, blob));
    if (res.ok) {
      reply = { ok: true, text: res.value };
    } else {
      logger.warn({ sessionId: session.id, kind: res.error.kind, status: res.error.status }, `chat failed: ${res.error.message}`);
      reply = { ok: false, text: fallbackMessage(res.error.kind), error: res.error.kind };
    }
  } catch (err) {
    logger.error({ err, sessionId: session.id }, 'chat turn threw');
    reply = { ok: false, text: fallbackMessage('Unexpected'), error: 'Unexpected' };
  }

  session.append('assistant', reply.text);
  session.end();
  return reply;
}
