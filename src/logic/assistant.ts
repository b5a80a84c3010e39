import type { Logger } from '../logger.js';
import type {
  ChatClient, ChatReply, ContextBlob, DerivedMetrics, EnvironmentClients, SourceFailure, WeatherQuery,
} from '../types.js';
import { respond, type ChatSession } from './chat.js';
import { assembleContext } from './context.js';
import { deriveMetrics, hasDerived } from './derive.js';
import { collectSnapshot } from './snapshot.js';

export interface AssistantDeps {
  clients: EnvironmentClients;
  chat: ChatClient;
  logger: Logger;
  contextMaxChars?: number;
}

export interface AssistantAnswer {
  reply: ChatReply;
  context: ContextBlob;
  derived: DerivedMetrics;
  failures: SourceFailure[];
}

/**
 * Live readings → derived metrics → context → chat reply, for one user message.
 * Readings are gathered inside the chat turn so the session reads as busy for the whole request.
 */
export async function answerQuestion(
  deps: AssistantDeps,
  session: ChatSession,
  text: string,
  query: WeatherQuery,
): Promise<AssistantAnswer> {
  let failures: SourceFailure[] = [];
  let derived: DerivedMetrics = {};
  // stays the placeholder when the turn is turned away as busy
  let context: ContextBlob = assembleContext({});

  const reply = await respond(session, text, async () => {
    const snapshot = await collectSnapshot(deps.clients, query, deps.logger);
    failures = snapshot.failures;
    derived = deriveMetrics(snapshot);
    context = assembleContext(
      { ...snapshot, derived: hasDerived(derived) ? derived : undefined },
      { maxChars: deps.contextMaxChars },
    );
    return context;
  }, deps.chat, deps.logger);

  return { reply, context, derived, failures };
}
