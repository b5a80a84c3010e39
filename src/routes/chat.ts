import { Router } from 'express';
import { z } from 'zod';
import type { AppConfig } from '../config.js';
import type { Logger } from '../logger.js';
import { answerQuestion } from '../logic/assistant.js';
import { parseContextFacts } from '../logic/context.js';
import type { SessionStore } from '../logic/sessions.js';
import { DEFAULT_STAKEHOLDER, STAKEHOLDER_IDS } from '../logic/stakeholders.js';
import type { ChatClient, EnvironmentClients } from '../types.js';
import { httpError } from '../utils/httpError.js';

export interface ChatDeps {
  config: AppConfig;
  clients: EnvironmentClients;
  chat: ChatClient;
  sessions: SessionStore;
  logger: Logger;
}

const NewSession = z.object({
  stakeholder: z.enum(STAKEHOLDER_IDS).default(DEFAULT_STAKEHOLDER),
});

const MAX_MESSAGE_CHARS = 2000;

export default function chatRouter({ config, clients, chat, sessions, logger }: ChatDeps) {
  const router = Router();
  const Message = z.object({
    text: z.string().trim().min(1).max(MAX_MESSAGE_CHARS),
    lat: z.number().min(-90).max(90).default(config.defaults.lat),
    lon: z.number().min(-180).max(180).default(config.defaults.lon),
    timezone: z.string().min(1).default(config.defaults.timezone),
  });

  router.post('/sessions', (req, res) => {
    const parsed = NewSession.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: 'Bad Request', details: parsed.error.format() });
    }
    const session = sessions.create(parsed.data.stakeholder);
    res.status(201).json({ sessionId: session.id, stakeholder: session.stakeholder, state: session.state });
  });

  router.get('/sessions/:id/history', (req, res, next) => {
    const session = sessions.get(req.params.id);
    if (!session) return next(httpError(404, 'session_not_found', 'Unknown chat session'));
    res.json({ sessionId: session.id, stakeholder: session.stakeholder, state: session.state, history: session.history });
  });

  router.post('/sessions/:id/messages', async (req, res, next) => {
    try {
      const session = sessions.get(req.params.id);
      if (!session) return next(httpError(404, 'session_not_found', 'Unknown chat session'));

      const parsed = Message.safeParse(req.body ?? {});
      if (!parsed.success) {
        return res.status(400).json({ error: 'Bad Request', details: parsed.error.format() });
      }
      const { text, lat, lon, timezone } = parsed.data;

      const answer = await answerQuestion(
        { clients, chat, logger, contextMaxChars: config.contextMaxChars },
        session,
        text,
        { lat, lon, timezone, forecastDays: config.defaults.forecastDays },
      );

      res.json({
        reply: answer.reply.text,
        ok: answer.reply.ok,
        error: answer.reply.error,
        state: session.state,
        turns: session.history.length,
        context: {
          sources: answer.context.sources,
          truncated: answer.context.truncated,
          facts: parseContextFacts(answer.context.text),
        },
        failures: answer.failures,
      });
    } catch (e) {
      next(e);
    }
  });

  return router;
}
