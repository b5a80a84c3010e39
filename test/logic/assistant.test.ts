import { describe, expect, it } from 'vitest';
import { echoChat, fakeClients, silentLogger, unreachable, weather } from '../helpers/fixtures.js';
import { answerQuestion } from '../../src/logic/assistant.js';
import { ChatSession } from '../../src/logic/chat.js';
import { NO_DATA_PLACEHOLDER } from '../../src/logic/context.js';

const query = { lat: 12.9716, lon: 77.5946, timezone: 'Asia/Kolkata', forecastDays: 3 };

describe('answerQuestion', () => {
  it('answers from the sources that did respond', async () => {
    const session = new ChatSession('s1', 'citizens');
    const deps = { clients: fakeClients({ weather: async () => unreachable('weather') }), chat: echoChat(), logger: silentLogger };

    const answer = await answerQuestion(deps, session, 'Is it safe to jog?', query);

    expect(answer.reply.ok).toBe(true);
    expect(answer.reply.text).toContain('- PM2.5: 38.2 μg/m³');
    expect(answer.reply.text).not.toContain('Weather (observed');
    expect(answer.context.sources).toEqual(['airQuality', 'derived', 'earthObservation']);
    expect(answer.derived).toEqual({ aqi: { aqi: 108, category: 'Unhealthy-for-Sensitive', dominant: 'pm25' } });
    expect(answer.failures).toEqual([{ source: 'weather', kind: 'Unreachable', message: 'request timed out' }]);
    expect(session.history).toHaveLength(2);
  });

  it('still answers when every source is down', async () => {
    const session = new ChatSession('s1', 'citizens');
    const clients = fakeClients({
      weather: async () => unreachable('weather'),
      airQuality: async () => unreachable('airQuality'),
      earthObservation: async () => unreachable('earthObservation'),
    });

    const answer = await answerQuestion({ clients, chat: echoChat(), logger: silentLogger }, session, 'Weather?', query);

    expect(answer.context.empty).toBe(true);
    expect(answer.reply.text).toBe(`Current environmental context:\n${NO_DATA_PLACEHOLDER}`);
    expect(answer.failures.map(f => f.source)).toEqual(['weather', 'airQuality', 'earthObservation']);
  });

  it('marks the session busy while readings are still being fetched', async () => {
    const session = new ChatSession('s1', 'citizens');
    let release: () => void = () => {};
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    const clients = fakeClients({
      weather: async () => {
        await gate;
        return { ok: true, value: weather };
      },
    });
    const deps = { clients, chat: echoChat(), logger: silentLogger };

    const first = answerQuestion(deps, session, 'one', query);
    expect(session.state).toBe('AwaitingReply');

    const second = await answerQuestion(deps, session, 'two', query);
    expect(second.reply.error).toBe('Busy');
    expect(second.context.empty).toBe(true);
    expect(second.failures).toEqual([]);

    release();
    const answer = await first;
    expect(answer.reply.ok).toBe(true);
    expect(answer.context.sources).toContain('weather');
    expect(session.state).toBe('Idle');
    expect(session.history.filter(t => t.role === 'user').map(t => t.text)).toEqual(['one']);
  });

  it('respects the context size limit', async () => {
    const session = new ChatSession('s1', 'citizens');
    const answer = await answerQuestion(
      { clients: fakeClients(), chat: echoChat(), logger: silentLogger, contextMaxChars: 200 },
      session,
      'Summary?',
      query,
    );
    expect(answer.context.truncated).toBe(true);
    expect(answer.context.text.length).toBeLessThanOrEqual(200);
  });
});
