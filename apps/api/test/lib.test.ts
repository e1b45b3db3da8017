import { describe, it, expect } from 'vitest';
import { AlertFeed } from '../src/lib/alertFeed.js';
import { SessionRegistry } from '../src/lib/sessions.js';

describe('AlertFeed', () => {
  const now = () => new Date('2024-05-01T12:00:00.000Z');

  it('lists most recent first and honours the limit', () => {
    const feed = new AlertFeed(5, now);
    feed.push({ title: 'a', riskBand: 'LOW', source: 'test' });
    feed.push({ title: 'b', riskBand: 'HIGH', source: 'test' });
    feed.push({ title: 'c', riskBand: 'CRITICAL', source: 'test' });

    expect(feed.list().map((alert) => alert.title)).toEqual(['c', 'b', 'a']);
    expect(feed.list(2).map((alert) => alert.id)).toEqual(['alert_3', 'alert_2']);
    expect(feed.list(1)[0].receivedAt).toBe('2024-05-01T12:00:00.000Z');
  });

  it('never holds more than its capacity', () => {
    const feed = new AlertFeed(200, now);
    for (let i = 0; i < 250; i++) {
      feed.push({ title: `alert ${i}`, riskBand: 'LOW', source: 'test' });
    }

    expect(feed.size).toBe(200);
    expect(feed.list(1)[0].title).toBe('alert 249');
    expect(feed.list(200)[199].title).toBe('alert 50');
  });

  it('rejects capacities outside 1..200', () => {
    expect(() => new AlertFeed(0)).toThrow('Alert feed capacity must be an integer in [1, 200], got 0');
    expect(() => new AlertFeed(201)).toThrow();
  });
});

describe('SessionRegistry', () => {
  it('creates graphs on write only', () => {
    const sessions = new SessionRegistry();

    expect(sessions.view('a').signalCount).toBe(0);
    expect(sessions.ids()).toEqual([]);

    sessions.acquire('a').addSignal('email', { sender: 'x@evil.tld' });
    expect(sessions.ids()).toEqual(['a']);
    expect(sessions.view('a').signalCount).toBe(1);
    expect(sessions.acquire('a')).toBe(sessions.view('a'));
  });

  it('reports how many signals a reset discarded', () => {
    const sessions = new SessionRegistry();
    sessions.acquire('a').addSignal('email', {});
    sessions.acquire('a').addSignal('email', {});

    expect(sessions.reset('a')).toBe(2);
    expect(sessions.reset('missing')).toBe(0);
    expect(sessions.view('a').state).toBe('empty');
  });
});
