import { describe, it, expect, vi } from 'vitest';
import { CorrelationGraph, extractDomain, extractEntities, buildTextDomainPattern } from '../src/index.js';

describe('entity extraction', () => {
  const pattern = buildTextDomainPattern(['com', 'xyz']);

  it('extracts domains from email addresses and URLs', () => {
    expect(extractDomain('Alice@Fake-Bank.XYZ')).toBe('fake-bank.xyz');
    expect(extractDomain('https://login.fake-bank.xyz/verify?id=1')).toBe('login.fake-bank.xyz');
    expect(extractDomain('fake-bank.xyz/path')).toBe('fake-bank.xyz');
    expect(extractDomain('   ')).toBeNull();
  });

  it('follows the field policy and deduplicates', () => {
    const entities = extractEntities(
      {
        sender: 'X@Evil.tld',
        email: 'x@evil.tld',
        sha256: 'ABCDEF',
        phone: '+1-555-0100',
        ip_address: '203.0.113.9',
        text: 'Log in at secure-login.xyz or evil.tld now',
      },
      pattern,
    );

    expect(entities).toEqual([
      { type: 'domain', value: 'evil.tld' },
      { type: 'sender', value: 'x@evil.tld' },
      { type: 'file_hash', value: 'abcdef' },
      { type: 'caller_id', value: '+1-555-0100' },
      { type: 'ip', value: '203.0.113.9' },
      { type: 'domain_in_text', value: 'secure-login.xyz' },
    ]);
  });

  it('skips free-text domains when the allow-list is empty', () => {
    expect(buildTextDomainPattern([])).toBeNull();
    expect(extractEntities({ text: 'visit example.com' }, null)).toEqual([]);
  });
});

describe('CorrelationGraph', () => {
  it('reports an empty graph without error', () => {
    const graph = new CorrelationGraph();
    const report = graph.correlate();

    expect(graph.state).toBe('empty');
    expect(report).toEqual({
      isCoordinated: false,
      connectedComponents: 0,
      signalCount: 0,
      timeline: [],
      sharedEntities: [],
      correlationStrength: 0,
      summary: 'No signals analysed yet.',
    });
  });

  it('does not call a single signal coordinated', () => {
    const graph = new CorrelationGraph();
    const id = graph.addSignal('email', { sender: 'alice@fake-bank.xyz' }, '2024-05-01T09:00:00Z');
    const report = graph.correlate();

    expect(id).toBe('email_0');
    expect(graph.state).toBe('populated');
    expect(report.isCoordinated).toBe(false);
    expect(report.signalCount).toBe(1);
    expect(report.connectedComponents).toBe(1);
    expect(report.correlationStrength).toBe(1);
    expect(report.summary).toBe('1 independent signal detected across 1 disconnected component.');
  });

  it('links two signals sharing a domain into one campaign', () => {
    const graph = new CorrelationGraph();
    graph.addSignal('email', { sender: 'x@evil.tld' }, '2024-05-01T09:00:00Z');
    graph.addSignal('url', { url: 'http://evil.tld/path' }, '2024-05-01T09:05:00Z');
    const report = graph.correlate();

    expect(report.isCoordinated).toBe(true);
    expect(report.correlationStrength).toBe(1);
    expect(report.sharedEntities).toEqual(['evil.tld']);
    expect(report.summary).toBe('COORDINATED CAMPAIGN DETECTED: 2 signals share 1 common entity (evil.tld).');
  });

  it('chains signals transitively through different entities', () => {
    const graph = new CorrelationGraph();
    graph.addSignal('email', { sender: 'ops@evil.tld' }, '2024-05-01T09:00:00Z');
    graph.addSignal('combined', { url: 'https://evil.tld/a', sha256: 'aa11' }, '2024-05-01T09:01:00Z');
    graph.addSignal('file', { hash: 'AA11' }, '2024-05-01T09:02:00Z');
    const report = graph.correlate();

    expect(report.isCoordinated).toBe(true);
    expect(report.connectedComponents).toBe(1);
    expect(report.sharedEntities).toEqual(['evil.tld', 'aa11']);
  });

  it('grades partially connected signals', () => {
    const graph = new CorrelationGraph();
    graph.addSignal('email', { sender: 'a@evil.tld' }, '2024-05-01T09:00:00Z');
    graph.addSignal('email', { sender: 'b@evil.tld' }, '2024-05-01T09:01:00Z');
    graph.addSignal('email', { sender: 'c@harmless.example' }, '2024-05-01T09:02:00Z');
    const report = graph.correlate();

    expect(report.isCoordinated).toBe(false);
    expect(report.connectedComponents).toBe(2);
    expect(report.correlationStrength).toBe(0.67);
    expect(report.sharedEntities).toEqual(['evil.tld']);
    expect(report.summary).toBe('3 independent signals detected across 2 disconnected components.');
  });

  it('keeps entityless signals in their own components', () => {
    const graph = new CorrelationGraph();
    graph.addSignal('combined', {});
    graph.addSignal('combined', {});

    const report = graph.correlate();
    expect(report.isCoordinated).toBe(false);
    expect(report.connectedComponents).toBe(2);
    expect(report.correlationStrength).toBe(0.5);
  });

  it('orders the timeline by timestamp regardless of insertion order', () => {
    const graph = new CorrelationGraph();
    graph.addSignal('email', {}, '2024-03-01T10:00:00Z');
    graph.addSignal('email', {}, '2024-01-01T00:00:00Z');
    graph.addSignal('email', {}, '2024-02-15T12:30:00Z');

    const timeline = graph.correlate().timeline;
    expect(timeline.map((entry) => entry.id)).toEqual(['email_1', 'email_2', 'email_0']);
    for (let i = 1; i < timeline.length; i++) {
      expect(timeline[i - 1].timestamp <= timeline[i].timestamp).toBe(true);
    }
  });

  it('orders mixed date formats and offsets chronologically', () => {
    const graph = new CorrelationGraph();
    graph.addSignal('email', {}, '2024-01-02T00:00:00Z');
    graph.addSignal('email', {}, 'Mon, 01 Jan 2024 00:00:00 GMT');
    graph.addSignal('email', {}, '2024-01-01T08:00:00+09:00');

    expect(graph.correlate().timeline.map((entry) => entry.timestamp)).toEqual([
      '2023-12-31T23:00:00.000Z',
      '2024-01-01T00:00:00.000Z',
      '2024-01-02T00:00:00.000Z',
    ]);
  });

  it('rejects a timestamp that is not a date', () => {
    const graph = new CorrelationGraph();

    expect(() => graph.addSignal('email', {}, 'yesterday')).toThrow('Invalid signal timestamp: yesterday');
    expect(graph.state).toBe('empty');
  });

  it('stamps signals added without a timestamp with the clock', () => {
    const graph = new CorrelationGraph({ now: () => new Date('2024-06-01T12:00:00.000Z') });
    graph.addSignal('email', {});

    expect(graph.correlate().timeline[0].timestamp).toBe('2024-06-01T12:00:00.000Z');
  });

  it('starts a fresh session after reset', () => {
    const onLog = vi.fn();
    const graph = new CorrelationGraph({ onLog });
    graph.addSignal('email', { sender: 'x@evil.tld' });
    graph.addSignal('url', { url: 'http://evil.tld' });

    graph.reset();
    const report = graph.correlate();

    expect(report.signalCount).toBe(0);
    expect(report.isCoordinated).toBe(false);
    expect(graph.state).toBe('empty');
    expect(graph.entityCount).toBe(0);
    expect(graph.addSignal('email', {})).toBe('email_0');
    expect(onLog).toHaveBeenCalledWith('Correlation graph reset', 'info', { discardedSignals: 2 });
  });

  it('exposes nodes and edges in a snapshot', () => {
    const graph = new CorrelationGraph();
    graph.addSignal('email', { sender: 'x@evil.tld' }, '2024-05-01T09:00:00Z');
    graph.addSignal('url', { url: 'http://evil.tld/path' }, '2024-05-01T09:05:00Z');

    const { nodes, edges } = graph.snapshot();

    expect(nodes).toEqual([
      { id: 'email_0', kind: 'signal', signalType: 'email', timestamp: '2024-05-01T09:00:00.000Z' },
      { id: 'url_1', kind: 'signal', signalType: 'url', timestamp: '2024-05-01T09:05:00.000Z' },
      { id: 'domain:evil.tld', kind: 'entity', entityType: 'domain', value: 'evil.tld' },
      { id: 'sender:x@evil.tld', kind: 'entity', entityType: 'sender', value: 'x@evil.tld' },
    ]);
    expect(edges).toEqual([
      { source: 'email_0', target: 'domain:evil.tld', relation: 'has_entity' },
      { source: 'email_0', target: 'sender:x@evil.tld', relation: 'has_entity' },
      { source: 'url_1', target: 'domain:evil.tld', relation: 'has_entity' },
      { source: 'email_0', target: 'url_1', relation: 'shared_entity', entities: ['domain:evil.tld'] },
    ]);
  });

  it('records the entity ids each signal was linked to', () => {
    const graph = new CorrelationGraph({ textDomainTlds: ['xyz'] });
    const id = graph.addSignal('combined', { text: 'pay at fake-bank.xyz', url: 'http://fake-bank.xyz' });

    expect(graph.getSignal(id)?.entities).toEqual(['domain:fake-bank.xyz', 'domain_in_text:fake-bank.xyz']);
  });
});
