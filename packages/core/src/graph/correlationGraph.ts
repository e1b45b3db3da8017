import type { LogFn } from '../logging.js';
import { roundTo } from '../utils/round.js';
import { compareIsoTimestamps } from '../utils/sort.js';
import { toIsoTimestamp } from '../utils/time.js';
import {
  DEFAULT_TEXT_DOMAIN_TLDS,
  type EntityType,
  type SignalData,
  buildTextDomainPattern,
  entityId,
  extractEntities,
} from './entityExtraction.js';

export interface EntityNode {
  id: string;
  type: EntityType;
  value: string;
}

export interface SignalNode {
  id: string;
  signalType: string;
  timestamp: string;
  /** Entity ids linked at ingestion, in extraction order */
  entities: readonly string[];
}

export type TimelineEntry = SignalNode;

export interface CampaignReport {
  isCoordinated: boolean;
  connectedComponents: number;
  signalCount: number;
  /** All signals, ascending by timestamp */
  timeline: TimelineEntry[];
  /** Values of entities linked to more than one signal */
  sharedEntities: string[];
  /** Largest component size / signal count, 0-1 */
  correlationStrength: number;
  summary: string;
}

export interface GraphSnapshot {
  nodes: Array<
    | { id: string; kind: 'signal'; signalType: string; timestamp: string }
    | { id: string; kind: 'entity'; entityType: EntityType; value: string }
  >;
  edges: Array<
    | { source: string; target: string; relation: 'has_entity' }
    | { source: string; target: string; relation: 'shared_entity'; entities: string[] }
  >;
}

export type GraphState = 'empty' | 'populated';

export interface CorrelationGraphOptions {
  /** TLD allow-list for domains found in free text */
  textDomainTlds?: readonly string[];

  /** Clock for signals added without a timestamp */
  now?: () => Date;

  onLog?: LogFn;
}

/**
 * Entity Correlation Graph - one investigative session
 *
 * Signals link to the entities extracted from them (`has_entity`), and every
 * pair of signals sharing an entity is joined eagerly at ingestion
 * (`shared_entity`). State only grows until `reset()`; there is no TTL and
 * no size bound, so long-running callers must reset between sessions.
 *
 * All methods are synchronous: each `addSignal` completes on the event loop
 * before any other call observes the graph, which makes it the single writer
 * and gives `correlate()` a state consistent with the order of completed adds.
 */
export class CorrelationGraph {
  private signals: SignalNode[] = [];
  private entities = new Map<string, EntityNode>();
  private entitySignals = new Map<string, string[]>();
  private sharedEdges = new Map<string, Map<string, string[]>>();
  private readonly textPattern: RegExp | null;
  private readonly now: () => Date;
  private readonly onLog?: LogFn;

  constructor(options: CorrelationGraphOptions = {}) {
    this.textPattern = buildTextDomainPattern(options.textDomainTlds ?? DEFAULT_TEXT_DOMAIN_TLDS);
    this.now = options.now ?? (() => new Date());
    this.onLog = options.onLog;
  }

  get state(): GraphState {
    return this.signals.length === 0 ? 'empty' : 'populated';
  }

  get signalCount(): number {
    return this.signals.length;
  }

  get entityCount(): number {
    return this.entities.size;
  }

  getSignal(signalId: string): SignalNode | undefined {
    return this.signals.find((signal) => signal.id === signalId);
  }

  /**
   * Ingest one signal and link it to every earlier signal sharing an entity.
   *
   * @param signalType - tag such as 'email', 'url' or 'combined'
   * @param data - fields to extract entities from
   * @param timestamp - any parseable date, stored as UTC ISO-8601; defaults to now
   * @returns the new signal id
   * @throws Error when the timestamp cannot be parsed
   */
  addSignal(signalType: string, data: SignalData, timestamp?: string): string {
    const stamped = timestamp === undefined ? this.now().toISOString() : toIsoTimestamp(timestamp);
    if (stamped === undefined) {
      throw new Error(`Invalid signal timestamp: ${timestamp}`);
    }

    const signalId = `${signalType}_${this.signals.length}`;
    const extracted = extractEntities(data, this.textPattern);
    const linked: string[] = [];

    for (const entity of extracted) {
      const id = entityId(entity);
      if (!this.entities.has(id)) {
        this.entities.set(id, { id, type: entity.type, value: entity.value });
      }

      const members = this.entitySignals.get(id) ?? [];
      for (const other of members) {
        this.linkSignals(other, signalId, id);
      }
      members.push(signalId);
      this.entitySignals.set(id, members);
      linked.push(id);
    }

    this.signals.push({
      id: signalId,
      signalType,
      timestamp: stamped,
      entities: linked,
    });

    this.onLog?.('Signal added to correlation graph', 'info', {
      signalId,
      entities: linked,
    });

    return signalId;
  }

  /**
   * Recompute the campaign report from the current graph
   */
  correlate(): CampaignReport {
    const signalCount = this.signals.length;
    if (signalCount === 0) {
      return {
        isCoordinated: false,
        connectedComponents: 0,
        signalCount: 0,
        timeline: [],
        sharedEntities: [],
        correlationStrength: 0,
        summary: 'No signals analysed yet.',
      };
    }

    const components = this.signalComponents();
    const largest = Math.max(...components.map((component) => component.length));
    const isCoordinated = signalCount > 1 && largest === signalCount;
    const correlationStrength = roundTo(largest / signalCount, 2);

    const timeline = [...this.signals]
      .sort((a, b) => compareIsoTimestamps(a.timestamp, b.timestamp))
      .map((signal) => ({ ...signal, entities: [...signal.entities] }));

    const sharedEntities = this.sharedEntityValues();

    const summary = isCoordinated
      ? `COORDINATED CAMPAIGN DETECTED: ${signalCount} signals share ` +
        `${plural(sharedEntities.length, 'common entity', 'common entities')} ` +
        `(${sharedEntities.slice(0, 5).join(', ')}).`
      : `${plural(signalCount, 'independent signal', 'independent signals')} detected across ` +
        `${plural(components.length, 'disconnected component', 'disconnected components')}.`;

    return {
      isCoordinated,
      connectedComponents: components.length,
      signalCount,
      timeline,
      sharedEntities,
      correlationStrength,
      summary,
    };
  }

  /**
   * Nodes and edges of the whole graph, for visualization
   */
  snapshot(): GraphSnapshot {
    const nodes: GraphSnapshot['nodes'] = [
      ...this.signals.map((signal) => ({
        id: signal.id,
        kind: 'signal' as const,
        signalType: signal.signalType,
        timestamp: signal.timestamp,
      })),
      ...[...this.entities.values()].map((entity) => ({
        id: entity.id,
        kind: 'entity' as const,
        entityType: entity.type,
        value: entity.value,
      })),
    ];

    const edges: GraphSnapshot['edges'] = [];
    for (const signal of this.signals) {
      for (const entity of signal.entities) {
        edges.push({ source: signal.id, target: entity, relation: 'has_entity' });
      }
    }
    const order = new Map(this.signals.map((signal, index) => [signal.id, index]));
    for (const [source, neighbours] of this.sharedEdges) {
      for (const [target, entities] of neighbours) {
        if ((order.get(source) ?? 0) < (order.get(target) ?? 0)) {
          edges.push({ source, target, relation: 'shared_entity', entities: [...entities] });
        }
      }
    }

    return { nodes, edges };
  }

  /**
   * Discard every node and edge; the next signal starts a fresh session
   */
  reset(): void {
    const discarded = this.signals.length;
    this.signals = [];
    this.entities = new Map();
    this.entitySignals = new Map();
    this.sharedEdges = new Map();
    this.onLog?.('Correlation graph reset', 'info', { discardedSignals: discarded });
  }

  private linkSignals(a: string, b: string, entity: string): void {
    for (const [from, to] of [
      [a, b],
      [b, a],
    ]) {
      const neighbours = this.sharedEdges.get(from) ?? new Map<string, string[]>();
      const via = neighbours.get(to) ?? [];
      if (!via.includes(entity)) via.push(entity);
      neighbours.set(to, via);
      this.sharedEdges.set(from, neighbours);
    }
  }

  /**
   * Connected components of the signal-only subgraph, via shared_entity edges
   */
  private signalComponents(): string[][] {
    const visited = new Set<string>();
    const components: string[][] = [];

    for (const signal of this.signals) {
      if (visited.has(signal.id)) continue;
      const component: string[] = [];
      const queue = [signal.id];
      visited.add(signal.id);

      while (queue.length > 0) {
        const current = queue.shift();
        if (current === undefined) break;
        component.push(current);
        for (const neighbour of this.sharedEdges.get(current)?.keys() ?? []) {
          if (!visited.has(neighbour)) {
            visited.add(neighbour);
            queue.push(neighbour);
          }
        }
      }
      components.push(component);
    }

    return components;
  }

  private sharedEntityValues(): string[] {
    const values: string[] = [];
    for (const [id, entity] of this.entities) {
      const members = this.entitySignals.get(id) ?? [];
      if (members.length > 1 && !values.includes(entity.value)) {
        values.push(entity.value);
      }
    }
    return values;
  }
}

function plural(count: number, singular: string, pluralForm: string): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}
