import { CorrelationGraph, type CorrelationGraphOptions } from '@riskweave/core';

export const DEFAULT_SESSION = 'default';

/**
 * Named campaign sessions, each owning its own CorrelationGraph.
 *
 * Graphs are created on first write. Reads of an unknown session see an
 * empty graph without creating one.
 */
export class SessionRegistry {
  private readonly graphs = new Map<string, CorrelationGraph>();
  private readonly emptyGraph: CorrelationGraph;

  constructor(private readonly graphOptions: CorrelationGraphOptions = {}) {
    this.emptyGraph = new CorrelationGraph(graphOptions);
  }

  /**
   * Graph for `id`, created if missing
   */
  acquire(id: string): CorrelationGraph {
    let graph = this.graphs.get(id);
    if (!graph) {
      graph = new CorrelationGraph(this.graphOptions);
      this.graphs.set(id, graph);
    }
    return graph;
  }

  /**
   * Graph for `id`, or an empty one when the session does not exist
   */
  view(id: string): CorrelationGraph {
    return this.graphs.get(id) ?? this.emptyGraph;
  }

  /**
   * Reset a session's graph; returns the number of signals discarded
   */
  reset(id: string): number {
    const graph = this.graphs.get(id);
    if (!graph) return 0;
    const discarded = graph.signalCount;
    graph.reset();
    return discarded;
  }

  ids(): string[] {
    return [...this.graphs.keys()];
  }
}
