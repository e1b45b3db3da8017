import type { ScoreKey } from '../scores/scoreKeys.js';
import type { SignalInput, SignalInputKind } from '../schemas/signal.js';

/**
 * Detector metadata
 */
export interface DetectorMetadata {
  /** Unique detector identifier, also the key of its details blob */
  id: string;

  /** Human-readable name */
  name: string;

  description: string;

  /** Signal field the detector consumes; decides when it runs */
  input: SignalInputKind;

  /** Canonical key its score maps to */
  scoreKey: ScoreKey;

  version: string;
}

/**
 * What a detector hands back: scores under canonical or alias keys, and an
 * opaque details blob carried through to the verdict
 */
export interface DetectorOutput {
  scores: Record<string, number>;
  details: Record<string, unknown>;
}

/**
 * Detector interface - every score producer implements this
 *
 * Detectors should be deterministic for a given signal and must not touch
 * campaign state.
 */
export interface Detector {
  metadata: DetectorMetadata;
  detect(signal: SignalInput): DetectorOutput | Promise<DetectorOutput>;
}

/**
 * Detector registry - maps detector IDs to instances, in registration order
 */
export class DetectorRegistry {
  private detectors: Map<string, Detector> = new Map();

  /**
   * Register a detector
   */
  register(detector: Detector): void {
    if (this.detectors.has(detector.metadata.id)) {
      throw new Error(`Detector with ID ${detector.metadata.id} is already registered`);
    }
    this.detectors.set(detector.metadata.id, detector);
  }

  get(id: string): Detector | undefined {
    return this.detectors.get(id);
  }

  getAll(): Detector[] {
    return Array.from(this.detectors.values());
  }

  /**
   * Detectors consuming the given input kind
   */
  getForInput(input: SignalInputKind): Detector[] {
    return this.getAll().filter((detector) => detector.metadata.input === input);
  }

  getIds(): string[] {
    return Array.from(this.detectors.keys());
  }

  has(id: string): boolean {
    return this.detectors.has(id);
  }

  remove(id: string): boolean {
    return this.detectors.delete(id);
  }
}
