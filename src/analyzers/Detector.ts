// Detector.ts - contract shared by every rule in the detection pipeline

import type { ChatMessage, SecurityProfile } from '../types/Security.types';
import type { ViolationFinding } from '../domain/models/Violation';
import type { DetectorFailure } from '../domain/errors/SecurityErrors';
import type { SlidingWindowEntry } from '../systems/SlidingWindowTracker';

/**
 * Read-only view of the caller's window, already holding the current message.
 */
export interface WindowView {
  countMatching(fingerprint: string, windowMs: number): number;
  countRecent(windowMs: number): number;
  recent(windowMs: number): SlidingWindowEntry[];
  readonly current: SlidingWindowEntry;
}

export interface DetectionContext {
  readonly message: ChatMessage;
  readonly profile: SecurityProfile;
  readonly window: WindowView;
}

export interface Detector {
  readonly name: string;
  /** Overrides the pipeline's detectorTimeoutMs for this detector. */
  readonly timeoutMs?: number;
  detect(context: DetectionContext): ViolationFinding | null | Promise<ViolationFinding | null>;
}

export type DetectorResult =
  | { ok: true; detector: string; finding: ViolationFinding | null }
  | { ok: false; detector: string; error: DetectorFailure };
