/**
 * Navigation Collaborator Contracts
 *
 * Shapes shared by the probe, the click orchestrator, the states and the
 * engine, plus the interfaces of the external collaborators they consume
 * (screen capture, template scoring, template loading, input injection).
 */

import type { Transition } from '../models/transition';

// ============================================================================
// Geometry & Rasters
// ============================================================================

export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

/** Rectangular search area in screen coordinates */
export interface Region extends Point, Size {}

/**
 * Single-channel (grayscale) image, row-major, one byte per pixel.
 */
export interface Raster extends Size {
  data: Uint8Array;
}

// ============================================================================
// Collaborators
// ============================================================================

export interface ScreenCaptureProvider {
  /** Capture the full display as a grayscale raster. Rejects with CaptureError. */
  captureScreen(): Promise<Raster>;
}

export interface TemplateScore {
  /** Top-left corner of the best match inside the screen raster */
  position: Point;
  /** Normalised score in [0, 1] */
  confidence: number;
}

export interface TemplateScorer {
  /** Pure and deterministic for identical inputs */
  score(screen: Raster, template: Raster): TemplateScore;
}

export interface TemplateLoader {
  /** Resolve a template id to a raster. Rejects with TemplateLoadError. */
  loadTemplate(templateId: string): Promise<Raster>;
}

export type MouseButton = 'left' | 'right' | 'middle';

/**
 * Pointer and key injection. Each call reports success; implementations may
 * also throw, callers treat both the same way.
 */
export interface InputInjector {
  movePointer(x: number, y: number, durationMs: number): Promise<boolean>;
  click(button?: MouseButton): Promise<boolean>;
  pressKey(key: string, durationMs?: number): Promise<boolean>;
}

// ============================================================================
// Probe results
// ============================================================================

export interface MatchResult {
  found: boolean;
  /** Centre of the match in screen coordinates; present iff found */
  position?: Point;
  /** Score of the deciding poll, not a running maximum */
  confidence: number;
  templateSize: Size;
  elapsedMs: number;
  /** Capture+score evaluations performed */
  polls: number;
  /** The probe stopped early because a stop was requested */
  cancelled: boolean;
}

export interface ProbeOptions {
  timeoutMs?: number;
  checkIntervalMs?: number;
  threshold?: number;
  region?: Region;
  signal?: AbortSignal;
}

export interface FindAndClickOptions {
  retries?: number;
  clickOffset?: Point;
  /** Per-probe timeout override */
  timeoutMs?: number;
  signal?: AbortSignal;
}

// ============================================================================
// Run results
// ============================================================================

export type RunOutcome = 'completed' | 'aborted' | 'interrupted';

export type AbortReason = 'stuck_loop' | 'stop_requested';

export interface RunOptions {
  initialState?: string;
  maxIterations?: number;
}

export interface RunResult {
  outcome: RunOutcome;
  reason?: AbortReason;
  /** State executions performed */
  iterations: number;
  /** State that would have run next; absent when the run completed */
  finalState?: string;
  /** The last transition was a normal terminal end */
  terminalReached: boolean;
  durationMs: number;
  transitions: Transition[];
}
