import { DEFAULT_CONFIG } from '../config.js';
import { LogicalTime } from '../model.js';
import { createLogger } from '../util/logger.js';
import { deltaMs } from '../util/time.js';

const log = createLogger('clock');

/** One reading of the external playback clock. Times are in seconds. */
export interface ClockSample {
  /** Wall-clock instant the reading was taken at. */
  wallTime: number;
  /** Playback position reported by the video source. */
  reading: number;
  isPaused: boolean;
  /** Set by the source when the user scrubbed or jumped explicitly. */
  seek?: boolean;
  /** Playback rate reported by the source, when it knows it. */
  rate?: number;
}

/** A backward jump of the external clock that was not flagged as a seek. */
export interface ClockRegressionEvent {
  wallTime: number;
  from: LogicalTime;
  to: LogicalTime;
}

export interface ClockAdapterOptions {
  seekThresholdMs?: number;
}

interface Anchor {
  wallTime: number;
  reading: number;
  logical: LogicalTime;
  paused: boolean;
}

// First sample at which the reading changed since the last seek, pause or
// explicit rate. Readings of frame-counted sources only move on frame
// boundaries, so the rate is measured between such changes.
interface RateOrigin {
  wallTime: number;
  reading: number;
}

/**
 * Maps the external playback clock onto the logical timeline.
 *
 * Pauses freeze logical time, seeks pass through as jumps, and the playback
 * rate is tracked so that input events arriving between two samples can be
 * placed by extrapolation (`at`). Extrapolation never runs further than the
 * last reading step. Nothing already handed out is rewritten.
 */
export class ClockAdapter {
  private readonly seekThresholdMs: number;
  private anchor: Anchor | null = null;
  private rate = 1;
  private rateOrigin: RateOrigin | null = null;
  private step: number | undefined;
  private seeks = 0;
  private regressionLog: ClockRegressionEvent[] = [];

  constructor(opts: ClockAdapterOptions = {}) {
    this.seekThresholdMs = typeof opts.seekThresholdMs === 'number' ? opts.seekThresholdMs : DEFAULT_CONFIG.seekThresholdMs;
  }

  advance(sample: ClockSample): LogicalTime {
    const reading = Math.max(0, Number.isFinite(sample.reading) ? sample.reading : 0);
    const prev = this.anchor;

    if (!prev) {
      this.rate = validRate(sample.rate) ?? 1;
      this.anchor = { wallTime: sample.wallTime, reading, logical: reading, paused: sample.isPaused };
      return reading;
    }

    const elapsed = Math.max(0, sample.wallTime - prev.wallTime);
    const expected = prev.paused ? prev.logical : prev.logical + elapsed * this.rate;
    const backwards = deltaMs(reading, prev.logical) < 0;
    const drift = Math.abs(deltaMs(reading, expected));
    const jumped = sample.seek === true || backwards || drift > this.seekThresholdMs;

    let logical: LogicalTime;
    if (jumped) {
      logical = reading;
      this.seeks++;
      this.rate = validRate(sample.rate) ?? 1;
      this.rateOrigin = null;
      this.step = undefined;
      if (backwards && sample.seek !== true) {
        const ev: ClockRegressionEvent = { wallTime: sample.wallTime, from: prev.logical, to: reading };
        this.regressionLog.push(ev);
        log.warn(`Clock regressed from ${prev.logical}s to ${reading}s without a seek; treating as a backward seek`);
      } else {
        log.debug(`Seek from ${prev.logical}s to ${reading}s`);
      }
    } else if (sample.isPaused) {
      // frozen at the position playback stopped at
      logical = prev.paused ? prev.logical : reading;
      this.rateOrigin = null;
    } else {
      logical = reading;
      const explicit = validRate(sample.rate);
      if (explicit !== undefined) {
        this.rate = explicit;
        this.rateOrigin = null;
      } else if (!prev.paused && reading !== prev.reading) {
        this.estimateRate(sample.wallTime, reading);
      }
      if (!prev.paused && reading > prev.reading) this.step = reading - prev.reading;
    }

    this.anchor = { wallTime: sample.wallTime, reading, logical, paused: sample.isPaused };
    return logical;
  }

  /**
   * Logical time of a wall-clock instant, extrapolated from the last sample.
   * Never earlier than the last sample's logical time.
   */
  at(wallTime: number): LogicalTime {
    const a = this.anchor;
    if (!a) return 0;
    if (a.paused) return a.logical;
    const elapsed = Math.max(0, wallTime - a.wallTime);
    const ahead = elapsed * this.rate;
    return a.logical + (this.step === undefined ? ahead : Math.min(ahead, this.step));
  }

  now(): LogicalTime {
    return this.anchor ? this.anchor.logical : 0;
  }

  isPaused(): boolean {
    return this.anchor ? this.anchor.paused : false;
  }

  currentRate(): number {
    return this.rate;
  }

  seekCount(): number {
    return this.seeks;
  }

  regressions(): readonly ClockRegressionEvent[] {
    return [...this.regressionLog];
  }

  /** Explicit restart: the timeline starts again from zero. */
  restart(): void {
    this.anchor = null;
    this.rate = 1;
    this.rateOrigin = null;
    this.step = undefined;
    this.seeks = 0;
    this.regressionLog = [];
  }

  private estimateRate(wallTime: number, reading: number): void {
    const origin = this.rateOrigin;
    if (!origin) {
      this.rateOrigin = { wallTime, reading };
      return;
    }
    if (wallTime > origin.wallTime) this.rate = (reading - origin.reading) / (wallTime - origin.wallTime);
  }
}

function validRate(rate: number | undefined): number | undefined {
  return typeof rate === 'number' && Number.isFinite(rate) && rate >= 0 ? rate : undefined;
}

/** Seconds for a frame index of a frame-counted clock source. */
export function frameToSeconds(frame: number, fps: number): number {
  if (!(fps > 0)) throw new RangeError(`fps must be positive, got ${fps}`);
  return frame / fps;
}

export default ClockAdapter;
