import { ClockAdapter, ClockRegressionEvent, ClockSample } from '../clock/clockAdapter.js';
import { DEFAULT_CONFIG, DojoConfig } from '../config.js';
import { MatchFeedback, MatchingEngine } from '../matching/matchingEngine.js';
import { LogicalTime, MatchOutcome, Pattern, RawInputEvent, Recording } from '../model.js';
import { EventRecorder } from '../recorder/eventRecorder.js';
import { score, ScoreReport } from '../scoring/scoringEngine.js';
import { createLogger } from '../util/logger.js';
import { EventBus } from './event-bus.js';
import { SessionQueue } from './queue.js';

const log = createLogger('session');

export interface TrainingSessionOptions {
  sourceId?: string;
  /** Reference pattern; without one the session only records. */
  pattern?: Pattern;
  config?: DojoConfig;
  bus?: EventBus;
  totalDuration?: LogicalTime;
  createdAt?: string;
}

export interface SessionResult {
  recording: Recording;
  outcome?: MatchOutcome;
  report?: ScoreReport;
  regressions: readonly ClockRegressionEvent[];
  cancelled: boolean;
}

type SessionMessage =
  | { kind: 'tick'; sample: ClockSample }
  | { kind: 'input'; raw: RawInputEvent };

/**
 * One practice run. Clock ticks and input events are enqueued by their
 * producers and applied by a single consumer (`run`), which owns the clock
 * adapter, the recorder and the matching engine.
 */
export class TrainingSession {
  readonly bus: EventBus;
  private readonly pattern: Pattern | undefined;
  private readonly config: DojoConfig;
  private readonly queue = new SessionQueue<SessionMessage>();
  private readonly clock: ClockAdapter;
  private readonly recorder: EventRecorder;
  private readonly engine: MatchingEngine | null;
  private reportedRegressions = 0;
  private cancelRequested = false;
  private running: Promise<SessionResult> | null = null;

  constructor(opts: TrainingSessionOptions = {}) {
    this.pattern = opts.pattern;
    this.config = opts.config ?? DEFAULT_CONFIG;
    this.bus = opts.bus ?? new EventBus();
    this.clock = new ClockAdapter({ seekThresholdMs: this.config.seekThresholdMs });
    this.recorder = new EventRecorder({
      sourceId: opts.sourceId ?? opts.pattern?.sourceId,
      totalDuration: opts.totalDuration ?? (opts.pattern && opts.pattern.totalDuration > 0 ? opts.pattern.totalDuration : undefined),
      ignoreKeys: this.config.ignoreKeys,
      createdAt: opts.createdAt,
    });
    this.engine = opts.pattern
      ? new MatchingEngine(opts.pattern, { keyRepeatPolicy: this.config.keyRepeatPolicy, gradeRatios: this.config.gradeRatios })
      : null;
  }

  /** Enqueue a clock sample. Returns false once the session is ending. */
  tick(sample: ClockSample): boolean {
    return this.queue.push({ kind: 'tick', sample });
  }

  /** Enqueue an input event. Returns false once the session is ending. */
  input(raw: RawInputEvent): boolean {
    return this.queue.push({ kind: 'input', raw });
  }

  /** End normally after everything already queued has been applied. */
  stop(): void {
    this.queue.close();
  }

  /** End now: queued messages are discarded and no score is produced. */
  cancel(): void {
    this.cancelRequested = true;
    this.queue.close();
  }

  /** Drain the queue until `stop()` or `cancel()`. Calling it again returns the same promise. */
  run(): Promise<SessionResult> {
    if (!this.running) this.running = this.consume();
    return this.running;
  }

  private async consume(): Promise<SessionResult> {
    for await (const msg of this.queue) {
      if (this.cancelRequested) break;
      if (msg.kind === 'tick') this.applyTick(msg.sample);
      else this.applyInput(msg.raw);
    }
    return this.cancelRequested ? this.abort() : this.complete();
  }

  private applyTick(sample: ClockSample): void {
    const time = this.clock.advance(sample);
    const regressions = this.clock.regressions();
    for (const regression of regressions.slice(this.reportedRegressions)) {
      this.bus.emit('clock:regression', { regression });
    }
    this.reportedRegressions = regressions.length;
    this.recorder.observe(time);
    if (this.engine) this.publish(this.engine.advanceTo(time));
  }

  private applyInput(raw: RawInputEvent): void {
    const time = this.clock.at(raw.wallTime);
    const outcome = this.recorder.record(raw, time);
    if (outcome.kind === 'dropped') {
      this.bus.emit('recorder:anomaly', { anomaly: outcome.anomaly });
    } else if (outcome.kind === 'recorded' && this.engine) {
      this.publish(this.engine.receive(outcome.event));
    }
  }

  private publish(feedback: readonly MatchFeedback[]): void {
    for (const fb of feedback) {
      if (fb.kind === 'hit') this.bus.emit('feedback:hit', fb);
      else if (fb.kind === 'miss') this.bus.emit('feedback:miss', fb);
      else this.bus.emit('feedback:extra', fb);
    }
  }

  private complete(): SessionResult {
    const recording = this.recorder.finalize();
    const result: SessionResult = { recording, regressions: this.clock.regressions(), cancelled: false };
    if (this.engine && this.pattern) {
      const outcome = this.engine.finish();
      result.outcome = outcome;
      result.report = score(this.pattern, outcome, { penaltyPerExtra: this.config.penaltyPerExtra });
      log.info(`Session finished: ${result.report.hits}/${this.pattern.actions.length} hits, score ${result.report.totalScore}`);
    } else {
      log.info(`Session finished: recorded ${recording.events.length} events`);
    }
    this.bus.emit('session:finished', { result });
    return result;
  }

  private abort(): SessionResult {
    const recording = this.recorder.finalize();
    this.engine?.cancel();
    const result: SessionResult = { recording, regressions: this.clock.regressions(), cancelled: true };
    log.info(`Session cancelled with ${recording.events.length} recorded events`);
    this.bus.emit('session:cancelled', { result });
    return result;
  }
}

export default TrainingSession;
