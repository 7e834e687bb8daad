/**
 * ClimbSession - one climbing attempt, from frames to assessment
 *
 * Owns everything that is per-attempt: the landmark buffer (and its motion
 * event detector), the tension analyzer and the logger. Only frozen
 * configuration and templates are shared with other sessions.
 *
 * Frames are appended as they arrive; nothing is scored until complete().
 * After that the session is closed and appending throws.
 */

import { BehaviorSubject, type Observable } from 'rxjs';
import type { AnalysisConfig, AnalysisConfigOverrides } from '../config/analysisConfig';
import { resolveAnalysisConfig } from '../config/analysisConfig';
import type { ScoringConfig } from '../config/scoringConfig';
import { DEFAULT_SCORING_CONFIG } from '../config/scoringConfig';
import { EmptySessionError, SessionStateError } from '../errors';
import { TensionAnalyzer } from '../analyzers/TensionAnalyzer';
import { extractAll } from '../features';
import { LandmarkBuffer } from '../models/LandmarkBuffer';
import { aggregate } from '../scoring/Aggregator';
import { Scorer } from '../scoring/Scorer';
import { SwotSynthesizer } from '../swot/SwotSynthesizer';
import { DEFAULT_TEMPLATES } from '../templates/TemplateResolver';
import type { AssessmentReport, Diagnostic, TechniqueProfile } from '../types/assessment';
import { CATEGORIES } from '../types/assessment';
import type { MotionEvent } from '../types/motion';
import type { JointName, JointSample, PoseFrame } from '../types/pose';
import type { TemplateLoadResult } from '../types/templates';
import { deepFreeze } from '../utils/deepFreeze';
import type { Logger } from '../utils/logger';
import { createLogger } from '../utils/logger';

export type ClimbSessionState =
  | { type: 'collecting'; frames: number }
  | { type: 'complete'; report: AssessmentReport };

export interface ClimbSessionOptions {
  analysis?: AnalysisConfigOverrides;
  scoring?: ScoringConfig;
  /** Result of loadTemplateSet(); its warnings are carried into the report */
  templates?: TemplateLoadResult;
  logger?: Logger;
}

export class ClimbSession {
  private readonly config: AnalysisConfig;
  private readonly scoring: ScoringConfig;
  private readonly templates: TemplateLoadResult;
  private readonly log: Logger;

  private readonly buffer: LandmarkBuffer;
  private readonly tension: TensionAnalyzer;
  private readonly stateSubject: BehaviorSubject<ClimbSessionState>;

  private offered = 0;
  private report: AssessmentReport | null = null;

  constructor(options: ClimbSessionOptions = {}) {
    this.config = resolveAnalysisConfig(options.analysis);
    this.scoring = options.scoring ?? DEFAULT_SCORING_CONFIG;
    this.templates = options.templates ?? DEFAULT_TEMPLATES;
    this.log = options.logger ?? createLogger({ component: 'ClimbSession' });

    this.buffer = new LandmarkBuffer({
      buffer: this.config.buffer,
      detection: this.config.detection,
      logger: this.log,
    });
    this.tension = new TensionAnalyzer(this.config.tension);
    this.stateSubject = new BehaviorSubject<ClimbSessionState>({ type: 'collecting', frames: 0 });
  }

  get state(): ClimbSessionState {
    return this.stateSubject.getValue();
  }

  get state$(): Observable<ClimbSessionState> {
    return this.stateSubject.asObservable();
  }

  /**
   * Motion events as they are detected; completes with the session.
   */
  get motionEvents$(): Observable<MotionEvent> {
    return this.buffer.events$;
  }

  isComplete(): boolean {
    return this.report !== null;
  }

  /**
   * Offer one frame. Returns false if the buffer dropped it.
   *
   * @throws SessionStateError once the session is complete
   */
  append(frame: PoseFrame): boolean {
    if (this.report) {
      throw new SessionStateError(
        `Cannot append frame ${frame.frameIndex}: session is already complete`
      );
    }

    this.offered++;
    const accepted = this.buffer.append(frame);
    if (accepted) {
      const skeleton = this.buffer.latestSkeleton();
      if (skeleton) this.tension.update(skeleton);
      this.stateSubject.next({ type: 'collecting', frames: this.buffer.acceptedFrames });
    }
    return accepted;
  }

  window(joint: JointName, duration: number): JointSample[] {
    return this.buffer.window(joint, duration);
  }

  /**
   * Score the session and build the report. Calling it again returns the
   * same report.
   *
   * @throws EmptySessionError if no frame was ever appended
   */
  complete(): AssessmentReport {
    if (this.report) return this.report;
    if (this.offered === 0) {
      throw new EmptySessionError();
    }

    this.buffer.finalize();

    const outcomes = extractAll(this.buffer, this.config.features);
    const metrics = new Scorer(this.scoring).scoreAll(outcomes);
    const profile: TechniqueProfile = { metrics, ...aggregate(metrics, this.scoring) };
    const tension = this.tension.getEvents();

    const synthesizer = new SwotSynthesizer({
      templates: this.templates.templates,
      scoring: this.scoring,
      logger: this.log,
    });
    const { swot, diagnostics: renderDiagnostics } = synthesizer.synthesize(metrics, tension);

    const insufficient: Diagnostic[] = [];
    for (const category of CATEGORIES) {
      const metric = metrics[category];
      if (metric?.status !== 'insufficient') continue;
      insufficient.push({ kind: 'insufficient-data', category, reason: metric.reason });
      this.log.debug(`${category} not scored: ${metric.reason}`, { action: 'complete' });
    }

    const report = deepFreeze<AssessmentReport>({
      profile,
      swot,
      tension,
      diagnostics: [
        ...this.templates.warnings,
        ...this.buffer.getDiagnostics(),
        ...insufficient,
        ...renderDiagnostics,
      ],
      frames: { accepted: this.buffer.acceptedFrames, dropped: this.buffer.droppedFrames },
    });

    this.report = report;
    this.log.info(
      `Assessed ${report.frames.accepted} frames: overall ${
        profile.overallScore === null ? 'n/a' : profile.overallScore.toFixed(1)
      }, grade ${profile.grade}`,
      { action: 'complete' }
    );
    this.stateSubject.next({ type: 'complete', report });
    this.stateSubject.complete();
    return report;
  }
}
