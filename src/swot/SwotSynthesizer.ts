/**
 * SWOT Synthesizer
 *
 * Turns scored metrics and tension events into the four narrative lists.
 * Fully deterministic: the same metrics, events and templates always give
 * the same report. Every sort is stable, so ties keep category (or rule)
 * declaration order.
 *
 * 1. Strengths: metrics in their top bucket with a strength text, best first
 * 2. Weaknesses: metrics below the weakness cutoff with a weakness text, worst first
 * 3. Opportunities: one per weakness, in weakness order, when its rule's inputs exist
 * 4. Threats: every condition rule that fires, most severe first
 */

import type { ScoringConfig } from '../config/scoringConfig';
import { DEFAULT_SCORING_CONFIG } from '../config/scoringConfig';
import { DEFAULT_TEMPLATE_SET } from '../templates/TemplateResolver';
import { renderTemplate } from '../templates/renderTemplate';
import { CONDITION_CHECKS, evaluateOpportunity } from '../templates/rules';
import type {
  Category,
  Diagnostic,
  MetricOutcome,
  MetricResult,
  RawValues,
  SwotItem,
  SwotReport,
  TensionEvent,
} from '../types/assessment';
import { CATEGORIES } from '../types/assessment';
import type { TemplateSet } from '../types/templates';
import type { Logger } from '../utils/logger';
import { createLogger } from '../utils/logger';

export type PlaceholderWarning = Extract<Diagnostic, { kind: 'placeholder-substitution' }>;

export interface SwotResult {
  swot: SwotReport;
  diagnostics: PlaceholderWarning[];
}

export interface SwotSynthesizerOptions {
  templates?: TemplateSet;
  scoring?: ScoringConfig;
  logger?: Logger;
}

export class SwotSynthesizer {
  private readonly templates: TemplateSet;
  private readonly scoring: ScoringConfig;
  private readonly log: Logger;

  constructor(options: SwotSynthesizerOptions = {}) {
    this.templates = options.templates ?? DEFAULT_TEMPLATE_SET;
    this.scoring = options.scoring ?? DEFAULT_SCORING_CONFIG;
    this.log = options.logger ?? createLogger({ component: 'SwotSynthesizer' });
  }

  synthesize(
    metrics: Partial<Record<Category, MetricOutcome>>,
    tension: readonly TensionEvent[]
  ): SwotResult {
    const diagnostics: PlaceholderWarning[] = [];
    const render = (source: string, template: string, values: RawValues): string => {
      const { text, missing } = renderTemplate(template, values);
      for (const placeholder of missing) {
        diagnostics.push({ kind: 'placeholder-substitution', source, placeholder });
        this.log.warnOnce(
          `placeholder:${source}:${placeholder}`,
          `No value for {${placeholder}} in ${source}, using the template as written`,
          { action: 'render' }
        );
      }
      return text;
    };

    const scored = CATEGORIES.flatMap((category) => {
      const metric = metrics[category];
      return metric?.status === 'scored' ? [metric] : [];
    });

    const strengths = this.strengths(scored, render);
    const weaknesses = this.weaknesses(scored, render);
    const opportunities = this.opportunities(weaknesses, scored, render);
    const threats = this.threats(metrics, tension, render);

    return { swot: { strengths, weaknesses, opportunities, threats }, diagnostics };
  }

  private textFor(metric: MetricResult, field: 'strength' | 'weakness'): string | undefined {
    return this.templates.metrics[metric.name][metric.level]?.[field];
  }

  private strengths(scored: MetricResult[], render: Renderer): SwotItem[] {
    const items: SwotItem[] = [];
    for (const metric of scored) {
      const topLevel = this.scoring.rules[metric.name].buckets[0]?.level;
      const template = this.textFor(metric, 'strength');
      if (metric.level !== topLevel || template === undefined) continue;
      items.push({
        source: metric.name,
        value: metric.score,
        text: render(metric.name, template, metricValues(metric)),
      });
    }
    return items.sort((a, b) => b.value - a.value).slice(0, this.scoring.limits.strengths);
  }

  private weaknesses(scored: MetricResult[], render: Renderer): SwotItem[] {
    const items: SwotItem[] = [];
    for (const metric of scored) {
      const template = this.textFor(metric, 'weakness');
      if (metric.score >= this.scoring.weaknessCutoff || template === undefined) continue;
      items.push({
        source: metric.name,
        value: metric.score,
        text: render(metric.name, template, metricValues(metric)),
      });
    }
    return items.sort((a, b) => a.value - b.value).slice(0, this.scoring.limits.weaknesses);
  }

  private opportunities(
    weaknesses: SwotItem[],
    scored: MetricResult[],
    render: Renderer
  ): SwotItem[] {
    const items: SwotItem[] = [];
    for (const weakness of weaknesses) {
      if (items.length >= this.scoring.limits.opportunities) break;
      const metric = scored.find((m) => m.name === weakness.source);
      const rule = this.templates.opportunityRules.find((r) => r.id === weakness.source);
      if (!metric || !rule) continue;

      const score = Math.round(metric.score);
      const result = evaluateOpportunity(metric.name, score, metric.raw);
      if (!result.ok) {
        this.log.debug(`Skipping ${rule.id} opportunity, missing ${result.missing.join(', ')}`, {
          action: 'opportunities',
        });
        continue;
      }
      items.push({
        source: rule.id,
        value: metric.score,
        text: render(`opportunity:${rule.id}`, rule.text, {
          ...metricValues(metric),
          ...result.values,
        }),
      });
    }
    return items;
  }

  private threats(
    metrics: Partial<Record<Category, MetricOutcome>>,
    tension: readonly TensionEvent[],
    render: Renderer
  ): SwotItem[] {
    const exhaustion = metrics.exhaustion;
    const inputs = {
      tension,
      exhaustionPercent: exhaustion?.status === 'scored' ? exhaustion.value : null,
    };

    const items: SwotItem[] = [];
    for (const rule of this.templates.conditionRules) {
      const check = CONDITION_CHECKS[rule.id];
      if (!check) continue;
      const finding = check(inputs, rule.threshold);
      if (!finding) continue;
      items.push({
        source: rule.id,
        value: finding.severity,
        text: render(`threat:${rule.id}`, rule.text, {
          ...finding.values,
          side: this.templates.sideLabels[finding.side],
        }),
      });
    }
    return items.sort((a, b) => b.value - a.value).slice(0, this.scoring.limits.threats);
  }
}

type Renderer = (source: string, template: string, values: RawValues) => string;

function metricValues(metric: MetricResult): RawValues {
  return { ...metric.raw, score: Math.round(metric.score) };
}
