import { resolve } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { TensionEvent } from '../types/assessment';
import {
  DEFAULT_TEMPLATES,
  DEFAULT_TEMPLATE_SET,
  loadTemplateSet,
  resolveTemplateSet,
} from './TemplateResolver';
import { placeholdersOf, renderTemplate } from './renderTemplate';
import { CONDITION_CHECKS, evaluateOpportunity, flaggedSide } from './rules';

const fixture = (name: string) => resolve(__dirname, '__fixtures__', name);

describe('renderTemplate', () => {
  it('fills every placeholder', () => {
    expect(renderTemplate('Hips {score}% ({angle}°), {score} again', { score: 80, angle: 10 })).toEqual({
      text: 'Hips 80% (10°), 80 again',
      missing: [],
    });
  });

  it('returns the template as written when a value is missing', () => {
    expect(renderTemplate('A {x} {y} {x} {z}', { x: 1 })).toEqual({
      text: 'A {x} {y} {x} {z}',
      missing: ['y', 'z'],
    });
  });

  it('leaves text without placeholders alone', () => {
    expect(renderTemplate('Smooth hands.', {}).text).toBe('Smooth hands.');
  });

  it('lists placeholders once in order', () => {
    expect(placeholdersOf('{side} {count} {side} {diagonal_ratio}')).toEqual([
      'side',
      'count',
      'diagonal_ratio',
    ]);
  });
});

describe('TemplateResolver', () => {
  let warnSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('uses the defaults without a path', () => {
    const result = loadTemplateSet();
    expect(result).toBe(DEFAULT_TEMPLATES);
    expect(result.source).toBe('default');
    expect(result.warnings).toEqual([]);
  });

  it('falls back to the defaults when the file is missing', () => {
    const result = loadTemplateSet(fixture('does-not-exist.json'));

    expect(result.templates).toBe(DEFAULT_TEMPLATE_SET);
    expect(result.warnings).toEqual([]);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith(
      expect.stringContaining('[TemplateResolver] (load) Cannot read')
    );
  });

  it('falls back to the defaults when the file is not valid JSON', () => {
    const result = loadTemplateSet(fixture('broken-templates.json'));

    expect(result.templates).toBe(DEFAULT_TEMPLATE_SET);
    expect(warnSpy).toHaveBeenCalledWith(
      expect.stringContaining('[TemplateResolver] (load) Cannot parse')
    );
  });

  it('validates each entry on its own', () => {
    const result = loadTemplateSet(fixture('custom-templates.json'));
    const { templates } = result;

    expect(result.source).toBe('file');
    expect(result.warnings).toEqual([
      { kind: 'template-resolution', entry: 'metrics.hip_position', reason: 'level "poor" is missing' },
      {
        kind: 'template-resolution',
        entry: 'metrics.rhythm',
        reason: 'excellent.strength must be a string',
      },
      { kind: 'template-resolution', entry: 'conditionRules[2]', reason: 'missing id' },
      {
        kind: 'template-resolution',
        entry: 'conditionRules.elbow_acute',
        reason: 'threshold must be a finite number',
      },
    ]);

    expect(templates.metrics.quiet_feet.excellent).toEqual({ strength: 'Silent feet at {score}%.' });
    expect(templates.metrics.hip_position).toEqual(DEFAULT_TEMPLATE_SET.metrics.hip_position);
    expect(templates.metrics.rhythm).toEqual(DEFAULT_TEMPLATE_SET.metrics.rhythm);
    expect(templates.metrics.diagonal).toEqual(DEFAULT_TEMPLATE_SET.metrics.diagonal);

    expect(templates.opportunityRules.map((r) => r.id)).toEqual(
      DEFAULT_TEMPLATE_SET.opportunityRules.map((r) => r.id)
    );
    expect(templates.opportunityRules.find((r) => r.id === 'rhythm')?.text).toBe(
      'Steady pace saves {saved}%.'
    );

    expect(templates.conditionRules[0]).toEqual({
      id: 'shoulder_lock',
      text: '{side} shoulder x{count}',
      threshold: 2,
    });
    expect(templates.conditionRules[1]).toEqual(DEFAULT_TEMPLATE_SET.conditionRules[1]);
    expect(templates.sideLabels).toEqual({ left: 'L', right: 'R', none: '-' });
  });

  it('logs every fallback', () => {
    loadTemplateSet(fixture('custom-templates.json'));
    expect(warnSpy).toHaveBeenCalledWith(
      '[TemplateResolver] (resolve) metrics.hip_position: level "poor" is missing, using default'
    );
  });

  it('freezes the resolved set', () => {
    const { templates } = loadTemplateSet(fixture('custom-templates.json'));
    expect(Object.isFrozen(templates)).toBe(true);
    expect(Object.isFrozen(templates.metrics.quiet_feet.excellent)).toBe(true);
    expect(Object.isFrozen(templates.conditionRules)).toBe(true);
    expect(Object.isFrozen(DEFAULT_TEMPLATE_SET.metrics.hip_position.poor)).toBe(true);
  });

  it('rejects documents and sections of the wrong shape', () => {
    expect(resolveTemplateSet('templates').warnings).toEqual([
      { kind: 'template-resolution', entry: 'template', reason: 'not an object' },
    ]);
    expect(resolveTemplateSet({ metrics: [] }).warnings).toEqual([
      { kind: 'template-resolution', entry: 'metrics', reason: 'not an object' },
    ]);
    expect(resolveTemplateSet({ opportunityRules: {} }).warnings).toEqual([
      { kind: 'template-resolution', entry: 'opportunityRules', reason: 'not a list' },
    ]);
    expect(resolveTemplateSet({ sideLabels: { left: 'L' } }).warnings).toEqual([
      {
        kind: 'template-resolution',
        entry: 'sideLabels',
        reason: 'needs string labels for left, right, none',
      },
    ]);
  });

  it('resolves an empty document to the defaults', () => {
    const result = resolveTemplateSet({});
    expect(result.warnings).toEqual([]);
    expect(result.templates).toEqual(DEFAULT_TEMPLATE_SET);
  });

  it('has a strength or weakness text for every default metric', () => {
    for (const levels of Object.values(DEFAULT_TEMPLATE_SET.metrics)) {
      const texts = Object.values(levels).flatMap((t) => [t.strength, t.weakness]);
      expect(texts.some((t) => typeof t === 'string')).toBe(true);
    }
  });
});

describe('opportunity calculations', () => {
  it('raises the hip target by 20 up to 85', () => {
    expect(evaluateOpportunity('hip_position', 40, {})).toEqual({
      ok: true,
      values: { target: 60, reduction: 10 },
    });
    expect(evaluateOpportunity('hip_position', 75, {})).toEqual({
      ok: true,
      values: { target: 85, reduction: 5 },
    });
  });

  it('counts saved foot moves and caps the energy', () => {
    const raw = { repositions: 2.5, norm: 1.5, holds: 4, bracket: '6a-6b' };
    expect(evaluateOpportunity('quiet_feet', 60, raw)).toEqual({
      ok: true,
      values: { saved: 4, energy: 12 },
    });
    expect(evaluateOpportunity('quiet_feet', 20, { ...raw, repositions: 4.5 })).toEqual({
      ok: true,
      values: { saved: 12, energy: 30 },
    });
  });

  it('covers the remaining categories', () => {
    expect(evaluateOpportunity('diagonal', 40, { diagonal_ratio: 40 })).toEqual({
      ok: true,
      values: { target: 65 },
    });
    expect(evaluateOpportunity('diagonal', 40, { diagonal_ratio: 75 })).toEqual({
      ok: true,
      values: { target: 90 },
    });
    expect(evaluateOpportunity('route_reading', 40, { pauses: 0 })).toEqual({
      ok: true,
      values: { target_pauses: 3 },
    });
    expect(evaluateOpportunity('route_reading', 40, { pauses: 2 })).toEqual({
      ok: true,
      values: { target_pauses: 4 },
    });
    expect(evaluateOpportunity('rhythm', 40, { variance: 400 })).toEqual({
      ok: true,
      values: { saved: 10 },
    });
    expect(evaluateOpportunity('rhythm', 10, { variance: 2000 })).toEqual({
      ok: true,
      values: { saved: 25 },
    });
    expect(evaluateOpportunity('dynamic_control', 40, { time: 1.23 })).toEqual({
      ok: true,
      values: { saved_time: 0.7 },
    });
    expect(evaluateOpportunity('dynamic_control', 90, { time: 0.3 })).toEqual({
      ok: true,
      values: { saved_time: 0 },
    });
    expect(evaluateOpportunity('grip_release', 30, {})).toEqual({ ok: true, values: {} });
    expect(evaluateOpportunity('exhaustion', 25, { percent: 75 })).toEqual({
      ok: true,
      values: { time: 38 },
    });
    expect(evaluateOpportunity('arm_efficiency', 23, { arm_load: 59, leg_load: 41 })).toEqual({
      ok: true,
      values: { current: 41 },
    });
  });

  it('fails when a required input is absent or not numeric', () => {
    expect(evaluateOpportunity('quiet_feet', 40, { repositions: 2, norm: 1.5 })).toEqual({
      ok: false,
      missing: ['holds'],
    });
    expect(evaluateOpportunity('rhythm', 40, { variance: 'high' })).toEqual({
      ok: false,
      missing: ['variance'],
    });
  });
});

describe('condition checks', () => {
  const event = (
    joint: TensionEvent['joint'],
    kind: TensionEvent['kind'],
    side: TensionEvent['side'],
    count: number,
    extremumValue = 0
  ): TensionEvent => ({ joint, kind, side, count, extremumValue });

  it('flags the side whose own count reaches the threshold', () => {
    const knee = (left: number, right: number) => [
      event('knee', 'rotation', 'left', left),
      event('knee', 'rotation', 'right', right),
    ];
    expect(flaggedSide(knee(2, 1), 2)).toEqual({ side: 'left', count: 2 });
    expect(flaggedSide(knee(3, 4), 2)).toEqual({ side: 'right', count: 4 });
    expect(flaggedSide(knee(2, 2), 2)).toEqual({ side: 'none', count: 2 });
    expect(flaggedSide(knee(1, 1), 2)).toBeNull();
    expect(flaggedSide([], 0)).toBeNull();
  });

  it('does not add the two sides together', () => {
    const tension = [
      event('shoulder', 'angle_lock', 'left', 2, 160),
      event('shoulder', 'angle_lock', 'right', 1, 155),
    ];
    const inputs = { tension, exhaustionPercent: null };

    expect(CONDITION_CHECKS.shoulder_lock(inputs, 3)).toBeNull();
    expect(CONDITION_CHECKS.shoulder_lock(inputs, 2)).toEqual({
      severity: 2,
      side: 'left',
      values: { count: 2 },
    });
    expect(CONDITION_CHECKS.elbow_acute(inputs, 1)).toBeNull();
  });

  it('fires the twist rule on the extremum', () => {
    const inputs = {
      tension: [event('lower_back', 'twist', 'none', 2, 34.6)],
      exhaustionPercent: null,
    };
    expect(CONDITION_CHECKS.lower_back_twist(inputs, 30)).toEqual({
      severity: 34.6,
      side: 'none',
      values: { angle: 35, count: 2 },
    });
    expect(CONDITION_CHECKS.lower_back_twist(inputs, 35)).toBeNull();
  });

  it('fires the exhaustion rule only when exhaustion was measured', () => {
    expect(CONDITION_CHECKS.exhaustion_critical({ tension: [], exhaustionPercent: 72 }, 70)).toEqual({
      severity: 72,
      side: 'none',
      values: { percent: 72 },
    });
    expect(CONDITION_CHECKS.exhaustion_critical({ tension: [], exhaustionPercent: 69 }, 70)).toBeNull();
    expect(CONDITION_CHECKS.exhaustion_critical({ tension: [], exhaustionPercent: null }, 70)).toBeNull();
  });
});
