/**
 * Template Resolver
 *
 * Loads the SWOT text templates from a JSON file and validates them entry by
 * entry against the compiled-in default set:
 *
 * - missing file or unparseable JSON: the whole default set
 * - invalid metric entry (one category) or rule (one id): that entry's default,
 *   plus a warning
 * - absent sections, categories and rule ids: the default, silently
 * - unknown fields and ids: ignored
 *
 * The result is deep-frozen and can be shared by any number of sessions.
 */

import { readFileSync } from 'node:fs';
import type { ScoringConfig } from '../config/scoringConfig';
import { DEFAULT_SCORING_CONFIG } from '../config/scoringConfig';
import type {
  ConditionTemplate,
  LevelTexts,
  OpportunityTemplate,
  TemplateLoadResult,
  TemplateResolutionWarning,
  TemplateSet,
} from '../types/templates';
import type { Category, TensionSide } from '../types/assessment';
import { CATEGORIES } from '../types/assessment';
import { deepFreeze } from '../utils/deepFreeze';
import type { Logger } from '../utils/logger';
import { createLogger } from '../utils/logger';
import defaultTemplateData from './defaultTemplates.json';

export const DEFAULT_TEMPLATE_SET: TemplateSet = deepFreeze(
  structuredClone<TemplateSet>(defaultTemplateData)
);

export const DEFAULT_TEMPLATES: TemplateLoadResult = deepFreeze<TemplateLoadResult>({
  templates: DEFAULT_TEMPLATE_SET,
  warnings: [],
  source: 'default',
});

export interface TemplateResolverOptions {
  /** Bucket tables that decide which levels each metric entry must define */
  scoring?: ScoringConfig;
  logger?: Logger;
}

type Checked<T> = { ok: true; value: T } | { ok: false; reason: string };

const TEXT_FIELDS = ['strength', 'weakness'] as const;
const SIDES: readonly TensionSide[] = ['left', 'right', 'none'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function checkMetric(input: unknown, levels: readonly string[]): Checked<Record<string, LevelTexts>> {
  if (!isRecord(input)) return { ok: false, reason: 'not an object' };

  const resolved: Record<string, LevelTexts> = {};
  for (const level of levels) {
    const texts = input[level];
    if (!isRecord(texts)) return { ok: false, reason: `level "${level}" is missing` };

    const entry: LevelTexts = {};
    for (const field of TEXT_FIELDS) {
      const text = texts[field];
      if (text === undefined) continue;
      if (typeof text !== 'string') {
        return { ok: false, reason: `${level}.${field} must be a string` };
      }
      entry[field] = text;
    }
    resolved[level] = entry;
  }
  return { ok: true, value: resolved };
}

function checkOpportunity(
  item: Record<string, unknown>,
  fallback: OpportunityTemplate
): Checked<OpportunityTemplate> {
  if (typeof item.text !== 'string') return { ok: false, reason: 'text must be a string' };
  return { ok: true, value: { id: fallback.id, text: item.text } };
}

function checkCondition(
  item: Record<string, unknown>,
  fallback: ConditionTemplate
): Checked<ConditionTemplate> {
  if (typeof item.text !== 'string') return { ok: false, reason: 'text must be a string' };
  if (typeof item.threshold !== 'number' || !Number.isFinite(item.threshold)) {
    return { ok: false, reason: 'threshold must be a finite number' };
  }
  return { ok: true, value: { id: fallback.id, text: item.text, threshold: item.threshold } };
}

function checkSideLabels(input: unknown): Checked<Record<TensionSide, string>> {
  if (!isRecord(input)) return { ok: false, reason: 'not an object' };
  const { left, right, none } = input;
  if (typeof left !== 'string' || typeof right !== 'string' || typeof none !== 'string') {
    return { ok: false, reason: `needs string labels for ${SIDES.join(', ')}` };
  }
  return { ok: true, value: { left, right, none } };
}

/**
 * Override default rules by id. The default list decides which ids exist
 * and their order.
 */
function resolveRules<T extends { id: string }>(
  section: string,
  input: unknown,
  defaults: readonly T[],
  check: (item: Record<string, unknown>, fallback: T) => Checked<T>,
  warn: (entry: string, reason: string) => void
): T[] {
  if (input === undefined) return [...defaults];
  if (!Array.isArray(input)) {
    warn(section, 'not a list');
    return [...defaults];
  }

  const overrides = new Map<string, Record<string, unknown>>();
  input.forEach((item: unknown, i) => {
    if (!isRecord(item) || typeof item.id !== 'string') {
      warn(`${section}[${i}]`, 'missing id');
      return;
    }
    overrides.set(item.id, item);
  });

  return defaults.map((rule) => {
    const item = overrides.get(rule.id);
    if (!item) return rule;
    const checked = check(item, rule);
    if (!checked.ok) {
      warn(`${section}.${rule.id}`, checked.reason);
      return rule;
    }
    return checked.value;
  });
}

/**
 * Validate an already-parsed template document.
 */
export function resolveTemplateSet(
  input: unknown,
  options: TemplateResolverOptions = {}
): TemplateLoadResult {
  const scoring = options.scoring ?? DEFAULT_SCORING_CONFIG;
  const log = options.logger ?? createLogger({ component: 'TemplateResolver' });
  const defaults = DEFAULT_TEMPLATE_SET;
  const warnings: TemplateResolutionWarning[] = [];

  const warn = (entry: string, reason: string): void => {
    warnings.push({ kind: 'template-resolution', entry, reason });
    log.warn(`${entry}: ${reason}, using default`, { action: 'resolve' });
  };

  if (!isRecord(input)) {
    warn('template', 'not an object');
    return deepFreeze<TemplateLoadResult>({ templates: defaults, warnings, source: 'file' });
  }

  const metrics: Record<Category, Readonly<Record<string, LevelTexts>>> = {
    ...defaults.metrics,
  };
  const metricsInput = input.metrics ?? {};
  if (!isRecord(metricsInput)) {
    warn('metrics', 'not an object');
  } else {
    for (const category of CATEGORIES) {
      if (metricsInput[category] === undefined) continue;
      const levels = scoring.rules[category].buckets.map((bucket) => bucket.level);
      const checked = checkMetric(metricsInput[category], levels);
      if (checked.ok) {
        metrics[category] = checked.value;
      } else {
        warn(`metrics.${category}`, checked.reason);
      }
    }
  }

  let sideLabels = defaults.sideLabels;
  if (input.sideLabels !== undefined) {
    const checked = checkSideLabels(input.sideLabels);
    if (checked.ok) {
      sideLabels = checked.value;
    } else {
      warn('sideLabels', checked.reason);
    }
  }

  const templates: TemplateSet = {
    metrics,
    opportunityRules: resolveRules(
      'opportunityRules',
      input.opportunityRules,
      defaults.opportunityRules,
      checkOpportunity,
      warn
    ),
    conditionRules: resolveRules(
      'conditionRules',
      input.conditionRules,
      defaults.conditionRules,
      checkCondition,
      warn
    ),
    sideLabels,
  };

  return deepFreeze<TemplateLoadResult>({ templates, warnings, source: 'file' });
}

/**
 * Load templates from a JSON file. Without a path, or when the file can't be
 * read or parsed, the default set is returned.
 */
export function loadTemplateSet(
  path?: string,
  options: TemplateResolverOptions = {}
): TemplateLoadResult {
  const log = options.logger ?? createLogger({ component: 'TemplateResolver' });
  if (path === undefined) {
    return DEFAULT_TEMPLATES;
  }

  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    log.warn(`Cannot read ${path} (${describeError(error)}), using default templates`, {
      action: 'load',
    });
    return DEFAULT_TEMPLATES;
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    log.warn(`Cannot parse ${path} (${describeError(error)}), using default templates`, {
      action: 'load',
    });
    return DEFAULT_TEMPLATES;
  }

  const result = resolveTemplateSet(document, { ...options, logger: log });
  log.info(`Loaded templates from ${path} with ${result.warnings.length} fallbacks`, {
    action: 'load',
  });
  return result;
}
