/**
 * Template Types
 *
 * Resolved, validated text templates for the SWOT narrative.
 */

import type { Category, Diagnostic, TensionSide } from './assessment';

export interface LevelTexts {
  strength?: string;
  weakness?: string;
}

export interface OpportunityTemplate {
  /** Category the opportunity follows from */
  id: string;
  text: string;
}

export interface ConditionTemplate {
  id: string;
  text: string;
  threshold: number;
}

export interface TemplateSet {
  /** category -> level -> texts */
  readonly metrics: Readonly<Record<Category, Readonly<Record<string, LevelTexts>>>>;
  readonly opportunityRules: readonly OpportunityTemplate[];
  readonly conditionRules: readonly ConditionTemplate[];
  readonly sideLabels: Readonly<Record<TensionSide, string>>;
}

export type TemplateResolutionWarning = Extract<Diagnostic, { kind: 'template-resolution' }>;

export interface TemplateLoadResult {
  templates: TemplateSet;
  warnings: TemplateResolutionWarning[];
  /** Where the set came from; 'default' when no usable file was read */
  source: 'file' | 'default';
}
