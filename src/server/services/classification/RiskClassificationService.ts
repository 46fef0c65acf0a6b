/**
 * Rule-based risk classification of pregnancy and nursing section text.
 *
 * `classify` applies a priority-ordered rule table to normalized text and
 * returns the first match. Evidence flags are computed independently on the
 * original text, and the confidence combines the rule score with up to two
 * boosting flags.
 */

import { RuleTable, type EvidencePatterns, type RiskRules, type RiskScore, type SectionRules } from './riskRules.js';

export interface ClassificationResult {
  score: RiskScore;
  ruleTag: string;
}

export type EvidenceFlags = Record<string, boolean>;

export interface SectionAssessment extends ClassificationResult {
  flags: EvidenceFlags;
  confidence: RiskScore;
  label: string;
}

export interface WomenRiskAssessment {
  scheme: string;
  pregnant: SectionAssessment;
  nursing: SectionAssessment;
  /** Highest of the section scores */
  overall: RiskScore;
}

export const NO_TEXT_TAG = 'none';
export const NO_MATCH_TAG = 'unclear';

const MAX_BOOSTS = 2;

/**
 * Clamp any number into the 0-3 scale
 */
export function toRiskScore(value: number): RiskScore {
  const n = Number.isFinite(value) ? Math.trunc(value) : 0;
  if (n >= 3) return 3;
  if (n === 2) return 2;
  if (n === 1) return 1;
  return 0;
}

function hasText(text: unknown): text is string {
  return typeof text === 'string' && text.trim().length > 0;
}

/**
 * Normalization applied before rule matching: full-width spaces and line
 * breaks become spaces, whitespace runs collapse, and the spellings
 * 上まわる / 上廻る become 上回る.
 */
export function normalizeForMatch(text: unknown): string {
  if (typeof text !== 'string') {
    return '';
  }
  return text
    .replace(/[\u3000\r\n]/g, ' ')
    .replace(/\s+/g, ' ')
    .replace(/上まわる|上廻る/g, '上回る')
    .trim();
}

/**
 * Classify text with a rule table.
 *
 * Empty or non-string text yields `(0, "none")`; text that matches no rule,
 * or a missing table, yields `(0, "unclear")`.
 */
export function classify(text: unknown, table: RuleTable | null | undefined): ClassificationResult {
  if (!hasText(text)) {
    return { score: 0, ruleTag: NO_TEXT_TAG };
  }
  const rule = (table ?? RuleTable.EMPTY).match(normalizeForMatch(text));
  return rule ? { score: rule.score, ruleTag: rule.tag } : { score: 0, ruleTag: NO_MATCH_TAG };
}

/**
 * Evaluate every evidence pattern against the text as given (not the
 * normalized form used by {@link classify}).
 */
export function extractFlags(text: unknown, patterns: EvidencePatterns | null | undefined): EvidenceFlags {
  if (!hasText(text) || !patterns) {
    return {};
  }
  const flags: EvidenceFlags = {};
  for (const [key, pattern] of Object.entries(patterns)) {
    flags[key] = pattern.test(text);
  }
  return flags;
}

/**
 * Rule score plus one per true boost flag (at most two), capped at 3
 */
export function computeConfidence(score: number, flags: EvidenceFlags, boostKeys: readonly string[]): RiskScore {
  const boosts = boostKeys.filter(key => flags[key] === true).length;
  return toRiskScore(toRiskScore(score) + Math.min(boosts, MAX_BOOSTS));
}

/**
 * Classification, flags, confidence and label of one section
 */
export function assessSection(text: unknown, rules: SectionRules): SectionAssessment {
  const { score, ruleTag } = classify(text, rules.table);
  const flags = extractFlags(text, rules.evidence);
  return {
    score,
    ruleTag,
    flags,
    confidence: computeConfidence(score, flags, rules.boostKeys),
    label: rules.labels[score],
  };
}

/**
 * Classifies pregnancy and nursing texts with a fixed rule configuration
 */
export class RiskClassificationService {
  constructor(private readonly rules: RiskRules) {}

  get scheme(): string {
    return this.rules.scheme;
  }

  classifyPregnancy(text: unknown): SectionAssessment {
    return assessSection(text, this.rules.pregnancy);
  }

  classifyNursing(text: unknown): SectionAssessment {
    return assessSection(text, this.rules.nursing);
  }

  assess(pregnantText: unknown, nursingText: unknown): WomenRiskAssessment {
    const pregnant = this.classifyPregnancy(pregnantText);
    const nursing = this.classifyNursing(nursingText);
    return {
      scheme: this.rules.scheme,
      pregnant,
      nursing,
      overall: toRiskScore(Math.max(pregnant.score, nursing.score)),
    };
  }
}
