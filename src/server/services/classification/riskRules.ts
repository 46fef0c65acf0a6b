/**
 * Risk rule configuration: schema, compilation and loading.
 *
 * Rule tables and evidence dictionaries are data (`config/risk-rules.json`),
 * validated with Zod and compiled once at startup.
 */

import { readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigurationError, getErrorMessage } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Ordinal risk scale: 3 absolute prohibition, 2 strongly discouraged,
 * 1 conditional/cautious use, 0 unknown
 */
export type RiskScore = 0 | 1 | 2 | 3;

export const DEFAULT_RISK_RULES_PATH = fileURLToPath(new URL('../../../../config/risk-rules.json', import.meta.url));

const riskScoreSchema = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)]);

// Stateful flags would make repeated matching depend on lastIndex
const regexFlagsSchema = z
  .string()
  .regex(/^[imsu]*$/, 'Only the i, m, s and u regular expression flags are allowed');

const ruleSchema = z.object({
  score: riskScoreSchema,
  tag: z.string().min(1),
  pattern: z.string().min(1),
});

const sectionRulesSchema = z.object({
  flags: regexFlagsSchema.default(''),
  rules: z.array(ruleSchema),
  evidenceFlags: regexFlagsSchema.default(''),
  evidence: z.record(z.string(), z.string().min(1)),
  boostKeys: z.array(z.string()).max(2),
  labels: z.object({
    '0': z.string(),
    '1': z.string(),
    '2': z.string(),
    '3': z.string(),
  }),
});

export const riskRulesConfigSchema = z.object({
  scheme: z.string().min(1),
  pregnancy: sectionRulesSchema,
  nursing: sectionRulesSchema,
});

export type RiskRulesConfig = z.infer<typeof riskRulesConfigSchema>;
export type SectionRulesConfig = z.infer<typeof sectionRulesSchema>;
export type RuleDefinition = z.infer<typeof ruleSchema>;

export interface ClassificationRule {
  readonly score: RiskScore;
  readonly pattern: RegExp;
  readonly tag: string;
}

/**
 * Priority-ordered classification rules.
 *
 * Only {@link RuleTable.compile} and {@link RuleTable.fromRules} build a
 * table, and both order rules by descending score (stable among equal
 * scores), so "first match wins" always means "highest score wins".
 */
export class RuleTable {
  static readonly EMPTY = new RuleTable([]);

  readonly rules: readonly ClassificationRule[];

  private constructor(rules: ClassificationRule[]) {
    this.rules = Object.freeze([...rules].sort((a, b) => b.score - a.score));
  }

  static fromRules(rules: readonly ClassificationRule[]): RuleTable {
    return new RuleTable(rules.map(rule => Object.freeze({ ...rule })));
  }

  static compile(definitions: readonly RuleDefinition[], flags: string = ''): RuleTable {
    return new RuleTable(
      definitions.map(definition =>
        Object.freeze({
          score: definition.score,
          tag: definition.tag,
          pattern: compilePattern(definition.pattern, flags, definition.tag),
        })
      )
    );
  }

  /**
   * First rule whose pattern matches `text`
   */
  match(text: string): ClassificationRule | undefined {
    return this.rules.find(rule => rule.pattern.test(text));
  }

  get size(): number {
    return this.rules.length;
  }
}

export type EvidencePatterns = Readonly<Record<string, RegExp>>;

export interface SectionRules {
  readonly table: RuleTable;
  readonly evidence: EvidencePatterns;
  readonly boostKeys: readonly string[];
  readonly labels: Readonly<Record<RiskScore, string>>;
}

export interface RiskRules {
  readonly scheme: string;
  readonly pregnancy: SectionRules;
  readonly nursing: SectionRules;
}

function compilePattern(pattern: string, flags: string, name: string): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (error) {
    throw new ConfigurationError(`Invalid pattern for "${name}": ${getErrorMessage(error)}`, { pattern, flags });
  }
}

export function compileEvidencePatterns(patterns: Readonly<Record<string, string>>, flags: string = ''): EvidencePatterns {
  const compiled: Record<string, RegExp> = {};
  for (const [key, pattern] of Object.entries(patterns)) {
    compiled[key] = compilePattern(pattern, flags, key);
  }
  return Object.freeze(compiled);
}

function compileSection(section: SectionRulesConfig): SectionRules {
  return Object.freeze({
    table: RuleTable.compile(section.rules, section.flags),
    evidence: compileEvidencePatterns(section.evidence, section.evidenceFlags),
    boostKeys: Object.freeze([...section.boostKeys]),
    labels: Object.freeze({
      0: section.labels['0'],
      1: section.labels['1'],
      2: section.labels['2'],
      3: section.labels['3'],
    }),
  });
}

/**
 * Validate and compile a raw configuration object
 *
 * @throws ConfigurationError when the object does not match the schema or a pattern is invalid
 */
export function compileRiskRules(raw: unknown): RiskRules {
  const result = riskRulesConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError('Invalid risk rule configuration', {
      issues: result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  const config = result.data;
  return Object.freeze({
    scheme: config.scheme,
    pregnancy: compileSection(config.pregnancy),
    nursing: compileSection(config.nursing),
  });
}

/**
 * Load rule configuration from a JSON file
 *
 * @param filePath - Path to the JSON file; relative paths resolve against the working directory
 */
export function loadRiskRules(filePath: string = DEFAULT_RISK_RULES_PATH): RiskRules {
  const resolved = path.resolve(filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(resolved, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read risk rule configuration: ${getErrorMessage(error)}`, { path: resolved });
  }

  const rules = compileRiskRules(raw);
  logger.debug(
    {
      path: resolved,
      scheme: rules.scheme,
      pregnancyRules: rules.pregnancy.table.size,
      nursingRules: rules.nursing.table.size,
    },
    'Loaded risk rule configuration'
  );
  return rules;
}
