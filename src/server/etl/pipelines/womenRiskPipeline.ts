/**
 * Pregnancy / Nursing Risk Labelling Pipeline
 *
 * Classifies the stored section texts, writes the scores back onto the
 * section rows and upserts one label row per document for the rule scheme.
 */

import type { RiskLabelRow, WomenRiskStore, WomenScoreUpdate, WomenTextRow } from '../loaders/packageInsertStore.js';
import { BatchWriter } from '../loaders/BatchWriter.js';
import type { RiskClassificationService, WomenRiskAssessment } from '../../services/classification/RiskClassificationService.js';
import { logger, pipelineContext } from '../../utils/logger.js';
import { ProgressTracker } from '../../utils/progress.js';

export interface WomenRiskPipelineOptions {
  store: WomenRiskStore;
  classifier: RiskClassificationService;
  batchSize?: number;
  progressEvery?: number;
  now?: () => number;
}

export interface WomenRiskPipelineSummary {
  scheme: string;
  scanned: number;
  scoresUpdated: number;
  labelsUpserted: number;
  totalSeconds: number;
}

const SAMPLE_WINDOW = 1000;
const SAMPLE_EVERY = 200;

export function toScoreUpdate(row: WomenTextRow, assessment: WomenRiskAssessment): WomenScoreUpdate {
  return {
    packageInsertNo: row.packageInsertNo,
    yjCode: row.yjCode,
    pregnantScore: assessment.pregnant.score,
    pregnantRule: assessment.pregnant.ruleTag,
    nursingScore: assessment.nursing.score,
    nursingRule: assessment.nursing.ruleTag,
    overallScore: assessment.overall,
    pregnantEvidence: assessment.pregnant.flags,
    nursingEvidence: assessment.nursing.flags,
  };
}

export function toRiskLabelRow(row: WomenTextRow, assessment: WomenRiskAssessment): RiskLabelRow {
  const { pregnant, nursing } = assessment;
  return {
    packageInsertNo: row.packageInsertNo,
    yjCode: row.yjCode,
    scheme: assessment.scheme,
    pregnantLabel: pregnant.label,
    nursingLabel: nursing.label,
    pregnantScore: pregnant.score,
    nursingScore: nursing.score,
    evidence: {
      pregnant_rule: pregnant.ruleTag,
      nursing_rule: nursing.ruleTag,
      preg: { ...pregnant.flags, confidence: pregnant.confidence },
      nurs: { ...nursing.flags, confidence: nursing.confidence },
    },
  };
}

export async function runWomenRiskPipeline(options: WomenRiskPipelineOptions): Promise<WomenRiskPipelineSummary> {
  const { store, classifier } = options;
  return pipelineContext.run({ pipeline: 'women-risk', scheme: classifier.scheme }, async () => {
    const batchSize = options.batchSize ?? 500;
    const progressEvery = options.progressEvery ?? 2000;

    logger.info('Preparing risk label tables');
    await store.prepareRiskTables();

    const progress = new ProgressTracker(0, options.now);
    const scores = new BatchWriter<WomenScoreUpdate>(batchSize, rows => store.updateWomenScores(rows));
    const labels = new BatchWriter<RiskLabelRow>(batchSize, rows => store.upsertRiskLabels(rows));
    let scanned = 0;

    for await (const row of store.scanWomenTexts(batchSize)) {
      scanned++;
      const pregnantText = row.pregnantText ?? '';
      const assessment = classifier.assess(pregnantText, row.nursingText ?? '');

      await scores.add(toScoreUpdate(row, assessment));
      await labels.add(toRiskLabelRow(row, assessment));

      // Sample a few unmatched pregnancy texts from the start of the run
      if (
        assessment.pregnant.score === 0 &&
        pregnantText.trim() &&
        scanned <= SAMPLE_WINDOW &&
        scanned % SAMPLE_EVERY === 0
      ) {
        logger.warn(
          { packageInsertNo: row.packageInsertNo, yjCode: row.yjCode, text: pregnantText.slice(0, 120) },
          'pregnant_score=0 sample'
        );
      }

      if (scanned % progressEvery === 0) {
        const { rate } = progress.snapshot(scanned);
        logger.info(
          { scanned, scoresUpdated: scores.written, labelsUpserted: labels.written, rowsPerSecond: Math.round(rate) },
          'Risk labelling progress'
        );
      }
    }
    await scores.flush();
    await labels.flush();

    const summary = {
      scheme: classifier.scheme,
      scanned,
      scoresUpdated: scores.written,
      labelsUpserted: labels.written,
      totalSeconds: progress.elapsedSeconds(),
    };
    logger.info(summary, 'Risk labelling summary');
    return summary;
  });
}
