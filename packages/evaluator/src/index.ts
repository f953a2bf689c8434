export {
  classifyBmi,
  getBmiCategoryAttributes,
  getBmiRecommendation,
  FALLBACK_RECOMMENDATION,
  type BmiCategoryAttributes,
} from './categories.ts';
export {
  describeBmiEvaluation,
  evaluateBmi,
  evaluateBmiInput,
  toBmiEvaluationResponse,
  toBmiEvaluationResultDTO,
  type BmiEvaluationResult,
} from './evaluator.ts';
export {
  createLoggerLineSink,
  formatBmiEvaluationLogLine,
  logBmiEvaluation,
  stdoutLineSink,
  type EvaluationLineSink,
} from './evaluation-log.ts';
export {
  createEvaluationLogSink,
  loadEvaluatorConfig,
  type CreateEvaluationLogSinkDependencies,
  type EnvSource,
  type EvaluationLogMode,
  type EvaluatorConfig,
  type LoadedEvaluatorConfig,
} from './config.ts';
export { runBmiSelfTest, type RunBmiSelfTestInput } from './self-test.ts';
