import type { Logger } from '@bmi-kit/shared';
import { getBmiCategoryAttributes } from './categories.ts';
import type { BmiEvaluationResult } from './evaluator.ts';

/** Receives one preformatted log line, without a trailing newline. */
export type EvaluationLineSink = (line: string) => void;

export function stdoutLineSink(line: string): void {
  process.stdout.write(`${line}\n`);
}

export function createLoggerLineSink(logger: Logger): EvaluationLineSink {
  return (line) => {
    logger.info(line);
  };
}

export function formatBmiEvaluationLogLine(weight: number, height: number, result: BmiEvaluationResult): string {
  const categoryName = getBmiCategoryAttributes(result.category).name;
  return [
    `[BMI] Weight: ${weight.toFixed(2)} kg`,
    `Height: ${height.toFixed(2)} m`,
    `BMI: ${result.bmi.toFixed(2)}`,
    `Category: ${categoryName}`,
  ].join(' | ');
}

export function logBmiEvaluation(
  weight: number,
  height: number,
  result: BmiEvaluationResult,
  sink: EvaluationLineSink = stdoutLineSink,
): void {
  sink(formatBmiEvaluationLogLine(weight, height, result));
}
