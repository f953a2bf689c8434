import { ok, type AppError, type Result } from '@bmi-kit/shared';
import { getBmiCategoryAttributes } from './categories.ts';
import { logBmiEvaluation, stdoutLineSink, type EvaluationLineSink } from './evaluation-log.ts';
import { evaluateBmi, type BmiEvaluationResult } from './evaluator.ts';

interface SelfTestScenario {
  label: string;
  weight: number;
  height: number;
  showColor: boolean;
}

const SELF_TEST_SCENARIOS: readonly SelfTestScenario[] = [
  { label: 'normal weight', weight: 70, height: 1.75, showColor: true },
  { label: 'overweight', weight: 85, height: 1.7, showColor: false },
  { label: 'underweight', weight: 55, height: 1.75, showColor: false },
];

export interface RunBmiSelfTestInput {
  /** Receives the formatted evaluation log lines. */
  sink?: EvaluationLineSink;
  /** Receives the human-readable follow-up lines. */
  print?: (line: string) => void;
}

export function runBmiSelfTest(input: RunBmiSelfTestInput = {}): Result<BmiEvaluationResult[], AppError> {
  const sink = input.sink ?? stdoutLineSink;
  const print = input.print ?? stdoutLineSink;
  const results: BmiEvaluationResult[] = [];

  for (const scenario of SELF_TEST_SCENARIOS) {
    const evaluation = evaluateBmi(scenario.weight, scenario.height);
    if (!evaluation.ok) {
      return evaluation;
    }

    logBmiEvaluation(scenario.weight, scenario.height, evaluation.value, sink);
    print(`Message: ${evaluation.value.message}`);
    if (scenario.showColor) {
      print(`Color: ${getBmiCategoryAttributes(evaluation.value.category).color}`);
    }
    print('');
    results.push(evaluation.value);
  }

  return ok(results);
}
