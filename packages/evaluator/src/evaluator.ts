import {
  AppError,
  BmiEvaluationInputDTOSchema,
  err,
  ok,
  type BmiCategory,
  type BmiEvaluationResponse,
  type BmiEvaluationResultDTO,
  type Result,
} from '@bmi-kit/shared';
import { classifyBmi, getBmiCategoryAttributes, getBmiRecommendation } from './categories.ts';

export interface BmiEvaluationResult {
  readonly bmi: number;
  readonly category: BmiCategory;
  readonly message: string;
}

const MAX_WEIGHT_KG = 500;
const MIN_HEIGHT_M = 0.5;
const MAX_HEIGHT_M = 2.5;

function createInvalidInputError(message: string, weight: number, height: number): AppError {
  return AppError.create('BMI_INVALID_INPUT', message, 'error', { weight, height });
}

function validateMeasurements(weight: number, height: number): Result<void, AppError> {
  // Negated comparisons so NaN lands here as well.
  if (!(weight > 0) || !(height > 0)) {
    return err(createInvalidInputError('weight and height must be greater than zero', weight, height));
  }

  if (weight > MAX_WEIGHT_KG) {
    return err(createInvalidInputError('invalid weight: maximum 500kg', weight, height));
  }

  if (height < MIN_HEIGHT_M || height > MAX_HEIGHT_M) {
    return err(createInvalidInputError('invalid height: must be between 0.5m and 2.5m', weight, height));
  }

  return ok(undefined);
}

/**
 * Computes BMI for a weight in kilograms and a height in meters.
 *
 * Checks run in a fixed order (positivity, maximum weight, height range) and
 * the first failing one decides the error message.
 */
export function evaluateBmi(weight: number, height: number): Result<BmiEvaluationResult, AppError> {
  const validation = validateMeasurements(weight, height);
  if (!validation.ok) {
    return validation;
  }

  const bmi = weight / (height * height);
  const category = classifyBmi(bmi);

  return ok(
    Object.freeze({
      bmi,
      category,
      message: getBmiRecommendation(category),
    }),
  );
}

export function evaluateBmiInput(raw: unknown): Result<BmiEvaluationResult, AppError> {
  const parsed = BmiEvaluationInputDTOSchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      AppError.create('BMI_INPUT_PARSE_FAILED', 'weightKg and heightM must be numbers', 'error', {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.map(String).join('.'),
          message: issue.message,
        })),
      }),
    );
  }

  return evaluateBmi(parsed.data.weightKg, parsed.data.heightM);
}

/**
 * Rounds to two decimals, half-even on the exact binary value.
 * A double sits exactly on a third-decimal 5 only when it is an odd number of eighths.
 */
function roundHundredthsHalfEven(value: number): number {
  const eighths = value * 8;
  if (Number.isInteger(eighths) && eighths % 2 === 1) {
    const hundredths = Math.floor(value * 100);
    return (hundredths % 2 === 0 ? hundredths : hundredths + 1) / 100;
  }
  return Number(value.toFixed(2));
}

function formatCompactDecimal(value: number): string {
  return String(roundHundredthsHalfEven(value));
}

/** e.g. `BMI: 22.86 | Normal weight` */
export function describeBmiEvaluation(result: BmiEvaluationResult): string {
  return `BMI: ${formatCompactDecimal(result.bmi)} | ${getBmiCategoryAttributes(result.category).name}`;
}

export function toBmiEvaluationResultDTO(result: BmiEvaluationResult): BmiEvaluationResultDTO {
  const attributes = getBmiCategoryAttributes(result.category);
  return {
    bmi: result.bmi,
    category: result.category,
    categoryName: attributes.name,
    color: attributes.color,
    message: result.message,
  };
}

export function toBmiEvaluationResponse(result: Result<BmiEvaluationResult, AppError>): BmiEvaluationResponse {
  if (!result.ok) {
    return { ok: false, error: result.error.toDTO() };
  }
  return { ok: true, value: toBmiEvaluationResultDTO(result.value) };
}
