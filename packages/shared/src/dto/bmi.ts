import { z } from 'zod/v4';
import { AppErrorSchema, type AppErrorDTO } from '../errors/app-error.ts';

// Ordered from lowest to highest BMI band.
export const BMI_CATEGORIES = [
  'UNDERWEIGHT',
  'NORMAL',
  'OVERWEIGHT',
  'OBESE_CLASS_I',
  'OBESE_CLASS_II',
  'OBESE_CLASS_III',
] as const;

export const BmiCategorySchema = z.enum(BMI_CATEGORIES);
export type BmiCategory = z.infer<typeof BmiCategorySchema>;

export const BmiEvaluationInputDTOSchema = z.object({
  weightKg: z.number(),
  heightM: z.number(),
});

export type BmiEvaluationInputDTO = z.infer<typeof BmiEvaluationInputDTOSchema>;

export const BmiEvaluationResultDTOSchema = z.object({
  bmi: z.number().positive(),
  category: BmiCategorySchema,
  categoryName: z.string(),
  color: z.string().regex(/^#[0-9a-f]{6}$/),
  message: z.string(),
});

export type BmiEvaluationResultDTO = z.infer<typeof BmiEvaluationResultDTOSchema>;

export interface BmiEvaluationOk {
  ok: true;
  value: BmiEvaluationResultDTO;
}

export interface BmiEvaluationErr {
  ok: false;
  error: AppErrorDTO;
}

export type BmiEvaluationResponse = BmiEvaluationOk | BmiEvaluationErr;

export const BmiEvaluationResponseSchema = z.union([
  z.object({ ok: z.literal(true), value: BmiEvaluationResultDTOSchema }),
  z.object({ ok: z.literal(false), error: AppErrorSchema }),
]);
