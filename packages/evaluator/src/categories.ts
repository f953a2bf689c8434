import type { BmiCategory } from '@bmi-kit/shared';

export interface BmiCategoryAttributes {
  readonly name: string;
  readonly color: string;
}

interface BmiBand {
  readonly upperBound: number;
  readonly category: BmiCategory;
}

const CATEGORY_ATTRIBUTES: Readonly<Record<BmiCategory, BmiCategoryAttributes>> = Object.freeze({
  UNDERWEIGHT: Object.freeze({ name: 'Underweight', color: '#3498db' }),
  NORMAL: Object.freeze({ name: 'Normal weight', color: '#2d8659' }),
  OVERWEIGHT: Object.freeze({ name: 'Overweight', color: '#f39c12' }),
  OBESE_CLASS_I: Object.freeze({ name: 'Obesity Class I', color: '#e67e22' }),
  OBESE_CLASS_II: Object.freeze({ name: 'Obesity Class II', color: '#d35400' }),
  OBESE_CLASS_III: Object.freeze({ name: 'Obesity Class III', color: '#c0392b' }),
});

// Upper bounds are exclusive; anything at or above the last bound is OBESE_CLASS_III.
const BMI_BANDS: readonly BmiBand[] = [
  { upperBound: 18.5, category: 'UNDERWEIGHT' },
  { upperBound: 25.0, category: 'NORMAL' },
  { upperBound: 30.0, category: 'OVERWEIGHT' },
  { upperBound: 35.0, category: 'OBESE_CLASS_I' },
  { upperBound: 40.0, category: 'OBESE_CLASS_II' },
];

export const FALLBACK_RECOMMENDATION = 'consult a health professional';

export function getBmiCategoryAttributes(category: BmiCategory): BmiCategoryAttributes {
  return CATEGORY_ATTRIBUTES[category];
}

export function classifyBmi(bmi: number): BmiCategory {
  for (const band of BMI_BANDS) {
    if (bmi < band.upperBound) {
      return band.category;
    }
  }
  return 'OBESE_CLASS_III';
}

export function getBmiRecommendation(category: BmiCategory): string {
  switch (category) {
    case 'UNDERWEIGHT':
      return 'consult a nutritionist for healthy weight gain';
    case 'NORMAL':
      return 'keep maintaining your healthy weight';
    case 'OVERWEIGHT':
      return 'consider regular physical activity';
    case 'OBESE_CLASS_I':
    case 'OBESE_CLASS_II':
    case 'OBESE_CLASS_III':
      return 'seek professional guidance urgently';
    default:
      return FALLBACK_RECOMMENDATION;
  }
}
