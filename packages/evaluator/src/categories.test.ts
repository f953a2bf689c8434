import { BMI_CATEGORIES } from '@bmi-kit/shared';
import { describe, expect, it } from 'vitest';
import { classifyBmi, getBmiCategoryAttributes, getBmiRecommendation } from './categories.ts';

describe('BMI categories', () => {
  it('binds a display name and color to every category', () => {
    expect(BMI_CATEGORIES.map((category) => getBmiCategoryAttributes(category))).toEqual([
      { name: 'Underweight', color: '#3498db' },
      { name: 'Normal weight', color: '#2d8659' },
      { name: 'Overweight', color: '#f39c12' },
      { name: 'Obesity Class I', color: '#e67e22' },
      { name: 'Obesity Class II', color: '#d35400' },
      { name: 'Obesity Class III', color: '#c0392b' },
    ]);
  });

  it('keeps the attribute records immutable', () => {
    const attributes = getBmiCategoryAttributes('NORMAL');
    expect(Object.isFrozen(attributes)).toBe(true);
    expect(() => {
      Object.assign(attributes, { color: '#000000' });
    }).toThrow(TypeError);
    expect(getBmiCategoryAttributes('NORMAL').color).toBe('#2d8659');
  });

  it('treats every upper bound as exclusive', () => {
    expect(classifyBmi(18.49)).toBe('UNDERWEIGHT');
    expect(classifyBmi(18.5)).toBe('NORMAL');
    expect(classifyBmi(24.99)).toBe('NORMAL');
    expect(classifyBmi(25)).toBe('OVERWEIGHT');
    expect(classifyBmi(29.99)).toBe('OVERWEIGHT');
    expect(classifyBmi(30)).toBe('OBESE_CLASS_I');
    expect(classifyBmi(34.99)).toBe('OBESE_CLASS_I');
    expect(classifyBmi(35)).toBe('OBESE_CLASS_II');
    expect(classifyBmi(39.99)).toBe('OBESE_CLASS_II');
    expect(classifyBmi(40)).toBe('OBESE_CLASS_III');
    expect(classifyBmi(80)).toBe('OBESE_CLASS_III');
  });

  it('shares one recommendation across the obesity classes', () => {
    expect(getBmiRecommendation('UNDERWEIGHT')).toBe('consult a nutritionist for healthy weight gain');
    expect(getBmiRecommendation('NORMAL')).toBe('keep maintaining your healthy weight');
    expect(getBmiRecommendation('OVERWEIGHT')).toBe('consider regular physical activity');
    expect(getBmiRecommendation('OBESE_CLASS_I')).toBe('seek professional guidance urgently');
    expect(getBmiRecommendation('OBESE_CLASS_II')).toBe('seek professional guidance urgently');
    expect(getBmiRecommendation('OBESE_CLASS_III')).toBe('seek professional guidance urgently');
  });
});
