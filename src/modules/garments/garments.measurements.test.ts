import { describe, expect, it } from 'vitest';
import { measurementLabel, requiredMeasurements, unknownMeasurements } from './garments.measurements.js';
import { GarmentCategory } from '../../utils/constants.js';

describe('requiredMeasurements', () => {
  it('lists upper body measurements for tops', () => {
    expect(requiredMeasurements(GarmentCategory.UPPER)).toEqual([
      'chest',
      'shoulder',
      'sleeve_length',
      'arm_hole',
      'cuff',
      'neck',
    ]);
  });

  it('lists lower body measurements for bottoms', () => {
    expect(requiredMeasurements(GarmentCategory.LOWER)).toContain('inseam');
    expect(requiredMeasurements(GarmentCategory.LOWER)).not.toContain('chest');
  });

  it('combines both sets for full garments', () => {
    expect(requiredMeasurements(GarmentCategory.BOTH)).toHaveLength(14);
  });
});

describe('measurementLabel', () => {
  it('title-cases snake_case keys', () => {
    expect(measurementLabel('sleeve_length')).toBe('Sleeve Length');
    expect(measurementLabel('neck')).toBe('Neck');
  });
});

describe('unknownMeasurements', () => {
  it('flags keys outside the garment category', () => {
    expect(unknownMeasurements({ waist: 32, chest: 40, wingspan: 60 }, GarmentCategory.LOWER)).toEqual([
      'chest',
      'wingspan',
    ]);
  });

  it('accepts an empty set', () => {
    expect(unknownMeasurements({}, GarmentCategory.UPPER)).toEqual([]);
  });
});
