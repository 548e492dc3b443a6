import {
  GarmentCategory,
  LOWER_BODY_MEASUREMENTS,
  UPPER_BODY_MEASUREMENTS,
} from '../../utils/constants.js';

export type MeasurementName =
  | (typeof UPPER_BODY_MEASUREMENTS)[number]
  | (typeof LOWER_BODY_MEASUREMENTS)[number];

export function requiredMeasurements(category: GarmentCategory): MeasurementName[] {
  switch (category) {
    case GarmentCategory.UPPER:
      return [...UPPER_BODY_MEASUREMENTS];
    case GarmentCategory.LOWER:
      return [...LOWER_BODY_MEASUREMENTS];
    case GarmentCategory.BOTH:
      return [...UPPER_BODY_MEASUREMENTS, ...LOWER_BODY_MEASUREMENTS];
  }
}

/** Human label for a measurement key: "sleeve_length" → "Sleeve Length". */
export function measurementLabel(name: string): string {
  return name
    .split('_')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
}

/**
 * Measurement keys that do not belong to the garment's category.
 */
export function unknownMeasurements(measurements: Record<string, number>, category: GarmentCategory): string[] {
  const allowed = new Set<string>(requiredMeasurements(category));
  return Object.keys(measurements).filter((name) => !allowed.has(name));
}
