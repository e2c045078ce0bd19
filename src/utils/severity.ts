import { ConfigurationError } from './errors.js';

export const SEVERITY_TIERS = ['none', 'light', 'moderate', 'heavy'] as const;

export type SeverityTier = (typeof SEVERITY_TIERS)[number];
export type AlertTier = Exclude<SeverityTier, 'none'>;

export interface SeverityThresholds {
  light: number;
  moderate: number;
  heavy: number;
}

export const DEFAULT_SEVERITY_THRESHOLDS: SeverityThresholds = {
  light: 2,
  moderate: 6,
  heavy: 12,
};

export const tierRank = (tier: SeverityTier): number => SEVERITY_TIERS.indexOf(tier);

export const isHigherTier = (candidate: SeverityTier, baseline: SeverityTier): boolean => tierRank(candidate) > tierRank(baseline);

interface ThresholdRow {
  tier: AlertTier;
  minInches: number;
}

export interface SeverityClassifier {
  readonly thresholds: Readonly<SeverityThresholds>;
  classify: (verifiedSnowInches: number) => SeverityTier;
}

/**
 * Builds the ordered threshold table once. Thresholds must be finite, positive and
 * strictly increasing (light < moderate < heavy); anything else is a ConfigurationError.
 */
export const createSeverityClassifier = (thresholds: SeverityThresholds = DEFAULT_SEVERITY_THRESHOLDS): SeverityClassifier => {
  const ascending: ThresholdRow[] = [
    { tier: 'light', minInches: thresholds.light },
    { tier: 'moderate', minInches: thresholds.moderate },
    { tier: 'heavy', minInches: thresholds.heavy },
  ];

  for (const row of ascending) {
    if (!Number.isFinite(row.minInches) || row.minInches <= 0) {
      throw new ConfigurationError(`Threshold for ${row.tier} must be a positive number of inches (got ${row.minInches}).`);
    }
  }
  for (let i = 1; i < ascending.length; i += 1) {
    const lower = ascending[i - 1];
    const upper = ascending[i];
    if (upper.minInches <= lower.minInches) {
      throw new ConfigurationError(
        `Thresholds must be strictly increasing: ${lower.tier} (${lower.minInches}) must be below ${upper.tier} (${upper.minInches}).`,
      );
    }
  }

  const descending = Object.freeze([...ascending].reverse());

  return {
    thresholds: Object.freeze({ ...thresholds }),
    classify: (verifiedSnowInches: number): SeverityTier => {
      if (!Number.isFinite(verifiedSnowInches)) {
        return 'none';
      }
      const match = descending.find((row) => verifiedSnowInches >= row.minInches);
      return match ? match.tier : 'none';
    },
  };
};
