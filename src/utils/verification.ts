import { ConfigurationError } from './errors.js';
import type { CanonicalSnowRecord } from './snow-record.js';

export const DEFAULT_VERIFICATION_TOLERANCE_INCHES = 2.0;
export const DEFAULT_NOISE_FLOOR_INCHES = 0.1;

export type VerificationStatus =
  | 'corroborated'
  | 'disputed'
  | 'skipped_below_noise_floor'
  | 'skipped_secondary_unavailable';

export type VerificationSkipReason = Extract<VerificationStatus, `skipped_${string}`>;

export interface VerificationResult {
  locationId: string;
  verifiedSnowInches: number;
  isVerified: boolean;
  status: VerificationStatus;
  /** True when the secondary source was not consulted and the primary value stands alone. */
  reducedConfidence: boolean;
  primaryRecord: CanonicalSnowRecord;
  secondaryRecord: CanonicalSnowRecord | null;
  disagreementInches: number | null;
}

export interface CrossSourceVerifierOptions {
  toleranceInches?: number;
  noiseFloorInches?: number;
}

export interface CrossSourceVerifier {
  readonly toleranceInches: number;
  readonly noiseFloorInches: number;
  needsSecondary: (primary: CanonicalSnowRecord) => boolean;
  verify: (
    primary: CanonicalSnowRecord,
    secondary: CanonicalSnowRecord | null,
    skipReason?: VerificationSkipReason,
  ) => VerificationResult;
}

export const createCrossSourceVerifier = ({
  toleranceInches = DEFAULT_VERIFICATION_TOLERANCE_INCHES,
  noiseFloorInches = DEFAULT_NOISE_FLOOR_INCHES,
}: CrossSourceVerifierOptions = {}): CrossSourceVerifier => {
  if (!Number.isFinite(toleranceInches) || toleranceInches < 0) {
    throw new ConfigurationError(`Verification tolerance must be a non-negative number of inches (got ${toleranceInches}).`);
  }
  if (!Number.isFinite(noiseFloorInches) || noiseFloorInches < 0) {
    throw new ConfigurationError(`Verification noise floor must be a non-negative number of inches (got ${noiseFloorInches}).`);
  }

  const needsSecondary = (primary: CanonicalSnowRecord): boolean => primary.observedSnowInches > noiseFloorInches;

  const verify = (
    primary: CanonicalSnowRecord,
    secondary: CanonicalSnowRecord | null,
    skipReason?: VerificationSkipReason,
  ): VerificationResult => {
    if (!secondary) {
      return {
        locationId: primary.locationId,
        verifiedSnowInches: primary.observedSnowInches,
        isVerified: true,
        status: skipReason ?? (needsSecondary(primary) ? 'skipped_secondary_unavailable' : 'skipped_below_noise_floor'),
        reducedConfidence: true,
        primaryRecord: primary,
        secondaryRecord: null,
        disagreementInches: null,
      };
    }

    if (secondary.locationId !== primary.locationId) {
      throw new Error(`Cannot verify ${primary.locationId} against a record for ${secondary.locationId}`);
    }

    const disagreementInches = Math.abs(primary.observedSnowInches - secondary.observedSnowInches);
    const isVerified = disagreementInches <= toleranceInches;

    return {
      locationId: primary.locationId,
      // Once corroborated the primary's absolute number is trusted, never an average.
      verifiedSnowInches: primary.observedSnowInches,
      isVerified,
      status: isVerified ? 'corroborated' : 'disputed',
      reducedConfidence: false,
      primaryRecord: primary,
      secondaryRecord: secondary,
      disagreementInches,
    };
  };

  return {
    toleranceInches,
    noiseFloorInches,
    needsSecondary,
    verify,
  };
};
