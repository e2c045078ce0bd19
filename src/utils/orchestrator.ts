import { classifyEngineError, errorMessage, type EngineErrorClass } from './errors.js';
import type { SnowLocation } from './locations.js';
import type { CooldownTracker } from './cooldown.js';
import type { SeverityClassifier, SeverityTier } from './severity.js';
import { buildCanonicalSnowRecord, type CanonicalSnowRecord, type ProviderPayload } from './snow-record.js';
import type { CrossSourceVerifier, VerificationStatus, VerificationSkipReason } from './verification.js';

export type SuppressionReason = 'data_unavailable' | 'verification_failed' | 'below_threshold' | 'cooldown_active';

export type FetchOutcome =
  | { ok: true; payload: ProviderPayload }
  | { ok: false; error: unknown };

export interface LocationObservations {
  location: SnowLocation;
  primary: FetchOutcome;
  /** null when the secondary source was not requested this cycle. */
  secondary: FetchOutcome | null;
}

export interface AlertDecision {
  locationId: string;
  locationName: string;
  tier: SeverityTier;
  verifiedSnowInches: number;
  shouldNotify: boolean;
  reasonIfSuppressed: SuppressionReason | null;
  verification: VerificationStatus | null;
  reducedConfidence: boolean;
  disagreementInches: number | null;
  errorClass: EngineErrorClass | null;
  errorMessage: string | null;
  secondaryErrorMessage: string | null;
  primaryRecord: CanonicalSnowRecord | null;
  secondaryRecord: CanonicalSnowRecord | null;
}

export interface CycleReport {
  evaluatedAt: string;
  locationsProcessed: number;
  alertsTriggered: number;
  errors: number;
  decisions: AlertDecision[];
}

export interface DecisionOrchestrator {
  needsSecondary: (location: SnowLocation, primaryPayload: ProviderPayload) => boolean;
  evaluateLocation: (observations: LocationObservations, now: Date) => AlertDecision;
  evaluateCycle: (batch: LocationObservations[], now: Date) => CycleReport;
}

interface CreateDecisionOrchestratorOptions {
  classifier: SeverityClassifier;
  verifier: CrossSourceVerifier;
  tracker: CooldownTracker;
  debug?: (message: string) => void;
}

type RecordResolution = { record: CanonicalSnowRecord; error: null } | { record: null; error: unknown };

const resolveRecord = (outcome: FetchOutcome, location: SnowLocation): RecordResolution => {
  if (!outcome.ok) {
    return { record: null, error: outcome.error };
  }
  try {
    return { record: buildCanonicalSnowRecord(outcome.payload, location), error: null };
  } catch (error) {
    return { record: null, error };
  }
};

const unavailableDecision = (location: SnowLocation, error: unknown): AlertDecision => ({
  locationId: location.id,
  locationName: location.name,
  tier: 'none',
  verifiedSnowInches: 0,
  shouldNotify: false,
  reasonIfSuppressed: 'data_unavailable',
  verification: null,
  reducedConfidence: false,
  disagreementInches: null,
  errorClass: classifyEngineError(error),
  errorMessage: errorMessage(error),
  secondaryErrorMessage: null,
  primaryRecord: null,
  secondaryRecord: null,
});

/**
 * Composes record building, verification, classification and cooldown for a batch.
 * Purely synchronous: every payload has already been fetched. Any per-location failure
 * becomes a non-notifying decision and the rest of the batch still runs.
 */
export const createDecisionOrchestrator = ({
  classifier,
  verifier,
  tracker,
  debug = () => {},
}: CreateDecisionOrchestratorOptions): DecisionOrchestrator => {
  const needsSecondary = (location: SnowLocation, primaryPayload: ProviderPayload): boolean => {
    const { record } = resolveRecord({ ok: true, payload: primaryPayload }, location);
    return record !== null && verifier.needsSecondary(record);
  };

  const decide = ({ location, primary, secondary }: LocationObservations, now: Date): AlertDecision => {
    const primaryResolution = resolveRecord(primary, location);
    if (primaryResolution.record === null) {
      debug(`[cycle] ${location.id}: primary data unavailable (${errorMessage(primaryResolution.error)})`);
      return unavailableDecision(location, primaryResolution.error);
    }
    const primaryRecord = primaryResolution.record;

    let secondaryRecord: CanonicalSnowRecord | null = null;
    let secondaryErrorMessage: string | null = null;
    let skipReason: VerificationSkipReason | undefined;
    if (secondary) {
      const secondaryResolution = resolveRecord(secondary, location);
      if (secondaryResolution.record === null) {
        secondaryErrorMessage = errorMessage(secondaryResolution.error);
        skipReason = 'skipped_secondary_unavailable';
        debug(`[cycle] ${location.id}: secondary data unavailable (${secondaryErrorMessage}), using primary alone`);
      } else {
        secondaryRecord = secondaryResolution.record;
      }
    }

    const verification = verifier.verify(primaryRecord, secondaryRecord, skipReason);
    // Unverified readings never classify above none.
    const tier: SeverityTier = verification.isVerified ? classifier.classify(verification.verifiedSnowInches) : 'none';

    let reasonIfSuppressed: SuppressionReason | null = null;
    if (!verification.isVerified) {
      reasonIfSuppressed = 'verification_failed';
    } else if (tier === 'none') {
      reasonIfSuppressed = 'below_threshold';
    } else if (!tracker.shouldAlert(location.id, tier, now)) {
      reasonIfSuppressed = 'cooldown_active';
    }

    debug(
      `[cycle] ${location.id}: ${verification.verifiedSnowInches.toFixed(2)}in ${verification.status} -> ${tier}` +
        (reasonIfSuppressed ? ` (suppressed: ${reasonIfSuppressed})` : ' (notify)'),
    );

    return {
      locationId: location.id,
      locationName: location.name,
      tier,
      verifiedSnowInches: verification.verifiedSnowInches,
      shouldNotify: reasonIfSuppressed === null,
      reasonIfSuppressed,
      verification: verification.status,
      reducedConfidence: verification.reducedConfidence,
      disagreementInches: verification.disagreementInches,
      errorClass: null,
      errorMessage: null,
      secondaryErrorMessage,
      primaryRecord,
      secondaryRecord,
    };
  };

  const evaluateLocation = (observations: LocationObservations, now: Date): AlertDecision => {
    try {
      return decide(observations, now);
    } catch (error) {
      console.error(`[cycle] ${observations.location.id}: evaluation failed:`, errorMessage(error));
      return unavailableDecision(observations.location, error);
    }
  };

  const evaluateCycle = (batch: LocationObservations[], now: Date): CycleReport => {
    const decisions = batch.map((observations) => evaluateLocation(observations, now));
    return {
      evaluatedAt: now.toISOString(),
      locationsProcessed: decisions.length,
      alertsTriggered: decisions.filter((decision) => decision.shouldNotify).length,
      errors: decisions.filter((decision) => decision.errorClass !== null).length,
      decisions,
    };
  };

  return {
    needsSecondary,
    evaluateLocation,
    evaluateCycle,
  };
};
