import { ConfigurationError } from '../src/utils/errors.js';
import { createCrossSourceVerifier } from '../src/utils/verification.js';
import { makeRecord } from './fixtures.js';

const verifier = createCrossSourceVerifier({ toleranceInches: 2, noiseFloorInches: 0.1 });

test('corroborates readings within tolerance and keeps the primary amount', () => {
  const primary = makeRecord({ observedSnowInches: 8.5 });
  const secondary = makeRecord({ sourceId: 'weatherapi', observedSnowInches: 9 });

  const result = verifier.verify(primary, secondary);

  expect(result.isVerified).toBe(true);
  expect(result.status).toBe('corroborated');
  expect(result.verifiedSnowInches).toBe(8.5);
  expect(result.disagreementInches).toBe(0.5);
  expect(result.reducedConfidence).toBe(false);
  expect(result.secondaryRecord).toBe(secondary);
});

test('a disagreement exactly at the tolerance still corroborates', () => {
  const result = verifier.verify(
    makeRecord({ observedSnowInches: 8 }),
    makeRecord({ sourceId: 'weatherapi', observedSnowInches: 10 }),
  );
  expect(result.status).toBe('corroborated');
});

test('disputes readings beyond tolerance', () => {
  const result = verifier.verify(
    makeRecord({ observedSnowInches: 8.5 }),
    makeRecord({ sourceId: 'weatherapi', observedSnowInches: 20 }),
  );

  expect(result.isVerified).toBe(false);
  expect(result.status).toBe('disputed');
  expect(result.disagreementInches).toBe(11.5);
  expect(result.verifiedSnowInches).toBe(8.5);
});

test('without a secondary record the primary stands with reduced confidence', () => {
  const result = verifier.verify(makeRecord({ observedSnowInches: 8.5 }), null);

  expect(result).toMatchObject({
    isVerified: true,
    status: 'skipped_secondary_unavailable',
    reducedConfidence: true,
    verifiedSnowInches: 8.5,
    disagreementInches: null,
    secondaryRecord: null,
  });
});

test('trace amounts are skipped below the noise floor', () => {
  expect(verifier.needsSecondary(makeRecord({ observedSnowInches: 0.1 }))).toBe(false);
  expect(verifier.needsSecondary(makeRecord({ observedSnowInches: 0.2 }))).toBe(true);
  expect(verifier.verify(makeRecord({ observedSnowInches: 0.05 }), null).status).toBe('skipped_below_noise_floor');
});

test('an explicit skip reason wins over the inferred one', () => {
  const result = verifier.verify(makeRecord({ observedSnowInches: 0 }), null, 'skipped_secondary_unavailable');
  expect(result.status).toBe('skipped_secondary_unavailable');
});

test('refuses to compare records for different locations', () => {
  expect(() =>
    verifier.verify(makeRecord(), makeRecord({ locationId: 'snowbird', sourceId: 'weatherapi' })),
  ).toThrow('Cannot verify alta against a record for snowbird');
});

test('rejects a negative tolerance', () => {
  expect(() => createCrossSourceVerifier({ toleranceInches: -1 })).toThrow(ConfigurationError);
  expect(() => createCrossSourceVerifier({ noiseFloorInches: Number.NaN })).toThrow(ConfigurationError);
});
