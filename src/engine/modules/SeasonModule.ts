import type { SeasonInput, SeasonResult } from '../schema/EngineResultV1';
import { PermafrostDomainError } from '../errors';
import { guardedAsin, guardedDivide } from '../utils/domain';
import { createStageLogger } from '../logger';

const log = createStageLogger('season');

/**
 * Splits the year into a cold season (air below 0 °C) and a warm season,
 * assuming a sinusoidal annual air-temperature cycle:
 *
 *   tao1 = tao · (0.5 − asin(Ta / Aa) / π)
 *   tao2 = tao − tao1
 *
 * @throws PermafrostDomainError (season_partition) when |Ta| ≥ Aa, i.e. the
 *         air never freezes or never thaws.
 */
export function runSeasonModuleV1(input: SeasonInput): SeasonResult {
  const { meanAirTempC: ta, airTempAmplitudeC: aa, secondsPerYear: tao } = input;

  if (!(Math.abs(ta) < aa)) {
    throw new PermafrostDomainError(
      'season_partition',
      'tao1',
      `|Ta| = ${Math.abs(ta)} must be below Aa = ${aa} for a freeze/thaw season split`,
    );
  }

  const ratio = guardedDivide(ta, aa, 'Ta/Aa');
  const coldSeasonS = tao * (0.5 - guardedAsin(ratio, 'tao1') / Math.PI);
  const warmSeasonS = tao - coldSeasonS;

  log.trace('tao=%d tao1=%d tao2=%d', tao, coldSeasonS, warmSeasonS);

  return { annualPeriodS: tao, coldSeasonS, warmSeasonS };
}
