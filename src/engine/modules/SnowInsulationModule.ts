import type { SnowInsulationInput, SnowInsulationResult } from '../schema/EngineResultV1';
import { PermafrostDomainError } from '../errors';
import { guardedDivide, guardedLog, guardedSqrt, requireFinite } from '../utils/domain';
import { createStageLogger } from '../logger';

const log = createStageLogger('snow');

/**
 * Effective snow thermal conductivity from density (Goodrich, 1982):
 *
 *   Ksn = 2.9·10⁻⁶·ρ²      (ρ in kg/m³, Ksn in W/m/K)
 */
export function snowConductivityFromDensity(densityKgM3: number): number {
  return 2.9e-6 * densityKgM3 * densityKgM3;
}

// ─── Main Module ──────────────────────────────────────────────────────────────

/**
 * SnowInsulationModuleV1 – Snow Cover Damping of the Annual Wave
 *
 * Treats the snow pack as a layer of thickness H over a frozen half-space and
 * transmits the annual surface wave through it (thermal transmission-line
 * analogy).  Phase change in the ground is folded into an effective frozen
 * heat capacity:
 *
 *   α   = 2·Aa·Cf / L,   β = 2·|Ta|·Cf / L
 *   Cef = Cf·(α − β) / ((α − β) − ln((α + 1)/(β + 1)))
 *
 * Impedance mismatch between snow and ground gives the reflection coefficient
 *
 *   μ = (√(Ksn·Csn) − √(Kf·Cef)) / (√(Ksn·Csn) + √(Kf·Cef))
 *
 * and with k = √(π / (Dsn·tao)) the damping factor
 *
 *   s = 1 + 2μ·e^(−2kH)·cos(2kH) + μ²·e^(−4kH)
 *
 * so that a wave reaching the ground keeps the fraction (1 + μ)·e^(−kH)/√s of
 * its amplitude.  Snow lies only under the winter trough; the summer crest
 * reaches the ground unchanged, so the annual amplitude loses half of the
 * trough damping.  The reduction is weighted by the cold season and converted
 * to a mean temperature shift with the first-harmonic factor 2/π:
 *
 *   ΔA    = (Aa/2)·(1 − (1 + μ)·e^(−kH)/√s)
 *   ΔAsn  = ΔA·tao1/tao
 *   ΔTsn  = ΔAsn·2/π
 *
 * With H = 0 the transmission ratio is 1 and both corrections vanish.
 */
export function runSnowInsulationModuleV1(input: SnowInsulationInput): SnowInsulationResult {
  const {
    meanAirTempC: ta,
    airTempAmplitudeC: aa,
    frozenHeatCapacity: cf,
    frozenConductivity: kf,
    latentHeat: l,
    snowThicknessM: h,
    snowDensityKgM3,
    snowSpecificHeatJkgK,
    coldSeasonS: tao1,
    annualPeriodS: tao,
  } = input;

  const snowConductivity = snowConductivityFromDensity(snowDensityKgM3);
  const snowHeatCapacity = snowSpecificHeatJkgK * snowDensityKgM3;
  const snowDiffusivity = guardedDivide(snowConductivity, snowHeatCapacity, 'Dsn');

  // ── Effective frozen capacity (phase change) ─────────────────────────────
  const alpha = guardedDivide(2 * aa * cf, l, 'alpha');
  const beta = guardedDivide(2 * Math.abs(ta) * cf, l, 'beta');
  const spread = alpha - beta;
  const cefDenominator = spread - guardedLog(guardedDivide(alpha + 1, beta + 1, 'Cef'), 'Cef');
  if (!(cefDenominator > 0)) {
    throw new PermafrostDomainError(
      'division_by_zero',
      'Cef',
      `(α − β) − ln((α + 1)/(β + 1)) = ${cefDenominator} is not positive`,
    );
  }
  const effectiveFrozenHeatCapacity = guardedDivide(cf * spread, cefDenominator, 'Cef');

  // ── Snow/ground reflection ───────────────────────────────────────────────
  const snowEffusivity = guardedSqrt(snowConductivity * snowHeatCapacity, 'mu');
  const groundEffusivity = guardedSqrt(kf * effectiveFrozenHeatCapacity, 'mu');
  const reflectionCoefficient = guardedDivide(
    snowEffusivity - groundEffusivity,
    snowEffusivity + groundEffusivity,
    'mu',
  );

  // ── Damping through the layer ────────────────────────────────────────────
  const k = guardedSqrt(guardedDivide(Math.PI, snowDiffusivity * tao, 's'), 's');
  const mu = reflectionCoefficient;
  const dampingFactor =
    1 +
    2 * mu * Math.exp(-2 * k * h) * Math.cos(2 * k * h) +
    mu * mu * Math.exp(-4 * k * h);

  const transmitted = guardedDivide(
    (1 + mu) * Math.exp(-k * h),
    guardedSqrt(dampingFactor, 's'),
    'ΔA',
  );
  const amplitudeReductionC = requireFinite((aa / 2) * (1 - transmitted), 'ΔA');
  const seasonalAmplitudeReductionC = amplitudeReductionC * guardedDivide(tao1, tao, 'ΔAsn');
  const meanTempShiftC = (seasonalAmplitudeReductionC * 2) / Math.PI;

  log.trace(
    'Ksn=%d Csn=%d Cef=%d mu=%d s=%d ΔA=%d ΔAsn=%d ΔTsn=%d',
    snowConductivity, snowHeatCapacity, effectiveFrozenHeatCapacity, mu, dampingFactor,
    amplitudeReductionC, seasonalAmplitudeReductionC, meanTempShiftC,
  );

  const notes: string[] = [];
  if (h === 0) {
    notes.push('No snow cover: air-temperature wave reaches the surface undamped.');
  } else {
    notes.push(
      `❄️ ${h} m of snow at ${snowDensityKgM3} kg/m³ (Ksn = ${snowConductivity.toFixed(3)} W/m/K) ` +
      `damps the annual amplitude by ${seasonalAmplitudeReductionC.toFixed(2)}°C ` +
      `and warms the surface by ${meanTempShiftC.toFixed(2)}°C.`,
    );
  }

  return {
    snowConductivity,
    snowHeatCapacity,
    snowDiffusivity,
    alpha,
    beta,
    effectiveFrozenHeatCapacity,
    reflectionCoefficient,
    dampingFactor,
    amplitudeReductionC,
    seasonalAmplitudeReductionC,
    meanTempShiftC,
    notes,
  };
}
