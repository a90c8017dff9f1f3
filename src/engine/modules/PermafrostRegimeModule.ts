import type {
  PermafrostRegimeInput,
  PermafrostRegimeResult,
  ThermalRegime,
} from '../schema/EngineResultV1';
import { PermafrostDomainError } from '../errors';
import { guardedAsin, guardedDivide, guardedSqrt } from '../utils/domain';
import { createStageLogger } from '../logger';

const log = createStageLogger('regime');

/**
 * Numerator of Kudryavtsev's TTOP equation:
 *
 *   0.5·Tgs·(Kf + Kt) + Ags·(Kt − Kf)/π · ( (Tgs/Ags)·asin(Tgs/Ags) + √(1 − (Tgs/Ags)²) )
 *
 * The second term is the thermal offset: the asymmetry between the warming
 * half-cycle (conducted through thawed ground) and the cooling half-cycle
 * (conducted through frozen ground).
 */
export function computeTtopNumerator(input: PermafrostRegimeInput): number {
  const {
    groundSurfaceTempC: tgs,
    groundSurfaceAmplitudeC: ags,
    thawedConductivity: kt,
    frozenConductivity: kf,
  } = input;

  if (!(ags > 0)) {
    throw new PermafrostDomainError(
      'amplitude_order',
      'Tps',
      `ground-surface amplitude Ags = ${ags} must be positive`,
    );
  }
  const ratio = guardedDivide(tgs, ags, 'Tgs/Ags');
  const offset = ratio * guardedAsin(ratio, 'Tps') + guardedSqrt(1 - ratio * ratio, 'Tps');
  return 0.5 * tgs * (kf + kt) + ((ags * (kt - kf)) / Math.PI) * offset;
}

/** Regime rule: a non-positive numerator selects the frozen properties. */
export function selectThermalRegime(
  ttopNumerator: number,
  input: Pick<
    PermafrostRegimeInput,
    'thawedConductivity' | 'frozenConductivity' | 'thawedHeatCapacity' | 'frozenHeatCapacity'
  >,
): ThermalRegime {
  if (ttopNumerator <= 0) {
    return { kind: 'frozen', conductivity: input.frozenConductivity, heatCapacity: input.frozenHeatCapacity };
  }
  return { kind: 'thawed', conductivity: input.thawedConductivity, heatCapacity: input.thawedHeatCapacity };
}

/**
 * PermafrostRegimeModuleV1 – TTOP and Thermal Regime
 *
 * Evaluates the TTOP numerator once, selects the governing regime from its
 * sign, and divides by that regime's conductivity:
 *
 *   Tps = numerator / K*,   K* = Kf (frozen) or Kt (thawed)
 *
 * @throws PermafrostDomainError when |Tgs| > Ags (arcsin undefined) or Ags ≤ 0.
 */
export function runPermafrostRegimeModuleV1(input: PermafrostRegimeInput): PermafrostRegimeResult {
  const ttopNumerator = computeTtopNumerator(input);
  const regime = selectThermalRegime(ttopNumerator, input);
  const ttopC = guardedDivide(ttopNumerator, regime.conductivity, 'Tps');

  log.trace('numerator=%d regime=%s Tps=%d', ttopNumerator, regime.kind, ttopC);

  const notes: string[] = [];
  if (regime.kind === 'frozen') {
    notes.push(
      `🧊 Frozen regime: TTOP = ${ttopC.toFixed(2)}°C with frozen conductivity ${regime.conductivity.toFixed(3)} W/m/K.`,
    );
  } else {
    notes.push(
      `🌡️ Thawed regime: mean annual temperature at depth is ${ttopC.toFixed(2)}°C; ` +
      `permafrost is not sustained at this site.`,
    );
  }

  return { regime, ttopNumerator, ttopC, notes };
}
