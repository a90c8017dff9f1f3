import type { ActiveLayerInput, ActiveLayerResult } from '../schema/EngineResultV1';
import { PermafrostDomainError } from '../errors';
import { guardedDivide, guardedLog, guardedSqrt, requireFinite } from '../utils/domain';
import { createStageLogger } from '../logger';

const log = createStageLogger('active-layer');

/**
 * ActiveLayerModuleV1 – Amplitude at Permafrost Top and Active Layer Thickness
 *
 * With K and C taken from the selected regime and Q = L/(2C):
 *
 *   Aps = (Ags − |Tps|) / ln((Ags + Q)/(|Tps| + Q)) − Q
 *   Zc  = 2·(Aps − |Tps|)·√(K·tao·C/π) / (2·Aps·C + L)
 *   Zal = [ 2·(Aps − |Tps|)·√(K·tao·C/π)
 *           + (2·Aps·C·Zc + L·Zc)·L·√(K·tao/(π·C))
 *             / (2·Aps·C·Zc + L·Zc + (2·Aps·C + L)·√(K·tao/(π·C))) ] / (2·Aps·C + L)
 *
 * Aps + Q is the logarithmic mean of (Ags + Q) and (|Tps| + Q), so Aps > |Tps|
 * holds exactly when Ags > |Tps|.
 *
 * @throws PermafrostDomainError when Ags ≤ |Tps| or any log/sqrt/division is undefined.
 */
export function runActiveLayerModuleV1(input: ActiveLayerInput): ActiveLayerResult {
  const { regime, ttopC, groundSurfaceAmplitudeC: ags, latentHeat: l, annualPeriodS: tao } = input;
  const k = regime.conductivity;
  const c = regime.heatCapacity;
  const absTps = Math.abs(ttopC);

  if (!(ags > absTps)) {
    throw new PermafrostDomainError(
      'amplitude_order',
      'Aps',
      `ground-surface amplitude Ags = ${ags} must exceed |Tps| = ${absTps}`,
    );
  }

  const q = guardedDivide(l, 2 * c, 'L/2C');
  const logRatio = guardedLog(guardedDivide(ags + q, absTps + q, 'Aps'), 'Aps');
  const permafrostTopAmplitudeC = guardedDivide(ags - absTps, logRatio, 'Aps') - q;

  // ── Depths ────────────────────────────────────────────────────────────────
  const amplitudeExcess = permafrostTopAmplitudeC - absTps;
  const conductiveScale = guardedSqrt((k * tao * c) / Math.PI, 'Zc');
  const diffusiveScale = guardedSqrt(guardedDivide(k * tao, Math.PI * c, 'Zal'), 'Zal');
  const heatDemand = 2 * permafrostTopAmplitudeC * c + l;

  const characteristicDepthM = guardedDivide(2 * amplitudeExcess * conductiveScale, heatDemand, 'Zc');

  const latentCorrection = guardedDivide(
    (2 * permafrostTopAmplitudeC * c * characteristicDepthM + l * characteristicDepthM) * l * diffusiveScale,
    2 * permafrostTopAmplitudeC * c * characteristicDepthM +
      l * characteristicDepthM +
      heatDemand * diffusiveScale,
    'Zal',
  );
  const activeLayerThicknessM = requireFinite(
    guardedDivide(2 * amplitudeExcess * conductiveScale + latentCorrection, heatDemand, 'Zal'),
    'Zal',
  );

  log.trace('Aps=%d Zc=%d Zal=%d', permafrostTopAmplitudeC, characteristicDepthM, activeLayerThicknessM);

  const layer = regime.kind === 'frozen' ? 'seasonal thaw' : 'seasonal freeze';
  const notes = [
    `📏 Amplitude at the permafrost top ${permafrostTopAmplitudeC.toFixed(2)}°C; ` +
    `${layer} depth ${activeLayerThicknessM.toFixed(3)} m.`,
  ];

  return {
    permafrostTopAmplitudeC,
    characteristicDepthM,
    activeLayerThicknessM,
    notes,
  };
}
