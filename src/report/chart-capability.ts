import type { PillarScore } from '../common/types/scoring';

export const CHART_CAPABILITY = Symbol('CHART_CAPABILITY');

/** Optional charting. Reports stay valid without it. */
export interface ChartCapability {
  isAvailable(): boolean;
  /** PNG bytes, or null when the chart could not be drawn. */
  renderRadar(pillarScores: readonly PillarScore[]): Promise<Buffer | null>;
}
