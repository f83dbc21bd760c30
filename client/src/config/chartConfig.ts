/**
 * Chart Constants
 *
 * Colors and sizes shared by the plot documents, so every chart kind uses the
 * same palette and the legend swatches match the series they describe.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Series Colors
// ─────────────────────────────────────────────────────────────────────────────

export const CHART_COLORS = {
  /** Forecast mean line and scatter points */
  prediction: '#ff7f0e',
  /** Alert threshold (dashed) */
  threshold: '#9575cd',
  /** 95% prediction interval band */
  band: '#d9d9d9',
  /** P(exceed) on the right axis */
  probability: '#43a047',
  /** 45° reference line */
  reference: '#000000',
  grid: '#e0e0e0',
  axis: '#555555'
} as const;

/** Location series colors, assigned in ascending location order and cycled */
export const LOCATION_PALETTE = [
  '#1f77b4',
  '#ff7f0e',
  '#2ca02c',
  '#d62728',
  '#9467bd',
  '#8c564b'
] as const;

// ─────────────────────────────────────────────────────────────────────────────
// Layout
// ─────────────────────────────────────────────────────────────────────────────

export const CHART_SIZE = {
  scatter: { width: 600, height: 450 },
  metric: { width: 400, height: 300 },
  outbreak: { width: 450, height: 350 }
} as const;

/** Share of the value span added above and below the outbreak chart's left axis */
export const Y_DOMAIN_MARGIN = 0.05;

export const BAND_OPACITY = 0.25;

export function locationColor(index: number): string {
  return LOCATION_PALETTE[index % LOCATION_PALETTE.length];
}
