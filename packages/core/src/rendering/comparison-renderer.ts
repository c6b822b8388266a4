import type { EmbeddingVector } from '@embedlens/shared/src/types/embedding.types.js';
import { assertComparable, valueRange } from '@embedlens/shared/src/utils/math.js';
import type {
  ComparisonFigure,
  DataPoint,
  FigurePanel,
  Mark,
  RenderOptions,
} from './figure.types.js';

export const DEFAULT_FIGURE_WIDTH = 2000;
export const DEFAULT_FIGURE_HEIGHT = 800;
export const DEFAULT_LABELS: readonly [string, string] = ['Embedding 1', 'Embedding 2'];

export const SERIES_COLORS: readonly [string, string] = ['blue', 'red'];
export const SCATTER_COLOR = 'green';
export const REFERENCE_COLOR = 'black';

const LINE_OPACITY = 0.5;
const STEM_OPACITY = 0.2;
const SCATTER_OPACITY = 0.5;
const MARKER_RADIUS = 3;

function indexedPoints(vector: EmbeddingVector): DataPoint[] {
  return vector.map((value, index) => ({ x: index, y: value }));
}

function seriesMarks(vector: EmbeddingVector, color: string): Mark[] {
  const points = indexedPoints(vector);
  return [
    { kind: 'line', points, color, opacity: LINE_OPACITY, dashed: false },
    { kind: 'scatter', points, color, opacity: 1, radius: MARKER_RADIUS },
    { kind: 'stems', points, baseline: 0, color, opacity: STEM_OPACITY },
  ];
}

function buildOverlayPanel(
  first: EmbeddingVector,
  second: EmbeddingVector,
  labels: readonly [string, string],
): FigurePanel {
  const { min, max } = valueRange(first, second);
  return {
    kind: 'overlay',
    title: 'Embedding Vectors Visualization',
    xAxis: { label: 'Embedding Dimension', min: 0, max: first.length - 1 },
    // Stems hang from zero, so the value axis always includes it.
    yAxis: { label: 'Value', min: Math.min(0, min), max: Math.max(0, max) },
    equalAspect: false,
    marks: [...seriesMarks(first, SERIES_COLORS[0]), ...seriesMarks(second, SERIES_COLORS[1])],
    legend: [
      { label: labels[0], color: SERIES_COLORS[0] },
      { label: labels[1], color: SERIES_COLORS[1] },
    ],
  };
}

function buildScatterPanel(
  first: EmbeddingVector,
  second: EmbeddingVector,
  labels: readonly [string, string],
): FigurePanel {
  const { min, max } = valueRange(first, second);
  const points = first.map((value, index) => ({ x: value, y: second[index] }));
  return {
    kind: 'scatter',
    title: `Dimension-wise Comparison: ${labels[0]} vs ${labels[1]}`,
    xAxis: { label: labels[0], min, max },
    yAxis: { label: labels[1], min, max },
    equalAspect: true,
    marks: [
      { kind: 'scatter', points, color: SCATTER_COLOR, opacity: SCATTER_OPACITY, radius: MARKER_RADIUS },
      {
        kind: 'line',
        points: [
          { x: min, y: min },
          { x: max, y: max },
        ],
        color: REFERENCE_COLOR,
        opacity: LINE_OPACITY,
        dashed: true,
      },
    ],
    legend: [],
  };
}

/**
 * Builds the two-panel comparison: a per-dimension overlay of both vectors
 * and a dimension-wise scatter against the identity line. Throws before
 * building anything if the pair cannot be compared.
 */
export function renderComparison(
  first: EmbeddingVector,
  second: EmbeddingVector,
  options: RenderOptions = {},
): ComparisonFigure {
  assertComparable(first, second);

  const labels = options.labels ?? DEFAULT_LABELS;

  return {
    width: options.width ?? DEFAULT_FIGURE_WIDTH,
    height: options.height ?? DEFAULT_FIGURE_HEIGHT,
    dimension: first.length,
    panels: [buildOverlayPanel(first, second, labels), buildScatterPanel(first, second, labels)],
  };
}
