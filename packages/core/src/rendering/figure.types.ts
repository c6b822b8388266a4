export type PanelKind = 'overlay' | 'scatter';

export interface DataPoint {
  readonly x: number;
  readonly y: number;
}

export interface LineMark {
  readonly kind: 'line';
  readonly points: readonly DataPoint[];
  readonly color: string;
  readonly opacity: number;
  readonly dashed: boolean;
}

export interface ScatterMark {
  readonly kind: 'scatter';
  readonly points: readonly DataPoint[];
  readonly color: string;
  readonly opacity: number;
  readonly radius: number;
}

/** Vertical drop-lines from `baseline` to each point's y value. */
export interface StemMark {
  readonly kind: 'stems';
  readonly points: readonly DataPoint[];
  readonly baseline: number;
  readonly color: string;
  readonly opacity: number;
}

export type Mark = LineMark | ScatterMark | StemMark;

export interface AxisSpec {
  readonly label: string;
  readonly min: number;
  readonly max: number;
}

export interface LegendEntry {
  readonly label: string;
  readonly color: string;
}

export interface FigurePanel {
  readonly kind: PanelKind;
  readonly title: string;
  readonly xAxis: AxisSpec;
  readonly yAxis: AxisSpec;
  readonly equalAspect: boolean;
  readonly marks: readonly Mark[];
  readonly legend: readonly LegendEntry[];
}

export interface ComparisonFigure {
  readonly width: number;
  readonly height: number;
  readonly dimension: number;
  readonly panels: readonly [FigurePanel, FigurePanel];
}

export interface RenderOptions {
  readonly width?: number;
  readonly height?: number;
  readonly labels?: readonly [string, string];
}
