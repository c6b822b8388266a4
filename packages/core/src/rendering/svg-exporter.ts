import { createLinearScale, formatTick, niceTicks } from './axis-scale.js';
import type { LinearScale } from './axis-scale.js';
import type { ComparisonFigure, FigurePanel, LegendEntry, Mark } from './figure.types.js';

const MARGIN = { top: 60, right: 40, bottom: 70, left: 90 } as const;
const FONT_FAMILY = 'Helvetica, Arial, sans-serif';
const TICK_LENGTH = 6;

interface PlotArea {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function fmt(value: number): string {
  return String(Math.round(value * 100) / 100);
}

function plotArea(panel: FigurePanel, x: number, width: number, height: number): PlotArea {
  const innerWidth = width - MARGIN.left - MARGIN.right;
  const innerHeight = height - MARGIN.top - MARGIN.bottom;
  if (!panel.equalAspect) {
    return { x: x + MARGIN.left, y: MARGIN.top, width: innerWidth, height: innerHeight };
  }
  // Both axes share one range, so a square area gives a 1:1 aspect ratio.
  const side = Math.min(innerWidth, innerHeight);
  return {
    x: x + MARGIN.left + (innerWidth - side) / 2,
    y: MARGIN.top + (innerHeight - side) / 2,
    width: side,
    height: side,
  };
}

function renderMark(mark: Mark, sx: LinearScale, sy: LinearScale): string {
  switch (mark.kind) {
    case 'line': {
      const points = mark.points.map((p) => `${fmt(sx(p.x))},${fmt(sy(p.y))}`).join(' ');
      const dash = mark.dashed ? ' stroke-dasharray="8 6"' : '';
      return `<polyline points="${points}" fill="none" stroke="${mark.color}" stroke-width="1.5" stroke-opacity="${String(mark.opacity)}"${dash}/>`;
    }
    case 'scatter':
      return mark.points
        .map(
          (p) =>
            `<circle cx="${fmt(sx(p.x))}" cy="${fmt(sy(p.y))}" r="${String(mark.radius)}" fill="${mark.color}" fill-opacity="${String(mark.opacity)}"/>`,
        )
        .join('');
    case 'stems': {
      const base = fmt(sy(mark.baseline));
      return mark.points
        .map((p) => {
          const x = fmt(sx(p.x));
          return `<line x1="${x}" y1="${base}" x2="${x}" y2="${fmt(sy(p.y))}" stroke="${mark.color}" stroke-opacity="${String(mark.opacity)}"/>`;
        })
        .join('');
    }
  }
}

function renderAxes(panel: FigurePanel, area: PlotArea, sx: LinearScale, sy: LinearScale): string {
  const bottom = area.y + area.height;
  const right = area.x + area.width;
  const parts: string[] = [
    `<rect x="${fmt(area.x)}" y="${fmt(area.y)}" width="${fmt(area.width)}" height="${fmt(area.height)}" fill="none" stroke="#333"/>`,
  ];

  for (const tick of niceTicks(sx.domain[0], sx.domain[1])) {
    const x = fmt(sx(tick));
    parts.push(
      `<line x1="${x}" y1="${fmt(bottom)}" x2="${x}" y2="${fmt(bottom + TICK_LENGTH)}" stroke="#333"/>`,
      `<text x="${x}" y="${fmt(bottom + TICK_LENGTH + 14)}" text-anchor="middle" font-size="12">${formatTick(tick)}</text>`,
    );
  }
  for (const tick of niceTicks(sy.domain[0], sy.domain[1])) {
    const y = fmt(sy(tick));
    parts.push(
      `<line x1="${fmt(area.x - TICK_LENGTH)}" y1="${y}" x2="${fmt(area.x)}" y2="${y}" stroke="#333"/>`,
      `<text x="${fmt(area.x - TICK_LENGTH - 4)}" y="${y}" text-anchor="end" dominant-baseline="middle" font-size="12">${formatTick(tick)}</text>`,
    );
  }

  const midX = fmt((area.x + right) / 2);
  const midY = fmt((area.y + bottom) / 2);
  const yLabelX = fmt(area.x - MARGIN.left + 24);
  parts.push(
    `<text class="axis-label" x="${midX}" y="${fmt(bottom + 48)}" text-anchor="middle" font-size="14">${escapeXml(panel.xAxis.label)}</text>`,
    `<text class="axis-label" x="${yLabelX}" y="${midY}" text-anchor="middle" font-size="14" transform="rotate(-90 ${yLabelX} ${midY})">${escapeXml(panel.yAxis.label)}</text>`,
  );
  return parts.join('');
}

function renderLegend(legend: readonly LegendEntry[], area: PlotArea): string {
  if (legend.length === 0) {
    return '';
  }
  const x = area.x + area.width - 150;
  return `<g class="legend">${legend
    .map((entry, i) => {
      const y = area.y + 20 + i * 20;
      return `<line x1="${fmt(x)}" y1="${fmt(y)}" x2="${fmt(x + 24)}" y2="${fmt(y)}" stroke="${entry.color}" stroke-width="2"/><text x="${fmt(x + 32)}" y="${fmt(y)}" dominant-baseline="middle" font-size="12">${escapeXml(entry.label)}</text>`;
    })
    .join('')}</g>`;
}

function renderPanel(panel: FigurePanel, x: number, width: number, height: number): string {
  const area = plotArea(panel, x, width, height);
  const sx = createLinearScale(panel.xAxis.min, panel.xAxis.max, area.x, area.x + area.width);
  const sy = createLinearScale(panel.yAxis.min, panel.yAxis.max, area.y + area.height, area.y);

  return [
    `<g class="panel" data-panel="${panel.kind}">`,
    `<text class="title" x="${fmt(area.x + area.width / 2)}" y="${fmt(MARGIN.top - 24)}" text-anchor="middle" font-size="16" font-weight="bold">${escapeXml(panel.title)}</text>`,
    renderAxes(panel, area, sx, sy),
    `<g class="marks">${panel.marks.map((mark) => renderMark(mark, sx, sy)).join('')}</g>`,
    renderLegend(panel.legend, area),
    '</g>',
  ].join('');
}

/**
 * Serializes a figure into a standalone SVG document, with the panels
 * side by side in equal-width columns.
 */
export function exportFigureToSvg(figure: ComparisonFigure): string {
  const columnWidth = figure.width / figure.panels.length;
  const panels = figure.panels
    .map((panel, i) => renderPanel(panel, i * columnWidth, columnWidth, figure.height))
    .join('');

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${String(figure.width)}" height="${String(figure.height)}" viewBox="0 0 ${String(figure.width)} ${String(figure.height)}" font-family="${FONT_FAMILY}">`,
    `<rect width="100%" height="100%" fill="white"/>`,
    panels,
    '</svg>',
  ].join('');
}
