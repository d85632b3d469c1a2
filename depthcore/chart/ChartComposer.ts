//depthcore/chart/ChartComposer.ts

/**
 * Builds the depth profile chart scene from an interpolated field.
 *
 * Pure: no randomness, no I/O. Filled bands come from d3-contour's marching
 * squares; each threshold region is painted over the lower ones, so the
 * visible color of a point is the band its value falls in.
 */

import { contours } from "d3-contour";

import { CONTOUR_LEVEL_COUNT } from "../config/profileConfig";
import { DEFAULT_CHART_CONFIG, type ChartConfig } from "../config/chartConfig";
import { clamp } from "../utils/math";
import { RenderingError, ProfileError, type InterpolatedField } from "../profile/ProfileTypes";
import { bandColors, contourLevels } from "./ColorRamp";
import {
  deepFreeze,
  type ChartScene,
  type LineNode,
  type PagePoint,
  type SceneBand,
  type SceneLegendEntry,
  type SceneNode,
  type TextNode,
} from "./SceneTypes";

// Undefined nodes are contoured as this value: far below every level, so the
// lowest band boundary lands on the last defined node.
const MASK_SENTINEL = -1e9;

const INK = "#000000";

function text(
  at: PagePoint,
  content: string,
  size: number,
  extra: Partial<Omit<TextNode, "kind" | "at" | "lines" | "size">> = {},
): TextNode {
  return {
    kind: "text",
    at,
    lines: content.split("\n"),
    size,
    anchor: "middle",
    align: "middle",
    rotation: 0,
    bold: false,
    color: INK,
    ...extra,
  };
}

function line(from: PagePoint, to: PagePoint, width = 1): LineNode {
  return { kind: "line", from, to, stroke: INK, width };
}

function rect(x: number, y: number, w: number, h: number): PagePoint[] {
  return [
    { x, y },
    { x: x + w, y },
    { x: x + w, y: y + h },
    { x, y: y + h },
  ];
}

/** Maps domain coordinates to page coordinates; depth grows downward. */
export function makeDomainProjection(field: InterpolatedField, config: ChartConfig) {
  const { domain } = field;
  const plot = config.layout.plot;
  const sx = plot.width / (domain.xMax - domain.xMin);
  const sz = plot.height / (domain.zMax - domain.zMin);

  return (x: number, z: number): PagePoint => ({
    x: plot.left + (x - domain.xMin) * sx,
    y: plot.top + (z - domain.zMin) * sz,
  });
}

function contourBands(
  field: InterpolatedField,
  levels: readonly number[],
  colors: readonly string[],
  project: (x: number, z: number) => PagePoint,
): { nodes: SceneNode[]; bands: SceneBand[] } {
  const { resolution: n, domain } = field;
  const stepX = (domain.xMax - domain.xMin) / (n - 1);
  const stepZ = (domain.zMax - domain.zMin) / (n - 1);

  const grid = Array.from(field.values, (v) => (Number.isNaN(v) ? MASK_SENTINEL : v));
  const thresholds = levels.slice(0, -1);
  const layers = contours().size([n, n]).thresholds(thresholds)(grid);

  // d3 puts grid node i at contour coordinate i + 0.5
  const toPage = (pos: number[]): PagePoint =>
    project(
      clamp(domain.xMin + (pos[0] - 0.5) * stepX, domain.xMin, domain.xMax),
      clamp(domain.zMin + (pos[1] - 0.5) * stepZ, domain.zMin, domain.zMax),
    );

  const nodes: SceneNode[] = [];
  const bands: SceneBand[] = layers.map((layer, k) => {
    for (const polygon of layer.coordinates) {
      nodes.push({
        kind: "shape",
        rings: polygon.map((ring) => ring.map(toPage)),
        fill: colors[k],
      });
    }
    return {
      index: k,
      lower: levels[k],
      upper: levels[k + 1],
      color: colors[k],
      polygonCount: layer.coordinates.length,
    };
  });

  return { nodes, bands };
}

function axisNodes(
  field: InterpolatedField,
  config: ChartConfig,
  project: (x: number, z: number) => PagePoint,
): SceneNode[] {
  const { domain } = field;
  const plot = config.layout.plot;
  const bottom = plot.top + plot.height;
  const nodes: SceneNode[] = [];

  nodes.push({ kind: "shape", rings: [rect(plot.left, plot.top, plot.width, plot.height)], stroke: INK, strokeWidth: 0.8 });

  for (const x of config.xTicks) {
    const p = project(x, domain.zMax);
    nodes.push(line({ x: p.x, y: bottom }, { x: p.x, y: bottom + 4 }, 0.8));
    nodes.push(text({ x: p.x, y: bottom + 13 }, String(x), 10));
  }
  for (const z of config.depthTicks) {
    const p = project(domain.xMin, z);
    nodes.push(line({ x: plot.left - 4, y: p.y }, { x: plot.left, y: p.y }, 0.8));
    nodes.push(text({ x: plot.left - 7, y: p.y }, String(z), 10, { anchor: "end" }));
  }

  nodes.push(text({ x: plot.left + plot.width / 2, y: bottom + 50 }, config.xLabel, 12));
  nodes.push(text({ x: plot.left - 52, y: plot.top + plot.height / 2 }, config.depthLabel, 12, { rotation: 90 }));
  nodes.push(text({ x: plot.left + plot.width / 2, y: plot.top - 40 }, config.title, 16, { bold: true }));

  return nodes;
}

function legendNodes(
  levels: readonly number[],
  colors: readonly string[],
  config: ChartConfig,
): { nodes: SceneNode[]; entries: SceneLegendEntry[] } {
  const plot = config.layout.plot;
  const bar = config.layout.legendBar;
  const lo = levels[0];
  const hi = levels[levels.length - 1];
  const barBottom = plot.top + plot.height;
  const valueY = (v: number) => barBottom - ((v - lo) / (hi - lo)) * plot.height;
  const barX = (fraction: number) => bar.left + fraction * bar.width;

  const nodes: SceneNode[] = [];

  for (let k = 0; k < colors.length; k++) {
    const top = valueY(levels[k + 1]);
    nodes.push({ kind: "shape", rings: [rect(bar.left, top, bar.width, valueY(levels[k]) - top)], fill: colors[k] });
  }
  nodes.push({ kind: "shape", rings: [rect(bar.left, plot.top, bar.width, plot.height)], stroke: INK, strokeWidth: 0.8 });

  for (const v of config.colorbarTicks) {
    const y = valueY(v);
    nodes.push(line({ x: barX(1), y }, { x: barX(1) + 3.5, y }, 0.8));
  }

  nodes.push(text({ x: barX(0.5), y: plot.top - 14 }, config.legendTitle, 12));

  const entries = config.legendEntries.map(({ label, value }) => {
    const y = valueY(value);
    nodes.push(line({ x: barX(0.95), y }, { x: barX(1.15), y }, 1));
    nodes.push(line({ x: barX(0.1), y }, { x: barX(0.2), y }, 2));
    nodes.push(text({ x: barX(1.2), y }, label, 9, { anchor: "start" }));
    return { label, value, y };
  });

  return { nodes, entries };
}

export function composeDepthChart(field: InterpolatedField, config: ChartConfig = DEFAULT_CHART_CONFIG): ChartScene {
  try {
    const range = field.valueRange;
    const levels = contourLevels(range.min, range.max, CONTOUR_LEVEL_COUNT);
    const colors = bandColors(levels);
    const project = makeDomainProjection(field, config);
    const { width, height } = config.layout;

    const contour = contourBands(field, levels, colors, project);
    const legend = legendNodes(levels, colors, config);

    const annotationNodes = config.annotations.map((a) =>
      text(project(a.x, a.z), a.text, 10, { rotation: a.rotation }),
    );
    const captionNode = text({ x: width / 2, y: height * 0.95 }, config.caption, 12, { align: "top" });

    const nodes: SceneNode[] = [
      { kind: "shape", rings: [rect(0, 0, width, height)], fill: "#ffffff" },
      ...contour.nodes,
      ...axisNodes(field, config, project),
      ...annotationNodes,
      ...legend.nodes,
      captionNode,
    ];

    return deepFreeze<ChartScene>({
      width,
      height,
      background: "#ffffff",
      title: config.title,
      levels,
      bands: contour.bands,
      annotations: config.annotations.map((a) => ({ ...a })),
      legend: {
        title: config.legendTitle,
        entries: legend.entries,
        colorbarTicks: [...config.colorbarTicks],
      },
      caption: config.caption,
      nodes,
    });
  } catch (err) {
    if (err instanceof ProfileError) throw err;
    throw new RenderingError("failed to compose depth chart", { cause: err });
  }
}
