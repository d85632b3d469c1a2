//depthcore/chart/SceneTypes.ts

/**
 * Renderer-agnostic chart description.
 *
 * `nodes` is a display list in page coordinates (origin top-left, y down),
 * painted in order. The remaining fields keep the semantic content the list
 * was built from so callers can inspect a scene without parsing geometry.
 */

export interface PagePoint {
  x: number;
  y: number;
}

export type TextAnchor = "start" | "middle" | "end";

/** Where `at.y` sits relative to the text block. */
export type TextAlign = "middle" | "top";

export interface ShapeNode {
  kind: "shape";
  /** Closed rings; holes are painted with the even-odd rule. */
  rings: PagePoint[][];
  fill?: string;
  stroke?: string;
  strokeWidth?: number;
}

export interface LineNode {
  kind: "line";
  from: PagePoint;
  to: PagePoint;
  stroke: string;
  width: number;
}

export interface TextNode {
  kind: "text";
  at: PagePoint;
  lines: string[];
  size: number;
  anchor: TextAnchor;
  align: TextAlign;
  /** Degrees, counter-clockwise, about `at`. */
  rotation: number;
  bold: boolean;
  color: string;
}

export type SceneNode = ShapeNode | LineNode | TextNode;

export interface SceneBand {
  index: number;
  lower: number;
  upper: number;
  color: string;
  polygonCount: number;
}

export interface SceneAnnotation {
  text: string;
  x: number;
  z: number;
  rotation: number;
}

export interface SceneLegendEntry {
  label: string;
  value: number;
  /** Page y of the entry on the shared color bar. */
  y: number;
}

export interface ChartScene {
  width: number;
  height: number;
  background: string;
  title: string;
  levels: readonly number[];
  bands: readonly SceneBand[];
  annotations: readonly SceneAnnotation[];
  legend: {
    title: string;
    entries: readonly SceneLegendEntry[];
    colorbarTicks: readonly number[];
  };
  caption: string;
  nodes: readonly SceneNode[];
}

export const LINE_HEIGHT = 1.2;

/**
 * Vertical center of each line of a text node, as an offset from `at` along
 * the node's own (unrotated) y axis.
 */
export function textLineCenters(node: TextNode): number[] {
  const step = node.size * LINE_HEIGHT;
  const n = node.lines.length;
  const first = node.align === "top" ? step / 2 : -((n - 1) * step) / 2;
  return node.lines.map((_, i) => first + i * step);
}

/** Recursively freezes plain objects and arrays. */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
