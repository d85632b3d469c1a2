//depthcore/chart/SvgEncoder.ts

import { RenderingError } from "../profile/ProfileTypes";
import type { SceneEncoder } from "./SceneEncoder";
import {
  textLineCenters,
  type ChartScene,
  type LineNode,
  type PagePoint,
  type SceneNode,
  type ShapeNode,
  type TextNode,
} from "./SceneTypes";

const FONT_FAMILY = "Helvetica, Arial, sans-serif";

// Two decimals is well under a pixel at any density we rasterize at.
function num(n: number): string {
  return String(Math.round(n * 100) / 100);
}

export function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function ringPath(ring: readonly PagePoint[]): string {
  if (ring.length === 0) return "";
  const [first, ...rest] = ring;
  return `M${num(first.x)} ${num(first.y)}${rest.map((p) => `L${num(p.x)} ${num(p.y)}`).join("")}Z`;
}

function renderShape(node: ShapeNode): string {
  const d = node.rings.map(ringPath).join("");
  const fill = node.fill ?? "none";
  const stroke = node.stroke ? ` stroke="${node.stroke}" stroke-width="${num(node.strokeWidth ?? 1)}"` : "";
  return `<path d="${d}" fill="${fill}" fill-rule="evenodd"${stroke}/>`;
}

function renderLine(node: LineNode): string {
  return (
    `<line x1="${num(node.from.x)}" y1="${num(node.from.y)}" x2="${num(node.to.x)}" y2="${num(node.to.y)}"` +
    ` stroke="${node.stroke}" stroke-width="${num(node.width)}"/>`
  );
}

function renderText(node: TextNode): string {
  const offsets = textLineCenters(node);
  const weight = node.bold ? ` font-weight="bold"` : "";
  // SVG rotates clockwise for positive angles
  const rotate = node.rotation !== 0 ? ` rotate(${num(-node.rotation)})` : "";
  const spans = node.lines
    .map((l, i) => `<text x="0" y="${num(offsets[i])}">${escapeXml(l)}</text>`)
    .join("");

  return (
    `<g transform="translate(${num(node.at.x)} ${num(node.at.y)})${rotate}"` +
    ` font-family="${FONT_FAMILY}" font-size="${num(node.size)}"${weight}` +
    ` fill="${node.color}" text-anchor="${node.anchor}" dominant-baseline="central">${spans}</g>`
  );
}

function renderNode(node: SceneNode): string {
  switch (node.kind) {
    case "shape":
      return renderShape(node);
    case "line":
      return renderLine(node);
    case "text":
      return renderText(node);
  }
}

export function renderSceneToSvg(scene: ChartScene): string {
  const body = scene.nodes.map(renderNode).join("\n");
  return (
    `<?xml version="1.0" encoding="UTF-8"?>\n` +
    `<svg xmlns="http://www.w3.org/2000/svg" width="${scene.width}" height="${scene.height}"` +
    ` viewBox="0 0 ${scene.width} ${scene.height}">\n` +
    `<title>${escapeXml(scene.title)}</title>\n` +
    `${body}\n</svg>\n`
  );
}

export class SvgEncoder implements SceneEncoder {
  readonly format = "svg";
  readonly contentType = "image/svg+xml";

  async encode(scene: ChartScene): Promise<Buffer> {
    try {
      return Buffer.from(renderSceneToSvg(scene), "utf8");
    } catch (err) {
      throw new RenderingError("failed to render scene as SVG", { cause: err });
    }
  }
}
