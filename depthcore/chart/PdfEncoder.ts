//depthcore/chart/PdfEncoder.ts

import PDFDocument from "pdfkit";

import { Logger } from "../utils/logger";
import { RenderingError } from "../profile/ProfileTypes";
import type { SceneEncoder } from "./SceneEncoder";
import {
  textLineCenters,
  type ChartScene,
  type PagePoint,
  type SceneNode,
  type ShapeNode,
  type TextNode,
} from "./SceneTypes";

const log = Logger.scope("ENCODER");

type PdfDoc = InstanceType<typeof PDFDocument>;

function tracePath(doc: PdfDoc, ring: readonly PagePoint[]): void {
  ring.forEach((p, i) => {
    if (i === 0) doc.moveTo(p.x, p.y);
    else doc.lineTo(p.x, p.y);
  });
  doc.closePath();
}

function drawShape(doc: PdfDoc, node: ShapeNode): void {
  for (const ring of node.rings) tracePath(doc, ring);

  if (node.fill && node.stroke) {
    doc.lineWidth(node.strokeWidth ?? 1).fillAndStroke(node.fill, node.stroke, "even-odd");
  } else if (node.fill) {
    doc.fill(node.fill, "even-odd");
  } else if (node.stroke) {
    doc.lineWidth(node.strokeWidth ?? 1).stroke(node.stroke);
  }
}

function drawText(doc: PdfDoc, node: TextNode): void {
  const offsets = textLineCenters(node);

  doc.save();
  doc.translate(node.at.x, node.at.y);
  // pdfkit rotates clockwise for positive angles
  if (node.rotation !== 0) doc.rotate(-node.rotation);
  doc.font(node.bold ? "Helvetica-Bold" : "Helvetica").fontSize(node.size).fillColor(node.color);

  node.lines.forEach((line, i) => {
    const w = doc.widthOfString(line);
    const x = node.anchor === "start" ? 0 : node.anchor === "middle" ? -w / 2 : -w;
    doc.text(line, x, offsets[i], { lineBreak: false, baseline: "middle" });
  });

  doc.restore();
}

function drawNode(doc: PdfDoc, node: SceneNode): void {
  switch (node.kind) {
    case "shape":
      drawShape(doc, node);
      break;
    case "line":
      doc.moveTo(node.from.x, node.from.y).lineTo(node.to.x, node.to.y).lineWidth(node.width).stroke(node.stroke);
      break;
    case "text":
      drawText(doc, node);
      break;
  }
}

/**
 * Draws the scene as vectors on a single page the size of the scene.
 * The document is ended on every path, so its stream never outlives a call.
 */
export class PdfEncoder implements SceneEncoder {
  readonly format = "pdf";
  readonly contentType = "application/pdf";

  async encode(scene: ChartScene): Promise<Buffer> {
    const doc = new PDFDocument({
      size: [scene.width, scene.height],
      margin: 0,
      info: { Title: scene.title },
    });

    const chunks: Buffer[] = [];
    const finished = new Promise<Buffer>((resolve, reject) => {
      doc.on("data", (chunk: Buffer) => chunks.push(chunk));
      doc.on("end", () => resolve(Buffer.concat(chunks)));
      doc.on("error", reject);
    });

    let drawError: unknown = null;
    try {
      for (const node of scene.nodes) drawNode(doc, node);
    } catch (err) {
      drawError = err;
    } finally {
      doc.end();
    }

    let bytes: Buffer;
    try {
      bytes = await finished;
    } catch (err) {
      throw new RenderingError("PDF stream failed", { cause: err });
    }

    if (drawError !== null) {
      throw new RenderingError("failed to draw scene as PDF", { cause: drawError });
    }

    log.debug(`encoded PDF (${bytes.length} bytes, ${scene.nodes.length} nodes)`);
    return bytes;
  }
}
