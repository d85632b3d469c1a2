// depthcore/test/encoders.test.ts
import test from "node:test";
import assert from "node:assert/strict";

import sharp from "sharp";

import { composeDepthChart } from "../chart/ChartComposer";
import { PdfEncoder } from "../chart/PdfEncoder";
import { PngEncoder } from "../chart/PngEncoder";
import type { ChartScene } from "../chart/SceneTypes";
import { SvgEncoder, escapeXml, renderSceneToSvg } from "../chart/SvgEncoder";
import { DEFAULT_CHART_CONFIG } from "../config/chartConfig";
import { RenderingError } from "../profile/ProfileTypes";
import { uniformField } from "./fieldFixtures";

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

function brokenScene(): ChartScene {
  return {
    width: 100,
    height: 100,
    background: "#ffffff",
    title: "broken",
    levels: [],
    bands: [],
    annotations: [],
    legend: { title: "", entries: [], colorbarTicks: [] },
    caption: "",
    nodes: [{ kind: "line", from: { x: Number.NaN, y: 0 }, to: { x: 10, y: 10 }, stroke: "#000000", width: 1 }],
  };
}

test("SvgEncoder: escapeXml covers markup characters", () => {
  assert.equal(escapeXml(`a<b & "c" 'd'>`), "a&lt;b &amp; &quot;c&quot; &apos;d&apos;&gt;");
});

test("SvgEncoder: document carries page size, title and text", () => {
  const svg = renderSceneToSvg(composeDepthChart(uniformField(500)));

  assert.ok(svg.startsWith(`<?xml version="1.0" encoding="UTF-8"?>\n<svg `));
  assert.ok(svg.includes(`width="864" height="576" viewBox="0 0 864 576"`));
  assert.ok(svg.includes("<title>Earth Depth Profile</title>"));
  assert.ok(svg.includes(`<text x="0" y="-6">Soft Rock</text><text x="0" y="6">And Dry Sand</text>`));
  assert.ok(svg.includes(`<g transform="translate(20 265) rotate(-90)"`));
  assert.ok(svg.endsWith("</svg>\n"));
});

test("SvgEncoder: user-visible strings are escaped", () => {
  const scene = composeDepthChart(uniformField(500), { ...DEFAULT_CHART_CONFIG, title: "Rock & <Soil>" });
  const svg = renderSceneToSvg(scene);

  assert.ok(svg.includes("<title>Rock &amp; &lt;Soil&gt;</title>"));
  assert.ok(!svg.includes("Rock & <Soil>"));
});

test("SvgEncoder: encode yields the same document as bytes", async () => {
  const scene = composeDepthChart(uniformField(500));
  const encoder = new SvgEncoder();

  assert.equal(encoder.contentType, "image/svg+xml");
  const bytes = await encoder.encode(scene);
  assert.equal(bytes.toString("utf8"), renderSceneToSvg(scene));
});

test("PngEncoder: rasterizes at the configured density", async () => {
  const encoder = new PngEncoder({ density: 36 });
  const bytes = await encoder.encode(composeDepthChart(uniformField(500)));

  assert.deepEqual(bytes.subarray(0, 8), PNG_SIGNATURE);
  const meta = await sharp(bytes).metadata();
  assert.equal(meta.format, "png");
  // 864 x 576 points at 36 dpi
  assert.equal(meta.width, 432);
  assert.equal(meta.height, 288);
});

test("PdfEncoder: produces a complete single-page PDF", async () => {
  const encoder = new PdfEncoder();
  const bytes = await encoder.encode(composeDepthChart(uniformField(500)));

  assert.equal(encoder.contentType, "application/pdf");
  assert.equal(bytes.subarray(0, 5).toString("latin1"), "%PDF-");
  assert.ok(bytes.subarray(-16).toString("latin1").includes("%%EOF"));
});

test("PdfEncoder: a drawing failure surfaces as RenderingError", async () => {
  await assert.rejects(new PdfEncoder().encode(brokenScene()), RenderingError);
});
