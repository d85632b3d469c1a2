//depthcore/chart/DepthChart.ts

import { generateDepthProfile, type DepthProfileOptions } from "../profile/ProfilePipeline";
import type { ChartConfig } from "../config/chartConfig";
import { composeDepthChart } from "./ChartComposer";
import type { SceneEncoder } from "./SceneEncoder";
import type { ChartScene } from "./SceneTypes";

/** Runs the generation pipeline and composes the chart scene. */
export function buildDepthProfileScene(options: DepthProfileOptions = {}, config?: ChartConfig): ChartScene {
  const profile = generateDepthProfile(options);
  return composeDepthChart(profile.field, config);
}

export interface RenderedChart {
  bytes: Buffer;
  contentType: string;
}

export async function renderDepthProfile(
  encoder: SceneEncoder,
  options: DepthProfileOptions = {},
): Promise<RenderedChart> {
  const scene = buildDepthProfileScene(options);
  const bytes = await encoder.encode(scene);
  return { bytes, contentType: encoder.contentType };
}
