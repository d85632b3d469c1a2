//depthcore/chart/SceneEncoder.ts

import type { ChartScene } from "./SceneTypes";

export type SceneFormat = "svg" | "png" | "pdf";

/** Turns a finished scene into bytes. Failures surface as RenderingError. */
export interface SceneEncoder {
  readonly format: SceneFormat;
  readonly contentType: string;
  encode(scene: ChartScene): Promise<Buffer>;
}
