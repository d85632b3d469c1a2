//depthcore/chart/PngEncoder.ts

import sharp from "sharp";

import { RenderingError } from "../profile/ProfileTypes";
import type { SceneEncoder } from "./SceneEncoder";
import type { ChartScene } from "./SceneTypes";
import { renderSceneToSvg } from "./SvgEncoder";

export interface PngEncoderOptions {
  /** Rasterization density in dpi; scene units are points (1/72 in). */
  density?: number;
}

/** Rasterizes the scene's SVG rendering with sharp. */
export class PngEncoder implements SceneEncoder {
  readonly format = "png";
  readonly contentType = "image/png";
  private readonly density: number;

  constructor(options: PngEncoderOptions = {}) {
    this.density = options.density ?? 100;
  }

  async encode(scene: ChartScene): Promise<Buffer> {
    try {
      const svg = Buffer.from(renderSceneToSvg(scene), "utf8");
      return await sharp(svg, { density: this.density }).flatten({ background: scene.background }).png().toBuffer();
    } catch (err) {
      throw new RenderingError("failed to rasterize scene as PNG", { cause: err });
    }
  }
}
