/**
 * Image collaborators backed by sharp: probing, blank canvases, text
 * overlay and text measurement.
 */

import * as fs from "fs";
import sharp from "sharp";
import { ExternalToolError, InputError, errorMessage } from "../lib/errors";
import { createTextBlockSvg } from "./textSvg";
import { testBlock } from "../core/geometry";
import type { TextMeasurer } from "../core/geometry";
import type { Anchor, Rgb, Size, TextStyle } from "../contracts";

export interface DrawTextOptions {
  pointSize: number;
  color: Rgb;
  anchor: Anchor;
}

export interface ImageTools {
  /** Display dimensions of an image. */
  probe(imagePath: string): Promise<Size>;
  measureText: TextMeasurer;
  blankCanvas(outputPath: string, size: Size, color: Rgb): Promise<void>;
  /** Draw `text` onto the canvas and save the result to `outputPath`. */
  drawText(
    canvasPath: string,
    outputPath: string,
    text: string,
    options: DrawTextOptions
  ): Promise<void>;
}

/** EXIF orientations 5-8 are rotated by 90 or 270 degrees. */
function isQuarterTurn(orientation: number | undefined): boolean {
  return orientation !== undefined && orientation >= 5 && orientation <= 8;
}

export async function probeImage(imagePath: string): Promise<Size> {
  if (!fs.existsSync(imagePath)) {
    throw new InputError(`The file path '${imagePath}' does not exist.`, "not-found", imagePath);
  }

  let meta: sharp.Metadata;
  try {
    meta = await sharp(imagePath).metadata();
  } catch (err) {
    throw new InputError(
      `Format not supported: ${imagePath} (${errorMessage(err)})`,
      "unsupported-format",
      imagePath
    );
  }

  if (!meta.width || !meta.height) {
    throw new InputError(
      `Cannot read dimensions from image: ${imagePath}`,
      "unsupported-format",
      imagePath
    );
  }

  return isQuarterTurn(meta.orientation)
    ? { width: meta.height, height: meta.width }
    : { width: meta.width, height: meta.height };
}

export function createImageTools(style: TextStyle): ImageTools {
  async function measureText(
    cols: number,
    lines: number,
    pointSize: number,
    box: Size
  ): Promise<Size> {
    try {
      const overlay = createTextBlockSvg(testBlock(cols, lines), {
        width: box.width,
        height: box.height,
        pointSize,
        fill: [0, 0, 0],
        anchor: "top-left",
        style,
      });

      const rendered = await sharp({
        create: {
          width: box.width,
          height: box.height,
          channels: 3,
          background: { r: 255, g: 255, b: 255 },
        },
      })
        .composite([{ input: overlay, top: 0, left: 0 }])
        .png()
        .toBuffer();

      // Trim to the bounds of everything that differs from the white corner.
      const trimmed = await sharp(rendered).trim().toBuffer({ resolveWithObject: true });
      return { width: trimmed.info.width, height: trimmed.info.height };
    } catch (err) {
      throw new ExternalToolError(
        `Cannot measure a ${cols}x${lines} text block at ${pointSize}pt: ${errorMessage(err)}`,
        "measure"
      );
    }
  }

  async function blankCanvas(outputPath: string, size: Size, color: Rgb): Promise<void> {
    try {
      await sharp({
        create: {
          width: size.width,
          height: size.height,
          channels: 3,
          background: { r: color[0], g: color[1], b: color[2] },
        },
      })
        .png()
        .toFile(outputPath);
    } catch (err) {
      throw new ExternalToolError(
        `Cannot create a ${size.width}x${size.height} canvas: ${errorMessage(err)}`,
        "canvas"
      );
    }
  }

  async function drawText(
    canvasPath: string,
    outputPath: string,
    text: string,
    options: DrawTextOptions
  ): Promise<void> {
    try {
      const meta = await sharp(canvasPath).metadata();
      if (!meta.width || !meta.height) {
        throw new Error(`Cannot read dimensions from canvas: ${canvasPath}`);
      }

      const overlay = createTextBlockSvg(text, {
        width: meta.width,
        height: meta.height,
        pointSize: options.pointSize,
        fill: options.color,
        anchor: options.anchor,
        style,
      });

      // Output format follows the extension of outputPath.
      await sharp(canvasPath)
        .composite([{ input: overlay, top: 0, left: 0 }])
        .toFile(outputPath);
    } catch (err) {
      throw new ExternalToolError(
        `Cannot draw text onto ${canvasPath}: ${errorMessage(err)}`,
        "text-overlay"
      );
    }
  }

  return { probe: probeImage, measureText, blankCanvas, drawText };
}
