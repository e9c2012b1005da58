/**
 * SVG rendering of a monospace text block, composited onto images by sharp.
 */

import type { Anchor, Rgb, TextStyle } from "../contracts";

/** Baseline offset of the first line, as a fraction of the point size. */
export const ASCENT_RATIO = 0.8;

export interface TextBlockLayout {
  width: number;
  height: number;
  pointSize: number;
  fill: Rgb;
  anchor: Anchor;
  style: TextStyle;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** Lines of a text block, without the empty line after a trailing newline. */
export function splitLines(text: string): string[] {
  const lines = text.split("\n");
  if (lines.length > 1 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Create an SVG overlay of `layout.width` x `layout.height` with the text
 * drawn at the anchor. Returns a Buffer containing the SVG markup.
 */
export function createTextBlockSvg(text: string, layout: TextBlockLayout): Buffer {
  const { width, height, pointSize, fill, anchor, style } = layout;
  const lines = splitLines(text);
  const lineHeight = pointSize * style.lineHeightRatio;
  const blockHeight = lines.length * lineHeight;

  const top = anchor === "center" ? (height - blockHeight) / 2 : 0;
  const x = anchor === "center" ? width / 2 : 0;
  const textAnchor = anchor === "center" ? "middle" : "start";

  const tspans = lines
    .map((line, i) => {
      const y = top + i * lineHeight + pointSize * ASCENT_RATIO;
      return `<tspan x="${x}" y="${y.toFixed(2)}">${escapeXml(line)}</tspan>`;
    })
    .join("");

  const svg = `
<svg width="${width}" height="${height}" xmlns="http://www.w3.org/2000/svg">
  <text
    xml:space="preserve"
    font-family="${escapeXml(style.fontFamily)}"
    font-size="${pointSize}px"
    fill="rgb(${fill[0]},${fill[1]},${fill[2]})"
    text-anchor="${textAnchor}"
    style="white-space: pre"
  >${tspans}</text>
</svg>`;

  return Buffer.from(svg);
}
