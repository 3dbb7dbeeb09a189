/**
 * Example: Render Shapes
 *
 * Builds a two-page document from plain element objects: shapes, text,
 * a path, a transformed group and a small embedded image.
 *
 * Run: npx tsx examples/01-basic/render-shapes.ts
 */

import {
  type DocumentElement,
  ImageRegistry,
  renderDocumentWithWarnings,
  renderOperators,
} from "../../src/index";
import { formatBytes, saveOutput } from "../utils";

// 2x2 RGB checkerboard
const checker = new Uint8Array([255, 0, 0, 255, 255, 255, 255, 255, 255, 255, 0, 0]);

const images = new ImageRegistry().register("checker", {
  width: 2,
  height: 2,
  pixels: { data: checker, colorSpace: "DeviceRGB", bitsPerComponent: 8 },
});

const document: DocumentElement = {
  type: "document",
  title: "Shapes",
  author: "Examples",
  margins: [36, 36, 36, 36],
  pages: [
    {
      type: "page",
      children: [
        { type: "text", x: 72, y: 72, font: "Helvetica", size: 24, content: "Shapes" },
        { type: "rect", x: 72, y: 120, width: 200, height: 100, fill: "#3366cc", stroke: "black", strokeWidth: 2 },
        { type: "circle", cx: 400, cy: 170, r: 50, fill: "yellow", stroke: "red" },
        { type: "line", x1: 72, y1: 260, x2: 540, y2: 260, strokeWidth: 0.5 },
        { type: "path", d: "M 72 300 l 100 0 l -50 80 z", fill: "green" },
        {
          type: "group",
          transforms: [
            { type: "translate", dx: 300, dy: 400 },
            { type: "rotate", degrees: 15 },
          ],
          children: [{ type: "rect", x: 0, y: 0, width: 80, height: 40, stroke: "magenta" }],
        },
      ],
    },
    {
      type: "page",
      width: 842,
      height: 595,
      children: [
        { type: "text", x: 72, y: 72, font: "Times New Roman", size: 18, content: "Landscape page" },
        { type: "image", x: 72, y: 120, width: 120, height: 120, src: "checker" },
      ],
    },
  ],
};

async function main() {
  console.log("Rendering a single element:\n");
  console.log(renderOperators({ type: "circle", cx: 50, cy: 50, r: 10, fill: "red" }));

  const { text, warnings } = renderDocumentWithWarnings(document, { images });

  for (const warning of warnings) {
    console.warn(`warning: ${warning}`);
  }

  const path = await saveOutput("shapes.pdf", new TextEncoder().encode(text));

  console.log(`\nWrote ${path} (${formatBytes(text.length)})`);
}

main().catch(error => {
  console.error(error);
  process.exitCode = 1;
});
