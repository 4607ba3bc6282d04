import { PNG } from "pngjs";
import sharp from "sharp";
import { EmptyDocumentError } from "../errors";

/** Decoded bitmap, 4 bytes (RGBA) per pixel. */
export interface RgbaImage {
  data: Buffer;
  width: number;
  height: number;
}

export interface Placement {
  index: number;
  top: number;
  width: number;
  height: number;
}

export interface StackedImage extends RgbaImage {
  placements: Placement[];
}

export function decodePng(pngBuffer: Buffer): RgbaImage {
  const png = PNG.sync.read(pngBuffer);
  return { data: png.data, width: png.width, height: png.height };
}

export function encodePng(image: RgbaImage): Buffer {
  const png = new PNG({ width: image.width, height: image.height });
  png.data = image.data;
  return PNG.sync.write(png);
}

/**
 * Stack images top to bottom in the order given. The canvas is as wide as
 * the widest image and as tall as all images together; area not covered by
 * a narrower image stays opaque white.
 */
export function stackVertically(images: RgbaImage[]): StackedImage {
  if (images.length === 0) {
    throw new EmptyDocumentError();
  }

  const width = Math.max(...images.map((img) => img.width));
  const height = images.reduce((sum, img) => sum + img.height, 0);
  if (width === 0 || height === 0) {
    throw new EmptyDocumentError(`Pages render to an empty ${width}x${height} canvas`);
  }

  const data = Buffer.alloc(width * height * 4, 0xff);
  const placements: Placement[] = [];

  let top = 0;
  images.forEach((img, index) => {
    const rowBytes = img.width * 4;
    for (let y = 0; y < img.height; y++) {
      const srcOffset = y * rowBytes;
      const dstOffset = (top + y) * width * 4;
      img.data.copy(data, dstOffset, srcOffset, srcOffset + rowBytes);
    }
    placements.push({ index, top, width: img.width, height: img.height });
    top += img.height;
  });

  return { data, width, height, placements };
}

export async function encodeJpeg(image: RgbaImage, quality: number): Promise<Buffer> {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: 4 },
  })
    .removeAlpha()
    .jpeg({ quality })
    .toBuffer();
}
