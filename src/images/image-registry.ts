/**
 * Image resolution for image elements.
 *
 * The emitter only needs a resource name and the image's natural size to
 * scale it into place. Raw pixel data is optional: when present the
 * document writer embeds an /XObject /Image for it, otherwise the name is
 * only referenced from the page resources.
 */

import { AttributeValidationError } from "#src/errors";

/**
 * Uncompressed samples, row by row, top row first.
 */
export interface ImagePixels {
  data: Uint8Array;
  colorSpace: "DeviceRGB" | "DeviceGray";
  bitsPerComponent: 1 | 2 | 4 | 8;
}

/**
 * An image ready to be drawn with `Do`.
 */
export interface ResolvedImage {
  /** XObject resource name, without the slash (`Im1`) */
  resourceName: string;
  naturalWidth: number;
  naturalHeight: number;
  pixels?: ImagePixels;
}

/**
 * Looks up images by the `src` of an image element.
 *
 * Resolution is synchronous; a resolver that loads from disk or network
 * must be warmed before rendering.
 */
export interface ImageResolver {
  /**
   * @throws {AttributeValidationError} when the source is unknown
   */
  resolve(src: string): ResolvedImage;
}

/**
 * An image handed to {@link ImageRegistry.register}.
 */
export interface ImageSource {
  width: number;
  height: number;
  pixels?: ImagePixels;
}

const COMPONENTS: Record<ImagePixels["colorSpace"], number> = {
  DeviceRGB: 3,
  DeviceGray: 1,
};

/**
 * Expected byte length of an image's sample data.
 */
export function pixelDataLength(width: number, height: number, pixels: ImagePixels): number {
  const bitsPerRow = width * COMPONENTS[pixels.colorSpace] * pixels.bitsPerComponent;

  return Math.ceil(bitsPerRow / 8) * height;
}

/**
 * In-memory image resolver.
 *
 * Sources are registered up front. Each is given a resource name
 * (`Im1`, `Im2`, ...) the first time it is resolved, and resolving it
 * again returns the cached entry.
 *
 * @example
 * ```ts
 * const images = new ImageRegistry().register("logo.png", { width: 64, height: 32 });
 * images.resolve("logo.png") // { resourceName: "Im1", naturalWidth: 64, naturalHeight: 32 }
 * ```
 */
export class ImageRegistry implements ImageResolver {
  private readonly sources = new Map<string, ImageSource>();
  private readonly resolved = new Map<string, ResolvedImage>();
  private nextImageNumber = 1;

  /**
   * Register an image under a source key.
   *
   * @throws {RangeError} if the size is not positive or the pixel data
   *   does not match it
   */
  register(src: string, image: ImageSource): this {
    if (!(image.width > 0) || !(image.height > 0)) {
      throw new RangeError(`Image "${src}" must have a positive size, got ${image.width}x${image.height}`);
    }

    if (image.pixels) {
      const expected = pixelDataLength(image.width, image.height, image.pixels);

      if (image.pixels.data.length !== expected) {
        throw new RangeError(
          `Image "${src}" has ${image.pixels.data.length} bytes of pixel data, expected ${expected}`,
        );
      }
    }

    this.sources.set(src, image);
    this.resolved.delete(src);

    return this;
  }

  has(src: string): boolean {
    return this.sources.has(src);
  }

  /** Number of registered sources */
  get size(): number {
    return this.sources.size;
  }

  resolve(src: string): ResolvedImage {
    const cached = this.resolved.get(src);

    if (cached) {
      return cached;
    }

    const source = this.sources.get(src);

    if (!source) {
      throw new AttributeValidationError("image", "src", "expected a registered image source", src);
    }

    const image: ResolvedImage = {
      resourceName: `Im${this.nextImageNumber++}`,
      naturalWidth: source.width,
      naturalHeight: source.height,
      ...(source.pixels ? { pixels: source.pixels } : {}),
    };

    this.resolved.set(src, image);

    return image;
  }
}
