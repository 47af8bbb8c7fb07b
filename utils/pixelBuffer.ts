import type { PixelBuffer, Rect, Size } from '../types';

export type Rgba = [number, number, number, number];

export const createPixelBuffer = (width: number, height: number, fill: Rgba = [0, 0, 0, 0]): PixelBuffer => {
  const data = new Uint8ClampedArray(width * height * 4);
  if (fill.some(v => v !== 0)) {
    for (let i = 0; i < data.length; i += 4) {
      data[i] = fill[0];
      data[i + 1] = fill[1];
      data[i + 2] = fill[2];
      data[i + 3] = fill[3];
    }
  }
  return { width, height, data };
};

export const getPixel = (buffer: PixelBuffer, x: number, y: number): Rgba => {
  const i = (y * buffer.width + x) * 4;
  return [buffer.data[i], buffer.data[i + 1], buffer.data[i + 2], buffer.data[i + 3]];
};

/**
 * Copies a sub-rectangle into a new buffer. The rectangle must lie inside the
 * source; callers compute it from the source's own dimensions.
 */
export const cropPixelBuffer = (buffer: PixelBuffer, area: Rect): PixelBuffer => {
  const out = createPixelBuffer(area.width, area.height);
  const rowBytes = area.width * 4;
  for (let row = 0; row < area.height; row++) {
    const start = ((area.y + row) * buffer.width + area.x) * 4;
    out.data.set(buffer.data.subarray(start, start + rowBytes), row * rowBytes);
  }
  return out;
};

// Bilinear resample. Sample points sit at pixel centres, edges are clamped.
export const resizePixelBuffer = (buffer: PixelBuffer, width: number, height: number): PixelBuffer => {
  if (width === buffer.width && height === buffer.height) {
    return { width, height, data: new Uint8ClampedArray(buffer.data) };
  }

  const out = createPixelBuffer(width, height);
  const src = buffer.data;
  const scaleX = buffer.width / width;
  const scaleY = buffer.height / height;
  const maxX = buffer.width - 1;
  const maxY = buffer.height - 1;

  for (let dy = 0; dy < height; dy++) {
    const sy = Math.min(maxY, Math.max(0, (dy + 0.5) * scaleY - 0.5));
    const y0 = Math.floor(sy);
    const y1 = Math.min(y0 + 1, maxY);
    const fy = sy - y0;

    for (let dx = 0; dx < width; dx++) {
      const sx = Math.min(maxX, Math.max(0, (dx + 0.5) * scaleX - 0.5));
      const x0 = Math.floor(sx);
      const x1 = Math.min(x0 + 1, maxX);
      const fx = sx - x0;

      const i00 = (y0 * buffer.width + x0) * 4;
      const i10 = (y0 * buffer.width + x1) * 4;
      const i01 = (y1 * buffer.width + x0) * 4;
      const i11 = (y1 * buffer.width + x1) * 4;
      const o = (dy * width + dx) * 4;

      for (let c = 0; c < 4; c++) {
        const top = src[i00 + c] * (1 - fx) + src[i10 + c] * fx;
        const bottom = src[i01 + c] * (1 - fx) + src[i11 + c] * fx;
        out.data[o + c] = top * (1 - fy) + bottom * fy;
      }
    }
  }
  return out;
};

/**
 * Shrinks the buffer to fit inside maxSize keeping its aspect ratio.
 * Never enlarges.
 */
export const createThumbnail = (buffer: PixelBuffer, maxSize: Size): PixelBuffer => {
  const ratio = Math.min(1, maxSize.width / buffer.width, maxSize.height / buffer.height);
  const width = Math.max(1, Math.floor(buffer.width * ratio));
  const height = Math.max(1, Math.floor(buffer.height * ratio));
  return resizePixelBuffer(buffer, width, height);
};
