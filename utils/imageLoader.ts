import type { PixelBuffer } from '../types';
import { SUPPORTED_FORMATS } from '../constants';
import { ImageFormatError, ImageNotFoundError } from './errors';
import { createLogger } from './logger';

const log = createLogger('image');

// data: and blob: URLs carry no extension; the decoder decides for those.
export const isSupportedSource = (src: string): boolean => {
  if (src.startsWith('data:') || src.startsWith('blob:')) return true;
  const path = src.split(/[?#]/)[0].toLowerCase();
  return SUPPORTED_FORMATS.some(ext => path.endsWith(ext));
};

const decode = (url: string, label: string) =>
  new Promise<HTMLImageElement>((resolve, reject) => {
    const img = new Image();
    img.onload = () => resolve(img);
    img.onerror = () => reject(new ImageFormatError(label));
    img.src = url;
  });

const toPixels = (img: HTMLImageElement, label: string): PixelBuffer => {
  const width = img.naturalWidth;
  const height = img.naturalHeight;
  if (width === 0 || height === 0) throw new ImageFormatError(label);

  const offscreen = document.createElement('canvas');
  offscreen.width = width;
  offscreen.height = height;
  const ctx = offscreen.getContext('2d');
  if (!ctx) throw new ImageFormatError(label);

  ctx.drawImage(img, 0, 0);
  const { data } = ctx.getImageData(0, 0, width, height);
  return { width, height, data };
};

const fetchBlob = async (src: string): Promise<Blob> => {
  let response: Response;
  try {
    response = await fetch(src);
  } catch {
    throw new ImageNotFoundError(src);
  }
  if (!response.ok) throw new ImageNotFoundError(src);
  return response.blob();
};

const decodeBlob = async (blob: Blob, label: string): Promise<PixelBuffer> => {
  const url = URL.createObjectURL(blob);
  try {
    return toPixels(await decode(url, label), label);
  } finally {
    URL.revokeObjectURL(url);
  }
};

/**
 * Fetches and decodes an image into raw RGBA pixels.
 * Missing files reject with ImageNotFoundError, undecodable or unsupported
 * ones with ImageFormatError.
 */
export const loadImage = async (src: string): Promise<PixelBuffer> => {
  try {
    if (!isSupportedSource(src)) throw new ImageFormatError(src);
    return await decodeBlob(await fetchBlob(src), src);
  } catch (e) {
    log.error(`Could not load ${src}`, e);
    throw e;
  }
};

export const loadImageFile = async (file: File): Promise<PixelBuffer> => {
  try {
    if (!isSupportedSource(file.name)) throw new ImageFormatError(file.name);
    return await decodeBlob(file, file.name);
  } catch (e) {
    log.error(`Could not load ${file.name}`, e);
    throw e;
  }
};

// PNG data URL of the pixels, usable as an <img> src or a canvas source.
export const encodeForDisplay = (buffer: PixelBuffer): string => {
  const canvas = document.createElement('canvas');
  canvas.width = buffer.width;
  canvas.height = buffer.height;
  const ctx = canvas.getContext('2d');
  if (!ctx) throw new Error('2D canvas is not available');
  ctx.putImageData(new ImageData(new Uint8ClampedArray(buffer.data), buffer.width, buffer.height), 0, 0);
  return canvas.toDataURL('image/png');
};
