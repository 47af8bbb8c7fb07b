import React, { useEffect, useRef } from 'react';
import type { GridSize, PixelBuffer, Rect } from '../types';

interface Props {
  image: PixelBuffer;
  area: Rect;
  gridSize: GridSize;
}

// Thumbnail of the finished picture with the cut lines drawn over it.
export const PreviewCanvas: React.FC<Props> = ({ image, area, gridSize }) => {
  const canvasRef = useRef<HTMLCanvasElement>(null);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;
    const ctx = canvas.getContext('2d');
    if (!ctx) return;

    ctx.clearRect(0, 0, image.width, image.height);
    ctx.putImageData(new ImageData(new Uint8ClampedArray(image.data), image.width, image.height), 0, 0);

    ctx.strokeStyle = 'rgba(255, 255, 255, 0.6)';
    ctx.lineWidth = 1;
    ctx.shadowColor = 'black';
    ctx.shadowBlur = 2;

    ctx.beginPath();
    for (let c = 1; c < gridSize.cols; c++) {
      const x = Math.round((c * image.width) / gridSize.cols) + 0.5;
      ctx.moveTo(x, 0);
      ctx.lineTo(x, image.height);
    }
    for (let r = 1; r < gridSize.rows; r++) {
      const y = Math.round((r * image.height) / gridSize.rows) + 0.5;
      ctx.moveTo(0, y);
      ctx.lineTo(image.width, y);
    }
    ctx.stroke();
  }, [image, gridSize.rows, gridSize.cols]);

  return (
    <canvas
      ref={canvasRef}
      width={image.width}
      height={image.height}
      className="absolute pointer-events-none rounded"
      style={{ left: area.x, top: area.y }}
    />
  );
};
