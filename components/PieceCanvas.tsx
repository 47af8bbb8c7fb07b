import React, { useEffect, useRef } from 'react';
import type { PieceFrame } from '../types';

interface Props {
  piece: PieceFrame;
  layer: number; // Stacking index from the snapshot's draw order
  animatePosition?: boolean;
  animationDuration?: number;
}

export const PieceCanvas: React.FC<Props> = ({
  piece,
  layer,
  animatePosition = false,
  animationDuration = 600
}) => {
  const canvasRef = useRef<HTMLCanvasElement>(null);
  const { image, isDragging, isPlaced } = piece;

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;

    const ctx = canvas.getContext('2d');
    if (!ctx) return;

    ctx.clearRect(0, 0, canvas.width, canvas.height);
    ctx.putImageData(new ImageData(new Uint8ClampedArray(image.data), image.width, image.height), 0, 0);

    // Highlight the held piece, subtle edge otherwise. Placed pieces blend into the picture.
    if (isPlaced) return;
    if (isDragging) {
      ctx.strokeStyle = '#b45309';
      ctx.lineWidth = 3;
    } else {
      ctx.strokeStyle = 'rgba(255, 255, 255, 0.4)';
      ctx.lineWidth = 1.5;
    }
    ctx.strokeRect(ctx.lineWidth / 2, ctx.lineWidth / 2, image.width - ctx.lineWidth, image.height - ctx.lineWidth);
  }, [
      // Position changes every drag frame; the pixels don't.
      image,
      isDragging,
      isPlaced
  ]);

  if (piece.position === null) return null;

  return (
    <canvas
      ref={canvasRef}
      width={image.width}
      height={image.height}
      style={{
        position: 'absolute',
        left: piece.position.x,
        top: piece.position.y,
        zIndex: layer,
        pointerEvents: 'none',
        filter: isDragging
            ? 'drop-shadow(0 15px 25px rgba(0,0,0,0.6))'
            : (isPlaced ? 'none' : 'drop-shadow(0 4px 6px rgba(0,0,0,0.3))'),
        transition: animatePosition ? `top ${animationDuration}ms ease-out, left ${animationDuration}ms ease-out` : 'none'
      }}
    />
  );
};
