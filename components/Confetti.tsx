import React, { useEffect, useRef } from 'react';
import type { Rect } from '../types';

interface Props {
  // Bursts rise from the bottom corners of this area
  area: Rect;
  bursts?: number;
}

interface Flake {
  x: number;
  y: number;
  vx: number;
  vy: number;
  spin: number;
  angle: number;
  width: number;
  height: number;
  color: string;
  alpha: number;
  decay: number;
}

const COLORS = ['#ef4444', '#f59e0b', '#10b981', '#3b82f6', '#8b5cf6', '#ec4899'];
const GRAVITY = 0.25;
const FLAKES_PER_BURST = 36;
const FRAMES_BETWEEN_BURSTS = 30;

export const Confetti: React.FC<Props> = ({ area, bursts = 5 }) => {
  const canvasRef = useRef<HTMLCanvasElement>(null);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;
    const ctx = canvas.getContext('2d');
    if (!ctx) return;

    canvas.width = area.width;
    canvas.height = area.height;

    let flakes: Flake[] = [];

    const burst = (x: number, direction: 1 | -1) => {
      for (let i = 0; i < FLAKES_PER_BURST; i++) {
        // Mostly upward, fanned towards the middle of the area
        const angle = (-90 + direction * (15 + Math.random() * 45)) * (Math.PI / 180);
        const speed = Math.random() * 8 + 8;
        flakes.push({
          x,
          y: area.height,
          vx: Math.cos(angle) * speed,
          vy: Math.sin(angle) * speed,
          spin: (Math.random() - 0.5) * 0.3,
          angle: Math.random() * Math.PI,
          width: 6 + Math.random() * 4,
          height: 3 + Math.random() * 3,
          color: COLORS[Math.floor(Math.random() * COLORS.length)],
          alpha: 1,
          decay: Math.random() * 0.012 + 0.006
        });
      }
    };

    let frame = 0;
    let animationId = 0;
    const lastBurstFrame = bursts * FRAMES_BETWEEN_BURSTS;

    const render = () => {
      ctx.clearRect(0, 0, canvas.width, canvas.height);

      if (frame % FRAMES_BETWEEN_BURSTS === 0 && frame < lastBurstFrame) {
        burst(0, 1);
        burst(area.width, -1);
      }

      flakes = flakes.filter(f => f.alpha > 0 && f.y < area.height + 20);
      for (const f of flakes) {
        f.x += f.vx;
        f.y += f.vy;
        f.vy += GRAVITY;
        f.vx *= 0.98;
        f.angle += f.spin;
        f.alpha -= f.decay;

        ctx.save();
        ctx.globalAlpha = Math.max(0, f.alpha);
        ctx.translate(f.x, f.y);
        ctx.rotate(f.angle);
        ctx.fillStyle = f.color;
        ctx.fillRect(-f.width / 2, -f.height / 2, f.width, f.height);
        ctx.restore();
      }

      frame++;
      if (flakes.length > 0 || frame < lastBurstFrame) {
        animationId = requestAnimationFrame(render);
      }
    };

    render();
    return () => cancelAnimationFrame(animationId);
  }, [area.width, area.height, bursts]);

  return (
    <canvas
      ref={canvasRef}
      className="absolute pointer-events-none"
      style={{ left: area.x, top: area.y, width: area.width, height: area.height, zIndex: 150 }}
    />
  );
};
