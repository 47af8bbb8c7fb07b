import type { Cell, GridSize, Layout, Point, Rect, Size } from '../types';
import type { GameConfig } from './config';
import { DEFAULT_CONFIG } from './config';
import { rectBottom } from './geometry';
import { computePieceSize } from './slicer';

export type LayoutConfig = Pick<
  GameConfig,
  'margin' | 'playAreaWidthRatio' | 'stagingWidthRatio' | 'stagingHeightRatio' | 'previewMaxSize'
>;

const nonNegative = (n: number) => Math.max(0, n);

/**
 * Splits the screen into the play area on the left and a side column holding
 * the staging area (top), the preview (middle, square) and the info panel
 * (bottom). Pure; call again on resize.
 */
export const computeLayout = (screen: Size, config: LayoutConfig = DEFAULT_CONFIG): Layout => {
  const { margin } = config;

  const playWidth = Math.floor(screen.width * config.playAreaWidthRatio);
  const playArea: Rect = {
    x: margin,
    y: margin,
    width: nonNegative(playWidth - margin * 2),
    height: nonNegative(screen.height - margin * 2),
  };

  const sideX = playWidth + margin;
  const sideWidth = nonNegative(Math.floor(screen.width * config.stagingWidthRatio) - margin);
  const availableHeight = nonNegative(screen.height - margin * 2);

  const stagingArea: Rect = {
    x: sideX,
    y: margin,
    width: sideWidth,
    height: Math.floor(availableHeight * config.stagingHeightRatio),
  };

  const previewSize = Math.min(sideWidth, config.previewMaxSize);
  const previewArea: Rect = {
    x: sideX,
    y: rectBottom(stagingArea) + margin,
    width: previewSize,
    height: previewSize,
  };

  const infoArea: Rect = {
    x: sideX,
    y: rectBottom(previewArea) + margin,
    width: sideWidth,
    height: nonNegative(screen.height - rectBottom(previewArea) - margin * 2),
  };

  return { playArea, stagingArea, previewArea, infoArea };
};

export const cellTargetPosition = (playArea: Rect, grid: GridSize, cell: Cell): Point => {
  const piece = computePieceSize(playArea, grid);
  return {
    x: playArea.x + cell.col * piece.width,
    y: playArea.y + cell.row * piece.height,
  };
};
