import type { BoundingBox } from "@/types";

/**
 * World file (.tfw) 的六個參數，順序與檔案相同。
 * 座標 (x, y) 為左上角像素的中心點。
 */
export type WorldFile = {
  pixelSizeX: number;
  rotationY: number;
  rotationX: number;
  pixelSizeY: number;
  x: number;
  y: number;
};

export function parseWorldFile(text: string): WorldFile | undefined {
  const numbers = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && Number.isFinite(Number(line)))
    .map(Number);
  if (numbers.length < 6) return undefined;
  const [pixelSizeX, rotationY, rotationX, pixelSizeY, x, y] = numbers;
  return { pixelSizeX, rotationY, rotationX, pixelSizeY, x, y };
}

/** 忽略旋轉項，計算影像範圍 */
export function boundsFromWorldFile(
  world: WorldFile,
  width: number,
  height: number
): BoundingBox {
  const x0 = world.x - world.pixelSizeX / 2;
  const y0 = world.y - world.pixelSizeY / 2;
  const x1 = x0 + world.pixelSizeX * width;
  const y1 = y0 + world.pixelSizeY * height;
  return {
    minX: Math.min(x0, x1),
    maxX: Math.max(x0, x1),
    minY: Math.min(y0, y1),
    maxY: Math.max(y0, y1),
  };
}
