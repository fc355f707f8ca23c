import type { Size } from "../../config/types";
import { ValidationError } from "../../shared/errors";

export interface Point {
  x: number;
  y: number;
}

/**
 * Maps a point from the coordinate space of the image the caller saw onto
 * the browser viewport.
 */
export function scalePoint(point: Point, from: Size, to: Size): Point {
  if (point.x < 0 || point.y < 0 || point.x > from.width || point.y > from.height) {
    throw new ValidationError(
      "COORDINATE_OUT_OF_RANGE",
      `Point (${point.x}, ${point.y}) lies outside the ${from.width}x${from.height} screen.`,
      { point, screen: from }
    );
  }
  return {
    x: clamp(Math.round((point.x * to.width) / from.width), 0, to.width - 1),
    y: clamp(Math.round((point.y * to.height) / from.height), 0, to.height - 1)
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
