import type { BoundingBox, Point } from '@hearthwatch/shared';

// Truncates like the detector does, so centers computed on either side agree.
export function centerOf(box: BoundingBox): Point {
  const [x1, y1, x2, y2] = box;
  return [Math.trunc((x1 + x2) / 2), Math.trunc((y1 + y2) / 2)];
}

export function distance(p1: Point, p2: Point): number {
  return Math.hypot(p2[0] - p1[0], p2[1] - p1[1]);
}
