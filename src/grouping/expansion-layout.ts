import { PlacedConcept } from '../graph-store/types/graph.types';

export interface Point {
  x: number;
  y: number;
}

export interface ExpansionLayoutOptions {
  radius: number;
  clearance: number;
  collisionPenalty: number;
  angleCount: number;
}

export const DEFAULT_EXPANSION_LAYOUT: ExpansionLayoutOptions = {
  radius: 150,
  clearance: 80,
  collisionPenalty: 1000,
  angleCount: 16,
};

const MIN_ANGLE_COUNT = 8;

const round = (value: number) => Math.round(value * 100) / 100 + 0;

/**
 * Places revealed children on a ring around their parent.
 *
 * Child i of n tries N evenly spaced angles starting at 2πi/n. Each candidate
 * scores the sum over obstacles of the distance to it, or `-collisionPenalty`
 * when closer than `clearance`. The first best-scoring candidate wins, and a
 * placed child becomes an obstacle for the next one.
 */
export function layoutExpandedChildren(
  center: Point,
  childIds: readonly number[],
  obstacles: readonly Point[],
  options: Partial<ExpansionLayoutOptions> = {},
): PlacedConcept[] {
  const { radius, clearance, collisionPenalty } = {
    ...DEFAULT_EXPANSION_LAYOUT,
    ...options,
  };
  const angleCount = Math.max(
    MIN_ANGLE_COUNT,
    Math.floor(options.angleCount ?? DEFAULT_EXPANSION_LAYOUT.angleCount),
  );

  const placedObstacles = [...obstacles];
  const n = childIds.length;

  return childIds.map((conceptId, i) => {
    const start = (2 * Math.PI * i) / n;
    let best: Point | null = null;
    let bestScore = -Infinity;

    for (let k = 0; k < angleCount; k++) {
      const angle = start + (2 * Math.PI * k) / angleCount;
      const candidate = {
        x: round(center.x + radius * Math.cos(angle)),
        y: round(center.y + radius * Math.sin(angle)),
      };
      const score = placedObstacles.reduce((sum, obstacle) => {
        const distance = Math.hypot(
          candidate.x - obstacle.x,
          candidate.y - obstacle.y,
        );
        return sum + (distance < clearance ? -collisionPenalty : distance);
      }, 0);

      if (score > bestScore) {
        best = candidate;
        bestScore = score;
      }
    }

    const position = best ?? center;
    placedObstacles.push(position);
    return { conceptId, x: position.x, y: position.y };
  });
}
