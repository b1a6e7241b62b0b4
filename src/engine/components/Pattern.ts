import { clamp, distance, positiveModulo, type Point } from '@/utils/math';

/**
 * Movement patterns followed by patrolling drones.
 *
 * The same advance function drives both the per-tick PatternSystem step and
 * the intercept planner's trajectory prediction, so a prediction t seconds
 * ahead lands where t/dt ticks of simulation would put the drone.
 */

/** Linear oscillation along one axis, reflecting instantly at each bound */
export interface BouncePattern {
  kind: 'bounce';
  axis: 'x' | 'y';
  min: number;
  max: number;
  direction: 1 | -1;
}

/** Constant angular-rate orbit; angular rate = speed / radius */
export interface CirclePattern {
  kind: 'circle';
  centerX: number;
  centerY: number;
  radius: number;
  angle: number;
  direction: 1 | -1;
}

/** Closed loop through a list of points; index is the waypoint being flown to */
export interface WaypointPattern {
  kind: 'waypoints';
  points: Point[];
  index: number;
}

export type PatternData = BouncePattern | CirclePattern | WaypointPattern;
export type PatternKind = PatternData['kind'];

export interface PatternPose {
  x: number;
  y: number;
  vx: number;
  vy: number;
  pattern: PatternData;
}

// Upper bound on waypoint legs walked in one advance
const MAX_WAYPOINT_LEGS = 4096;

export function clonePattern(pattern: PatternData): PatternData {
  switch (pattern.kind) {
    case 'bounce':
    case 'circle':
      return { ...pattern };
    case 'waypoints':
      return {
        kind: 'waypoints',
        points: pattern.points.map((p) => ({ x: p.x, y: p.y })),
        index: pattern.index,
      };
  }
}

/**
 * Position on a circle pattern for its current angle
 */
export function circlePosition(pattern: CirclePattern): Point {
  return {
    x: pattern.centerX + pattern.radius * Math.cos(pattern.angle),
    y: pattern.centerY + pattern.radius * Math.sin(pattern.angle),
  };
}

/**
 * Fit a pattern inside a `width` x `height` world: bounce bounds and waypoints
 * are clamped onto it, a circle's center is clamped and its radius shrunk
 * until the whole orbit fits.
 */
export function clampPattern(pattern: PatternData, width: number, height: number): PatternData {
  switch (pattern.kind) {
    case 'bounce': {
      const extent = pattern.axis === 'x' ? width : height;
      return { ...pattern, min: clamp(pattern.min, 0, extent), max: clamp(pattern.max, 0, extent) };
    }
    case 'circle': {
      const centerX = clamp(pattern.centerX, 0, width);
      const centerY = clamp(pattern.centerY, 0, height);
      const radius = Math.min(pattern.radius, centerX, width - centerX, centerY, height - centerY);
      return { ...pattern, centerX, centerY, radius };
    }
    case 'waypoints':
      return {
        kind: 'waypoints',
        points: pattern.points.map((p) => ({ x: clamp(p.x, 0, width), y: clamp(p.y, 0, height) })),
        index: pattern.index,
      };
  }
}

function advanceBounce(x: number, y: number, pattern: BouncePattern, speed: number, t: number): PatternPose {
  const span = pattern.max - pattern.min;
  const current = clamp(pattern.axis === 'x' ? x : y, pattern.min, pattern.max);

  let along = current;
  let direction = pattern.direction;

  if (span > 0) {
    // Unfold the reflecting segment onto a loop of length 2*span:
    // [0, span) travels toward max, [span, 2*span) travels back toward min
    const offset = current - pattern.min;
    const unfolded = direction > 0 ? offset : 2 * span - offset;
    const advanced = positiveModulo(unfolded + speed * t, 2 * span);

    if (advanced < span) {
      along = pattern.min + advanced;
      direction = 1;
    } else {
      along = pattern.min + (2 * span - advanced);
      direction = -1;
    }
  }

  const velocity = span > 0 ? direction * speed : 0;
  const next: BouncePattern = { ...pattern, direction };

  return pattern.axis === 'x'
    ? { x: along, y, vx: velocity, vy: 0, pattern: next }
    : { x, y: along, vx: 0, vy: velocity, pattern: next };
}

function advanceCircle(pattern: CirclePattern, speed: number, t: number): PatternPose {
  if (pattern.radius <= 0) {
    return { x: pattern.centerX, y: pattern.centerY, vx: 0, vy: 0, pattern: { ...pattern } };
  }

  const angularRate = speed / pattern.radius;
  const angle = pattern.angle + pattern.direction * angularRate * t;
  const next: CirclePattern = { ...pattern, angle };
  const position = circlePosition(next);

  return {
    x: position.x,
    y: position.y,
    vx: -pattern.direction * speed * Math.sin(angle),
    vy: pattern.direction * speed * Math.cos(angle),
    pattern: next,
  };
}

function advanceWaypoints(x: number, y: number, pattern: WaypointPattern, speed: number, t: number): PatternPose {
  const count = pattern.points.length;
  if (count === 0) {
    return { x, y, vx: 0, vy: 0, pattern: clonePattern(pattern) };
  }

  let budget = speed * t;
  let index = positiveModulo(pattern.index, count);
  let px = x;
  let py = y;
  let vx = 0;
  let vy = 0;
  let stalledLegs = 0;

  for (let leg = 0; leg < MAX_WAYPOINT_LEGS && budget > 0; leg++) {
    const waypoint = pattern.points[index];
    const remaining = distance(px, py, waypoint.x, waypoint.y);

    if (remaining > 0) {
      vx = ((waypoint.x - px) / remaining) * speed;
      vy = ((waypoint.y - py) / remaining) * speed;
    }

    if (remaining > budget) {
      px += (vx / speed) * budget;
      py += (vy / speed) * budget;
      budget = 0;
      break;
    }

    px = waypoint.x;
    py = waypoint.y;
    budget -= remaining;
    index = (index + 1) % count;

    // Every waypoint coincides: nowhere to go
    stalledLegs = remaining === 0 ? stalledLegs + 1 : 0;
    if (stalledLegs >= count) {
      vx = 0;
      vy = 0;
      break;
    }
  }

  return {
    x: px,
    y: py,
    vx,
    vy,
    pattern: {
      kind: 'waypoints',
      points: pattern.points.map((p) => ({ x: p.x, y: p.y })),
      index,
    },
  };
}

/**
 * Advance a drone following `pattern` by `t` seconds at `speed`.
 * Pure: returns the new pose and pattern state without touching the inputs.
 */
export function advancePattern(
  position: Point,
  pattern: PatternData,
  speed: number,
  t: number
): PatternPose {
  switch (pattern.kind) {
    case 'bounce':
      return advanceBounce(position.x, position.y, pattern, speed, t);
    case 'circle':
      return advanceCircle(pattern, speed, t);
    case 'waypoints':
      return advanceWaypoints(position.x, position.y, pattern, speed, t);
  }
}
