import { KernelConfig } from '../constants'
import { Bounds, Point } from '../types/base'
import { equal } from '../utils/math'
import { Path } from './path'

// Rectangle with its bottom-left corner at (x,y), anticlockwise for positive sizes.
export function rectangle(
  x: number,
  y: number,
  width: number,
  height: number,
  config: Partial<KernelConfig> = {}
): Path {
  const p = new Path(config)
  if (equal(width, 0.0, p.config.epsilon) || equal(height, 0.0, p.config.epsilon)) {
    return p
  }
  return p
    .moveTo(x, y)
    .lineTo(x + width, y)
    .lineTo(x + width, y + height)
    .lineTo(x, y + height)
    .close()
}

// Rectangle with elliptical corners. Radii are limited to half the width and height, a single
// missing radius takes the value of the other one as for SVG rect elements.
export function roundedRectangle(
  x: number,
  y: number,
  width: number,
  height: number,
  rx: number | undefined,
  ry: number | undefined,
  config: Partial<KernelConfig> = {}
): Path {
  let rxAbs = Math.abs(rx ?? ry ?? 0.0)
  let ryAbs = Math.abs(ry ?? rx ?? 0.0)
  rxAbs = Math.min(rxAbs, Math.abs(width) / 2.0)
  ryAbs = Math.min(ryAbs, Math.abs(height) / 2.0)

  const p = new Path(config)
  const eps = p.config.epsilon
  if (equal(width, 0.0, eps) || equal(height, 0.0, eps)) {
    return p
  } else if (equal(rxAbs, 0.0, eps) || equal(ryAbs, 0.0, eps)) {
    return rectangle(x, y, width, height, config)
  }

  // Mirrored rectangles run clockwise.
  const sweep = (0.0 < width) === (0.0 < height)
  const sx = Math.sign(width) * rxAbs
  const sy = Math.sign(height) * ryAbs
  const x1 = x + width
  const y1 = y + height
  return p
    .moveTo(x + sx, y)
    .lineTo(x1 - sx, y)
    .arcTo(rxAbs, ryAbs, 0.0, false, sweep, x1, y + sy)
    .lineTo(x1, y1 - sy)
    .arcTo(rxAbs, ryAbs, 0.0, false, sweep, x1 - sx, y1)
    .lineTo(x + sx, y1)
    .arcTo(rxAbs, ryAbs, 0.0, false, sweep, x, y1 - sy)
    .lineTo(x, y + sy)
    .arcTo(rxAbs, ryAbs, 0.0, false, sweep, x + sx, y)
    .close()
}

// Anticlockwise ellipse around (cx,cy) made of two arcs.
export function ellipse(
  cx: number,
  cy: number,
  rx: number,
  ry: number,
  config: Partial<KernelConfig> = {}
): Path {
  const p = new Path(config)
  if (equal(rx, 0.0, p.config.epsilon) || equal(ry, 0.0, p.config.epsilon)) {
    return p
  }
  return p
    .moveTo(cx + rx, cy)
    .arcTo(rx, ry, 0.0, false, true, cx - rx, cy)
    .arcTo(rx, ry, 0.0, false, true, cx + rx, cy)
    .close()
}

export function circle(
  cx: number,
  cy: number,
  r: number,
  config: Partial<KernelConfig> = {}
): Path {
  return ellipse(cx, cy, r, r, config)
}

export function polyline(
  points: Point[],
  closed: boolean,
  config: Partial<KernelConfig> = {}
): Path {
  const p = new Path(config)
  points.forEach((pt, i) => {
    if (i === 0) {
      p.moveTo(pt.x, pt.y)
    } else {
      p.lineTo(pt.x, pt.y)
    }
  })
  if (closed) {
    p.close()
  }
  return p
}

export function boundsToPath(b: Bounds, config: Partial<KernelConfig> = {}): Path {
  return rectangle(b.xMin, b.yMin, b.xMax - b.xMin, b.yMax - b.yMin, config)
}
