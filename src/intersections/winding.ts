import { DEFAULT_EPSILON } from '../constants'
import { ellipseToCenter } from '../ellipse/math'
import { CommandType, Segment } from '../types/paths'
import { equal } from '../utils/math'
import { pointsEqual } from '../utils/vector'
import { Intersection, intersectionSegment } from './intersections'

// Intersection of the ray with a path segment. Hits at a vertex share the vertex key of their
// subpath, hits in the interior of segment j get key j + 0.5.
export interface RayHit {
  z: Intersection
  subpath: number
  vertex: number
  endpoint: boolean
}

export interface WindingResult {
  windings: number
  boundary: boolean
}

export interface CrossingResult {
  crossings: number
  boundary: boolean
}

// Split the segments into subpaths of drawing segments. Zero-length lines are dropped since the
// ray cannot cross them. Open subpaths are closed by a line back to their start, as for filling.
function subpathSegments(segs: Segment[], eps: number): Segment[][] {
  const subpaths: Segment[][] = []
  let cur: Segment[] = []
  let closed = false
  const flush = (): void => {
    if (0 < cur.length) {
      const start = cur[0].start
      const end = cur[cur.length - 1].end
      if (!closed && !pointsEqual(start, end, eps)) {
        cur.push({ type: CommandType.Close, start: end, end: start })
      }
      subpaths.push(cur)
    }
    cur = []
    closed = false
  }
  for (const seg of segs) {
    if (seg.type === CommandType.MoveTo) {
      flush()
      continue
    }
    closed = seg.type === CommandType.Close
    if (
      (seg.type === CommandType.LineTo || seg.type === CommandType.Close) &&
      pointsEqual(seg.start, seg.end, eps)
    ) {
      continue
    }
    cur.push(seg)
  }
  flush()
  return subpaths
}

function segmentsXMax(segs: Segment[], eps: number): number {
  let xmax = -Infinity
  for (const seg of segs) {
    xmax = Math.max(xmax, seg.start.x, seg.end.x)
    if (seg.type === CommandType.QuadTo) {
      xmax = Math.max(xmax, seg.control.x)
    } else if (seg.type === CommandType.CubeTo) {
      xmax = Math.max(xmax, seg.control1.x, seg.control2.x)
    } else if (seg.type === CommandType.ArcTo) {
      const { cx } = ellipseToCenter(
        seg.start.x,
        seg.start.y,
        seg.rx,
        seg.ry,
        seg.rotation,
        seg.largeArc,
        seg.sweep,
        seg.end.x,
        seg.end.y,
        eps
      )
      xmax = Math.max(xmax, cx + Math.max(seg.rx, seg.ry))
    }
  }
  return xmax
}

function compareHits(a: RayHit, b: RayHit, eps: number): number {
  if (!equal(a.z.t[0], b.z.t[0], eps)) {
    return a.z.t[0] - b.z.t[0]
  } else if (a.subpath !== b.subpath) {
    return a.subpath - b.subpath
  }
  return a.vertex - b.vertex
}

// Hits of the horizontal ray from (x,y) towards +x with every subpath, ordered along the ray. Hits
// at the same vertex end up next to each other. Open subpaths are closed implicitly.
export function rayIntersections(
  segs: Segment[],
  x: number,
  y: number,
  eps: number = DEFAULT_EPSILON
): RayHit[] {
  const xmax = segmentsXMax(segs, eps)
  const ray: Segment = {
    type: CommandType.LineTo,
    start: { x, y },
    end: { x: Math.max(xmax, x) + 1.0, y }
  }

  const hits: RayHit[] = []
  subpathSegments(segs, eps).forEach((subpath, i) => {
    const n = subpath.length
    subpath.forEach((seg, j) => {
      for (const z of intersectionSegment(ray, seg, eps)) {
        if (equal(z.t[1], 0.0, eps)) {
          z.t[1] = 0.0
        } else if (equal(z.t[1], 1.0, eps)) {
          z.t[1] = 1.0
        }
        if (equal(z.point.x, x, eps)) {
          z.t[0] = 0.0
        }

        const endpoint = z.t[1] === 0.0 || z.t[1] === 1.0
        if (z.tangent && !z.same && !endpoint && z.t[0] !== 0.0) {
          // Touches the ray without crossing.
          continue
        }

        let vertex = j + 0.5
        if (z.t[1] === 0.0) {
          vertex = j
        } else if (z.t[1] === 1.0) {
          vertex = (j + 1) % n
        }
        hits.push({ z, subpath: i, vertex, endpoint })
      }
    })
  })
  hits.sort((a, b) => compareHits(a, b, eps))
  return hits
}

// Signed winding number of the hits, positive for anticlockwise paths. Hits at a vertex count once
// when the path passes through the ray and not at all when it only touches it.
export function windings(hits: RayHit[], eps: number = DEFAULT_EPSILON): WindingResult {
  let n = 0
  let boundary = false
  for (let i = 0; i < hits.length; i++) {
    const hit = hits[i]
    const z = hit.z
    if (z.t[0] === 0.0) {
      boundary = true
      continue
    }

    const d = z.into() ? -1 : 1
    if (!hit.endpoint) {
      if (!z.same) {
        n += d
      }
      continue
    }

    const next = i + 1 < hits.length ? hits[i + 1] : undefined
    if (
      next !== undefined &&
      next.endpoint &&
      next.subpath === hit.subpath &&
      next.vertex === hit.vertex &&
      pointsEqual(next.z.point, z.point, eps)
    ) {
      if (!z.same && !next.z.same && z.into() === next.z.into()) {
        n += d
      }
      i++
    }
  }
  return { windings: n, boundary }
}

function groupBySubpath(hits: RayHit[]): Map<number, RayHit[]> {
  const groups = new Map<number, RayHit[]>()
  for (const hit of hits) {
    const group = groups.get(hit.subpath)
    if (group === undefined) {
      groups.set(hit.subpath, [hit])
    } else {
      group.push(hit)
    }
  }
  return groups
}

// Winding number of the point summed over the subpaths that do not pass through it. The boundary
// flag is set when any subpath does.
export function pathWindings(
  segs: Segment[],
  x: number,
  y: number,
  eps: number = DEFAULT_EPSILON
): WindingResult {
  let n = 0
  let boundary = false
  for (const hits of groupBySubpath(rayIntersections(segs, x, y, eps)).values()) {
    const result = windings(hits, eps)
    if (result.boundary) {
      boundary = true
    } else {
      n += result.windings
    }
  }
  return { windings: n, boundary }
}

// Number of times the ray towards +x crosses the path. Vertices on the ray count for half of
// each segment meeting there, those along an overlapping run are discounted. Hits at the point
// itself only set the boundary flag.
export function pathCrossings(
  segs: Segment[],
  x: number,
  y: number,
  eps: number = DEFAULT_EPSILON
): CrossingResult {
  let crossings = 0
  let boundary = false
  for (const hits of groupBySubpath(rayIntersections(segs, x, y, eps)).values()) {
    let n = 0.0
    for (const hit of hits) {
      if (hit.z.t[0] === 0.0) {
        boundary = true
      } else if (!hit.z.same) {
        n += hit.endpoint ? 0.5 : 1.0
      } else if (hit.endpoint) {
        n -= 0.5
      }
    }
    crossings += Math.trunc(n)
  }
  return { crossings, boundary }
}
