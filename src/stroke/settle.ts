import { KernelConfig, resolveConfig } from '../constants'
import { intersectionLineLine } from '../intersections/intersections'
import { pathWindings } from '../intersections/winding'
import { findFaces, linkKeptEdges, makeHalfEdges } from '../paths/dcel/dcel'
import { VertexCollection } from '../paths/dcel/vertex_collection'
import { Path } from '../paths/path'
import { FillRule, Point } from '../types/base'
import { CommandType, Segment } from '../types/paths'
import { fills } from '../utils/fillrule'
import {
  add,
  interpolate,
  normalizeVector,
  rotate90CCW,
  subtract,
  vectorLength
} from '../utils/vector'

interface Edge {
  a: Point
  b: Point
  ts: number[]
}

function flatEdges(segs: Segment[], eps: number): Edge[] {
  const edges: Edge[] = []
  for (const seg of segs) {
    if (seg.type !== CommandType.LineTo && seg.type !== CommandType.Close) {
      continue
    }
    if (eps < vectorLength(subtract(seg.end, seg.start))) {
      edges.push({ a: seg.start, b: seg.end, ts: [] })
    }
  }
  return edges
}

// Records the intersections between all edges on the edges themselves. Returns whether any of them
// is more than two edges meeting at their end points.
function intersectEdges(edges: Edge[], eps: number): boolean {
  let crossing = false
  const atEnd = (t: number): boolean => t === 0.0 || t === 1.0
  for (let i = 0; i < edges.length; i++) {
    for (let j = i + 1; j < edges.length; j++) {
      const a = edges[i]
      const b = edges[j]
      for (const z of intersectionLineLine([], a.a, a.b, b.a, b.b, eps)) {
        if (z.same || !atEnd(z.t[0]) || !atEnd(z.t[1])) {
          crossing = true
        }
        a.ts.push(z.t[0])
        b.ts.push(z.t[1])
      }
    }
  }
  return crossing
}

function orient(p: Path, ccw: boolean): Path {
  return p.ccw() === ccw ? p : p.reverse()
}

// Keeps the subpaths that separate filled from unfilled area. Only valid when no subpath crosses
// or overlaps another, or itself.
function settleSubpaths(subs: Path[], fillRule: FillRule, config: KernelConfig): Path {
  const segs = subs.map((sub) => sub.segments())
  const q = new Path(config)
  subs.forEach((sub, i) => {
    const start = sub.startPos()
    let outside = 0
    segs.forEach((s, j) => {
      if (i === j) {
        return
      }
      const { windings, boundary } = pathWindings(s, start.x, start.y, config.epsilon)
      if (!boundary) {
        outside += windings
      }
    })
    const inside = outside + (sub.ccw() ? 1 : -1)

    const fillsInside = fills(fillRule, inside)
    if (fillsInside !== fills(fillRule, outside)) {
      q.append(orient(sub, fillsInside))
    }
  })
  return q
}

// Resolves overlapping and self-intersecting subpaths into loops that bound the area filled under
// the fill rule. Filled loops run anticlockwise and holes clockwise. When subpaths do intersect,
// the result is built from the flattened path.
export function settle(p: Path, fillRule: FillRule, config: Partial<KernelConfig> = {}): Path {
  const cfg = resolveConfig({ ...p.config, ...config })
  const eps = cfg.epsilon

  const subs = p
    .split()
    .map((sub) => sub.close())
    .filter((sub) => !sub.empty())
  const flat = new Path(cfg).append(...subs.map((sub) => sub.flatten(cfg.tolerance)))
  const flatSegs = flat.segments()
  const edges = flatEdges(flatSegs, eps)
  if (!intersectEdges(edges, eps)) {
    return settleSubpaths(subs, fillRule, cfg)
  }

  // Split all edges at their intersections.
  const V = new VertexCollection(Math.max(eps, cfg.tolerance * 1e-3))
  const pieces: [Point, Point][] = []
  for (const edge of edges) {
    const ts = [0.0, ...edge.ts.filter((t) => eps < t && t < 1.0 - eps), 1.0].sort(
      (x, y) => x - y
    )
    for (let k = 1; k < ts.length; k++) {
      pieces.push([interpolate(edge.a, edge.b, ts[k - 1]), interpolate(edge.a, edge.b, ts[k])])
    }
  }
  const halfEdges = makeHalfEdges(pieces, V)

  // Keep the half edge that has the filled side to its left, when only one side is filled.
  for (let k = 0; k < halfEdges.length; k += 2) {
    const e = halfEdges[k]
    const a = { x: e.tail.x, y: e.tail.y }
    const b = { x: e.head.x, y: e.head.y }
    const d = subtract(b, a)
    const mid = interpolate(a, b, 0.5)
    const n = normalizeVector(rotate90CCW(d), Math.max(10.0 * eps, vectorLength(d) * 1e-3))

    const left = add(mid, n)
    const right = subtract(mid, n)
    const fillsLeft = fills(fillRule, pathWindings(flatSegs, left.x, left.y, eps).windings)
    const fillsRight = fills(fillRule, pathWindings(flatSegs, right.x, right.y, eps).windings)
    if (fillsLeft !== fillsRight) {
      const twin = e.twin
      if (fillsLeft) {
        e.kept = true
      } else if (twin !== undefined) {
        twin.kept = true
      }
    }
  }
  linkKeptEdges(halfEdges)

  const q = new Path(cfg)
  for (const face of findFaces(halfEdges)) {
    q.moveTo(face[0].tail.x, face[0].tail.y)
    for (const e of face) {
      q.lineTo(e.head.x, e.head.y)
    }
    q.close()
    q.optimizeClose()
  }
  return q
}
