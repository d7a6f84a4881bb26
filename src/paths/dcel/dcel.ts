import { Point } from '../../types/base'
import { angleNorm } from '../../utils/math'
import { Vertex, VertexCollection } from './vertex_collection'

// Straight half edge. Only kept half edges take part in face tracing, those run with the filled
// area on their left.
export interface HalfEdge {
  tail: Vertex
  head: Vertex
  twin?: HalfEdge
  next?: HalfEdge
  kept: boolean
}

// Half edge pairs for the line pieces. Pieces that collapse onto a single vertex and pieces that
// repeat an earlier one are skipped.
export function makeHalfEdges(pieces: [Point, Point][], V: VertexCollection): HalfEdge[] {
  const halfEdges: HalfEdge[] = []
  const seen = new Set<string>()
  for (const [pTail, pHead] of pieces) {
    const vertexTail = V.getOrCreate(pTail)
    const vertexHead = V.getOrCreate(pHead)
    if (vertexTail === vertexHead) {
      continue
    }

    const key =
      vertexTail.id < vertexHead.id
        ? `${vertexTail.id}:${vertexHead.id}`
        : `${vertexHead.id}:${vertexTail.id}`
    if (seen.has(key)) {
      continue
    }
    seen.add(key)

    const edgeForward: HalfEdge = { tail: vertexTail, head: vertexHead, kept: false }
    const edgeReverse: HalfEdge = { tail: vertexHead, head: vertexTail, kept: false }
    edgeForward.twin = edgeReverse
    edgeReverse.twin = edgeForward

    vertexTail.outgoing.push(edgeForward)
    vertexHead.outgoing.push(edgeReverse)

    halfEdges.push(edgeForward, edgeReverse)
  }
  return halfEdges
}

export function edgeAngle(e: HalfEdge): number {
  return Math.atan2(e.head.y - e.tail.y, e.head.x - e.tail.x)
}

// Links every kept half edge to the kept outgoing edge that comes first when turning clockwise
// from its reverse direction. Regions that only touch at a vertex thus stay separate loops.
export function linkKeptEdges(halfEdges: HalfEdge[]): void {
  for (const e of halfEdges) {
    if (!e.kept) {
      continue
    }
    const back = edgeAngle(e) + Math.PI
    let best: HalfEdge | undefined
    let bestTurn = Infinity
    for (const out of e.head.outgoing) {
      if (!out.kept || out === e.twin) {
        continue
      }
      const turn = angleNorm(back - edgeAngle(out))
      if (turn < bestTurn) {
        best = out
        bestTurn = turn
      }
    }
    e.next = best
  }
}

// Closed loops of kept half edges following the next links.
export function findFaces(halfEdges: HalfEdge[]): HalfEdge[][] {
  const faces: HalfEdge[][] = []
  const visited = new Set<HalfEdge>()

  for (const startEdge of halfEdges) {
    if (!startEdge.kept || visited.has(startEdge)) {
      continue
    }

    const face: HalfEdge[] = []
    let currentEdge: HalfEdge | undefined = startEdge
    while (currentEdge !== undefined && !visited.has(currentEdge)) {
      face.push(currentEdge)
      visited.add(currentEdge)
      currentEdge = currentEdge.next
    }

    if (currentEdge === startEdge && 2 < face.length) {
      faces.push(face)
    } else if (0 < face.length) {
      console.warn(`Open face of ${face.length} edges dropped while settling`)
    }
  }
  return faces
}
