import { Point } from '../../types/base'
import type { HalfEdge } from './dcel'

export interface Vertex {
  id: number
  x: number
  y: number
  outgoing: HalfEdge[]
}

// Vertices snapped to a grid of the given size, so that intersection points computed from
// different edges end up at the same vertex.
export class VertexCollection {
  private readonly scale: number
  private readonly map = new Map<string, Vertex>()

  constructor(snap: number) {
    this.scale = 1 / snap
  }

  private key(p: Point): string {
    return `X${Math.round(p.x * this.scale)}Y${Math.round(p.y * this.scale)}`
  }

  public getOrCreate(p: Point): Vertex {
    const k = this.key(p)
    let v = this.map.get(k)
    if (v === undefined) {
      v = { id: this.map.size, x: p.x, y: p.y, outgoing: [] }
      this.map.set(k, v)
    }
    return v
  }

  size(): number {
    return this.map.size
  }

  *vertices(): IterableIterator<Vertex> {
    yield* this.map.values()
  }
}
