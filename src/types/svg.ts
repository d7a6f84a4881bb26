import type { Path } from '../paths/path'
import { FillRule } from './base'

export enum ElementType {
  Group = 'g',
  Path = 'path',
  Rectangle = 'rect',
  Circle = 'circle',
  Ellipse = 'ellipse',
  Line = 'line',
  Polyline = 'polyline',
  Polygon = 'polygon'
}

// Element of an SVG document as it comes out of the XML parser.
export type RawSvgElement = {
  type: string
  attributes: Record<string, string>
  children: RawSvgElement[]
}

// A drawable element turned into a path in document coordinates, transforms applied.
export interface PathRecord {
  element: ElementType
  id?: string
  path: Path
  fillRule: FillRule
}
