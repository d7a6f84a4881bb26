import { XMLParser } from 'fast-xml-parser'
import { promises as fs } from 'node:fs'
import { KernelConfig } from '../constants'
import { ParseError } from '../parsers/exceptions'
import { parseTransform } from '../parsers/transform'
import { FillRule } from '../types/base'
import { ElementType, PathRecord, RawSvgElement } from '../types/svg'
import { Matrix } from '../utils/matrix'
import { PathReader, readFillRule } from './path'
import { ShapeReader } from './shape'

export class SvgReadError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SvgReadError'
  }
}

const ELEMENT_TYPES = new Map<string, ElementType>(
  Object.values(ElementType).map((type) => [type, type])
)

const SILENT_ELEMENTS = new Set(['defs', 'title', 'desc', 'metadata', 'style'])

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

// With preserveOrder every node is an object holding its tag name as the only key besides the
// attributes under ':@'.
function toRawElement(node: Record<string, unknown>): RawSvgElement | undefined {
  const tag = Object.keys(node).find((key) => key !== ':@')
  if (tag === undefined || tag.startsWith('#') || tag.startsWith('?')) {
    return undefined
  }

  const attributes: Record<string, string> = {}
  const attrs = node[':@']
  if (isRecord(attrs)) {
    for (const [key, value] of Object.entries(attrs)) {
      if (typeof value === 'string' || typeof value === 'number') {
        attributes[key] = String(value)
      }
    }
  }
  return { type: tag, attributes, children: toRawElements(node[tag]) }
}

function toRawElements(nodes: unknown): RawSvgElement[] {
  const elements: RawSvgElement[] = []
  if (!Array.isArray(nodes)) {
    return elements
  }
  for (const node of nodes) {
    const element = isRecord(node) ? toRawElement(node) : undefined
    if (element !== undefined) {
      elements.push(element)
    }
  }
  return elements
}

interface Context {
  matrix: Matrix
  fillRule: FillRule
}

// Reads the drawable elements of an SVG document as paths in document order. Group transforms and
// fill rules are passed down to their children.
export class SvgReader {
  private xmlParser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '',
    preserveOrder: true
  })

  private shapeReader: ShapeReader
  private pathReader: PathReader

  constructor(config: Partial<KernelConfig> = {}) {
    this.shapeReader = new ShapeReader(config)
    this.pathReader = new PathReader(config)
  }

  private context(element: RawSvgElement, parent: Context): Context {
    let matrix = parent.matrix
    const transform = element.attributes['transform']
    if (transform) {
      try {
        matrix = matrix.multiply(parseTransform(transform))
      } catch (error) {
        if (error instanceof ParseError) {
          throw new SvgReadError(`Invalid transform on ${element.type}: ${error.message}`)
        }
        throw error
      }
    }
    return { matrix, fillRule: readFillRule(element) ?? parent.fillRule }
  }

  private readElement(element: RawSvgElement, parent: Context, records: PathRecord[]): void {
    const type = ELEMENT_TYPES.get(element.type)
    if (type === undefined) {
      // Definitions and metadata carry no geometry of their own.
      if (!SILENT_ELEMENTS.has(element.type)) {
        console.warn(`Skipping unsupported element: ${element.type}`)
      }
      return
    }

    const ctx = this.context(element, parent)
    if (type === ElementType.Group) {
      for (const child of element.children) {
        this.readElement(child, ctx, records)
      }
      return
    }

    const path =
      type === ElementType.Path ? this.pathReader.read(element) : this.shapeReader.read(element)
    const record: PathRecord = {
      element: type,
      path: path.transform(ctx.matrix),
      fillRule: ctx.fillRule
    }
    const id = element.attributes['id']
    if (id) {
      record.id = id
    }
    records.push(record)
  }

  public readString(content: string): PathRecord[] {
    let parsed: unknown
    try {
      parsed = this.xmlParser.parse(content)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new SvgReadError(`Failed to parse SVG: ${reason}`)
    }

    const root = toRawElements(parsed).find((element) => element.type === 'svg')
    if (root === undefined) {
      throw new SvgReadError('No SVG element found')
    }

    const records: PathRecord[] = []
    const ctx = this.context(root, { matrix: new Matrix(), fillRule: FillRule.NonZero })
    for (const child of root.children) {
      this.readElement(child, ctx, records)
    }
    return records
  }

  public async read(filepath: string): Promise<PathRecord[]> {
    let content: string
    try {
      content = await fs.readFile(filepath, 'utf8')
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new SvgReadError(`Failed to read SVG file ${filepath}: ${reason}`)
    }
    return this.readString(content)
  }
}
