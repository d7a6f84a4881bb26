import { KernelConfig } from '../constants'
import { SvgPathParser } from '../parsers/path'
import { ParseError } from '../parsers/exceptions'
import { Path } from '../paths/path'
import { FillRule } from '../types/base'
import { ElementType, RawSvgElement } from '../types/svg'

export class PathReadError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PathReadError'
  }
}

function toFillRule(value: string, source: string): FillRule {
  if (value === FillRule.NonZero || value === FillRule.EvenOdd) {
    return value
  }
  throw new PathReadError(`Invalid fill-rule${source}: ${value}`)
}

export function readStyle(element: RawSvgElement): Record<string, string> {
  const style = element.attributes['style']
  const styles: Record<string, string> = {}
  if (!style) {
    return styles
  }
  for (const declaration of style.split(';')) {
    const [key, value] = declaration.split(':').map((s) => s.trim())
    if (key && value) {
      styles[key] = value
    }
  }
  return styles
}

// Fill rule set on the element itself, the style attribute taking precedence over the
// presentation attribute.
export function readFillRule(element: RawSvgElement): FillRule | undefined {
  const styleRule = readStyle(element)['fill-rule']
  if (styleRule) {
    return toFillRule(styleRule, ' in style')
  }
  const attr = element.attributes['fill-rule']
  if (attr) {
    return toFillRule(attr, '')
  }
  return undefined
}

export class PathReader {
  private pathParser: SvgPathParser

  constructor(config: Partial<KernelConfig> = {}) {
    this.pathParser = new SvgPathParser(config)
  }

  public read(element: RawSvgElement): Path {
    if (element.type !== ElementType.Path) {
      throw new PathReadError('Element is not a path')
    }

    const d = element.attributes['d']
    if (d === undefined) {
      throw new PathReadError('Path element missing "d" attribute')
    }

    try {
      return this.pathParser.parse(d)
    } catch (error) {
      if (error instanceof ParseError) {
        throw new PathReadError(`Invalid path data: ${error.message}`)
      }
      throw error
    }
  }
}
