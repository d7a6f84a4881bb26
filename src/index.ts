export * from './constants'
export * from './types/base'
export * from './types/paths'
export * from './types/svg'
export * from './utils/vector'
export * from './utils/math'
export * from './utils/matrix'
export * from './utils/bounds'
export * from './utils/fillrule'
export * from './bezier/math'
export * from './bezier/split'
export * from './bezier/flatten'
export * from './ellipse/math'
export * from './ellipse/convert'
export * from './intersections/intersections'
export * from './intersections/winding'
export * from './paths/path'
export * from './paths/shapes'
export * from './stroke/cappers'
export * from './stroke/joiners'
export { offsetPath, offsetRails, strokePath } from './stroke/offset'
export type { Rails } from './stroke/offset'
export { settle } from './stroke/settle'
export * from './parsers/exceptions'
export { SvgPathParser, parseSvgPath } from './parsers/path'
export { parseTransform, TransformType } from './parsers/transform'
export { parseNumber, parsePoints } from './parsers/values'
export { FormatterError, PathFormat, PathFormatter } from './writer/formatter'
export { PathReadError, PathReader } from './reader/path'
export { ShapeReadError, ShapeReader } from './reader/shape'
export { SvgReadError, SvgReader } from './reader/base'
