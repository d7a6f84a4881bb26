export type Point = {
  x: number
  y: number
}

export type Vector = {
  x: number
  y: number
}

export type Bounds = {
  xMin: number
  yMin: number
  xMax: number
  yMax: number
}

export enum FillRule {
  NonZero = 'nonzero',
  EvenOdd = 'evenodd',
  Positive = 'positive',
  Negative = 'negative'
}
