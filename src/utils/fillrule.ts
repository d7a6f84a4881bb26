import { FillRule } from '../types/base'

// Whether a region with the given winding number is filled under the rule.
export function fills(fillRule: FillRule, windings: number): boolean {
  switch (fillRule) {
    case FillRule.NonZero:
      return windings !== 0
    case FillRule.EvenOdd:
      return windings % 2 !== 0
    case FillRule.Positive:
      return 0 < windings
    case FillRule.Negative:
      return windings < 0
  }
}

export function parseFillRule(value: string): FillRule | undefined {
  switch (value) {
    case FillRule.NonZero:
      return FillRule.NonZero
    case FillRule.EvenOdd:
      return FillRule.EvenOdd
    case FillRule.Positive:
      return FillRule.Positive
    case FillRule.Negative:
      return FillRule.Negative
    default:
      return undefined
  }
}
