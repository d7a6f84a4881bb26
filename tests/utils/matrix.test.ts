import { describe, expect, it } from '@jest/globals'
import { Point } from '../../src/types/base'
import { Matrix } from '../../src/utils/matrix'
import { rotate90CCW, rotate90CW, rotateAbout } from '../../src/utils/vector'

function expectPoint(actual: Point, expected: Point): void {
  expect(actual.x).toBeCloseTo(expected.x, 9)
  expect(actual.y).toBeCloseTo(expected.y, 9)
}

describe('Matrix', () => {
  const p = { x: 3, y: 4 }
  const identity = new Matrix()

  it('should apply elementary transformations', () => {
    expectPoint(identity.translate(2.0, 2.0).apply(p), { x: 5.0, y: 6.0 })
    expectPoint(identity.scale(2.0, 2.0).apply(p), { x: 6.0, y: 8.0 })
    expectPoint(identity.scale(1.0, -1.0).apply(p), { x: 3.0, y: -4.0 })
    expectPoint(identity.scaleAbout(2.0, -1.0, 2.0, 2.0).apply(p), { x: 4.0, y: 0.0 })
    expectPoint(identity.shear(1.0, 0.0).apply(p), { x: 7.0, y: 4.0 })
    expectPoint(identity.shearAbout(1.0, 0.0, 2.0, 2.0).apply(p), { x: 5.0, y: 4.0 })
    expectPoint(identity.rotate(90.0).apply(p), rotate90CCW(p))
    expectPoint(
      identity.rotateAbout(90.0, 5.0, 5.0).apply(p),
      rotateAbout(p, Math.PI / 2.0, { x: 5.0, y: 5.0 })
    )
    expectPoint(identity.reflectX().apply(p), { x: -3.0, y: 4.0 })
    expectPoint(identity.reflectY().apply(p), { x: 3.0, y: -4.0 })
    expectPoint(identity.reflectXAbout(1.5).apply(p), { x: 0.0, y: 4.0 })
    expectPoint(identity.reflectYAbout(2.0).apply(p), { x: 3.0, y: 0.0 })
    expectPoint(identity.rotate(90.0).transpose().apply(p), rotate90CW(p))
  })

  it('should invert and compose', () => {
    expect(identity.scale(2.0, 4.0).inverse().equals(identity.scale(0.5, 0.25))).toBe(true)
    expect(identity.rotate(90.0).inverse().equals(identity.rotate(-90.0))).toBe(true)
    const rotated = identity.scale(1.0, 2.0).rotate(90.0)
    expect(identity.rotate(90.0).scale(2.0, 1.0).equals(rotated)).toBe(true)
    const m = identity.translate(3.0, -1.0).rotate(30.0).scale(2.0, 0.5)
    expect(m.multiply(m.inverse()).equals(identity)).toBe(true)
  })

  it('should find eigenvalues and eigenvectors', () => {
    const diagonal = identity.rotate(-90.0).scale(2.0, 1.0).rotate(90.0).eigen()
    expect(diagonal.lambda1).toBeCloseTo(1.0, 9)
    expect(diagonal.lambda2).toBeCloseTo(2.0, 9)
    expectPoint(diagonal.v1, { x: 1.0, y: 0.0 })
    expectPoint(diagonal.v2, { x: 0.0, y: 1.0 })

    const halfSqrt2 = 1.0 / Math.sqrt(2.0)
    const sheared = identity.shear(1.0, 1.0).eigen()
    expect(sheared.lambda1).toBeCloseTo(0.0, 9)
    expect(sheared.lambda2).toBeCloseTo(2.0, 9)
    expectPoint(sheared.v1, { x: -halfSqrt2, y: halfSqrt2 })
    expectPoint(sheared.v2, { x: halfSqrt2, y: halfSqrt2 })

    const invalid = identity.scale(NaN, NaN).eigen()
    expect(invalid.lambda1).toBeNaN()
    expect(invalid.lambda2).toBeNaN()
    expect(invalid.v1).toEqual({ x: 0, y: 0 })
  })

  it('should decompose into rotations and scaling', () => {
    const m = identity.rotate(-90.0).scale(2.0, 1.0).rotate(90.0).translate(0.0, 10.0)
    const { tx, ty, sx, sy } = m.decompose()
    expect(tx).toBeCloseTo(0.0, 9)
    expect(ty).toBeCloseTo(20.0, 9)
    expect(sx).toBeCloseTo(2.0, 9)
    expect(sy).toBeCloseTo(1.0, 9)

    const d = identity.translate(3.0, 4.0).rotate(90.0).scale(2.0, 1.0).decompose()
    expect(d.tx).toBe(3.0)
    expect(d.ty).toBe(4.0)
    expect(d.phi).toBeCloseTo(90.0, 9)
    expect(d.sx).toBeCloseTo(2.0, 9)
    expect(d.sy).toBeCloseTo(1.0, 9)
    expect(d.theta).toBeCloseTo(0.0, 9)
  })

  it.each([
    ['translation', identity.translate(1.0, 1.0), true, true, true],
    ['rotation', identity.rotate(90.0), false, true, true],
    ['reflection', identity.scale(-1.0, 1.0), false, true, true],
    ['uniform scaling', identity.scale(2.0, 2.0), false, false, true],
    ['scaling', identity.scale(2.0, 1.0), false, false, false],
    ['shear', identity.shear(2.0, -1.0), false, false, false]
  ])('should classify a %s', (_, m, translation, rigid, similarity) => {
    expect(m.isTranslation()).toBe(translation)
    expect(m.isRigid()).toBe(rigid)
    expect(m.isSimilarity()).toBe(similarity)
  })

  it('should print its components', () => {
    expect(identity.shear(2.0, 3.0).toString()).toBe('(1 2; 3 1) + (0,0)')
  })
})
