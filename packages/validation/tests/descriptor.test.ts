import { describe, expect, it } from 'vitest'
import {
  isFlatDescriptor,
  parseDescriptor,
  validateDescriptor,
  walkTokens,
} from '../src/descriptor.js'
import { DescriptorError } from '../src/errors.js'

describe('parseDescriptor', () => {
  it('splits on commas and trims', () => {
    expect(parseDescriptor('cat, *,id ,#')).toEqual({ source: 'cat, *,id ,#', tokens: ['cat', '*', 'id', '#'] })
  })

  it('keeps empty tokens', () => {
    expect(parseDescriptor('').tokens).toEqual([''])
    expect(parseDescriptor('a,,b').tokens).toEqual(['a', '', 'b'])
  })
})

describe('validateDescriptor', () => {
  const columns = ['id', 'cat', 'name']

  it('accepts known columns and reserved tokens', () => {
    expect(() => validateDescriptor(parseDescriptor('cat,*,id,#,name'), columns)).not.toThrow()
  })

  it('collects each unknown column once', () => {
    try {
      validateDescriptor(parseDescriptor('x,cat,x,y'), columns)
      expect.fail('Expected DescriptorError')
    } catch (err) {
      expect(err).toBeInstanceOf(DescriptorError)
      expect((err as DescriptorError).columns).toEqual(['x', 'y'])
    }
  })

  it('rejects an empty descriptor', () => {
    expect(() => validateDescriptor(parseDescriptor(''), columns)).toThrow(DescriptorError)
  })
})

describe('isFlatDescriptor', () => {
  it('is true only for a single plain column', () => {
    expect(isFlatDescriptor(parseDescriptor('id'))).toBe(true)
    expect(isFlatDescriptor(parseDescriptor('*'))).toBe(false)
    expect(isFlatDescriptor(parseDescriptor('#'))).toBe(false)
    expect(isFlatDescriptor(parseDescriptor('id,#'))).toBe(false)
  })
})

describe('walkTokens', () => {
  it('drops one trailing record token', () => {
    expect(walkTokens(parseDescriptor('a,#'))).toEqual(['a'])
    expect(walkTokens(parseDescriptor('a,#,#'))).toEqual(['a', '#'])
    expect(walkTokens(parseDescriptor('a,#,b'))).toEqual(['a', '#', 'b'])
  })
})
