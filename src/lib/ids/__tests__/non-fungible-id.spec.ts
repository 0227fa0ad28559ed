import {
  formatNonFungibleId,
  parseNonFungibleId,
  sameNonFungibleId,
  toNonFungibleId,
  toNonFungibleIdSet
} from '../non-fungible-id'
import { MalformedIdentifierError } from '../../errors'

const RUID = '0123456789abcdef'.repeat(4)

describe('non-fungible ids', () => {
  describe('toNonFungibleId', () => {
    it('should accept every way of writing an integer id', () => {
      const expected = { type: 'integer', value: 7n }

      expect(toNonFungibleId(7)).toEqual(expected)
      expect(toNonFungibleId(7n)).toEqual(expected)
      expect(toNonFungibleId('#7#')).toEqual(expected)
      expect(toNonFungibleId({ type: 'integer', value: 7 })).toEqual(expected)
    })

    it('should take a plain string as a string id', () => {
      expect(toNonFungibleId('alice')).toEqual({ type: 'string', value: 'alice' })
      expect(toNonFungibleId('<alice>')).toEqual({ type: 'string', value: 'alice' })
    })

    it('should lower-case bytes and RUID ids', () => {
      expect(toNonFungibleId('[C0FFEE]')).toEqual({ type: 'bytes', value: 'c0ffee' })
      expect(toNonFungibleId({ type: 'ruid', value: RUID.toUpperCase() })).toEqual({ type: 'ruid', value: RUID })
    })

    it('should reject malformed literals', () => {
      expect(() => toNonFungibleId(-1)).toThrow(MalformedIdentifierError)
      expect(() => toNonFungibleId(1.5)).toThrow(MalformedIdentifierError)
      expect(() => toNonFungibleId(2n ** 64n)).toThrow(MalformedIdentifierError)
      expect(() => toNonFungibleId('#12')).toThrow('integer ids are written as #<digits>#')
      expect(() => toNonFungibleId('#1a#')).toThrow('integer ids may only contain digits')
      expect(() => toNonFungibleId('[abc]')).toThrow('bytes ids are 1-64 bytes of hex')
      expect(() => toNonFungibleId('{1234}')).toThrow('RUID ids are exactly 32 bytes of hex')
      expect(() => toNonFungibleId('has space')).toThrow('string ids are 1-64 characters of [a-zA-Z0-9_]')
    })
  })

  describe('formatNonFungibleId', () => {
    it('should write the canonical text form', () => {
      expect(formatNonFungibleId({ type: 'integer', value: 42n })).toBe('#42#')
      expect(formatNonFungibleId({ type: 'string', value: 'car' })).toBe('<car>')
      expect(formatNonFungibleId({ type: 'bytes', value: '0a0b' })).toBe('[0a0b]')
      expect(formatNonFungibleId({ type: 'ruid', value: RUID })).toBe(
        '{0123456789abcdef-0123456789abcdef-0123456789abcdef-0123456789abcdef}'
      )
    })

    it('should parse what it writes', () => {
      const id = parseNonFungibleId(`{${RUID}}`)
      expect(parseNonFungibleId(formatNonFungibleId(id))).toEqual(id)
    })
  })

  describe('toNonFungibleIdSet', () => {
    it('should drop repeated ids, keeping the first occurrence', () => {
      const ids = toNonFungibleIdSet([1, '#1#', 'one', 2, '<one>'])

      expect(ids.map(formatNonFungibleId)).toEqual(['#1#', '<one>', '#2#'])
    })

    it('should allow an empty set', () => {
      expect(toNonFungibleIdSet([])).toEqual([])
    })
  })

  it('should compare ids by canonical form', () => {
    expect(sameNonFungibleId(toNonFungibleId(3), toNonFungibleId('#3#'))).toBe(true)
    expect(sameNonFungibleId(toNonFungibleId(3), toNonFungibleId('3'))).toBe(false)
  })
})
