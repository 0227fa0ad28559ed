import { BigVec, DEFAULT_CAPACITY_PER_VEC } from '../big-vec'
import { Value, integerValue } from '../../types/values'

describe('BigVec', () => {
  const withItems = (count: number, capacity = 3): BigVec<number> => {
    const vec = BigVec.withCapacityPerVec<number>(capacity)
    for (let i = 0; i < count; i++) {
      vec.push(i)
    }
    return vec
  }

  describe('construction', () => {
    it('should start empty with the default capacity', () => {
      const vec = new BigVec<number>()

      expect(vec.isEmpty()).toBe(true)
      expect(vec.length).toBe(0)
      expect(vec.capacityPerVec).toBe(DEFAULT_CAPACITY_PER_VEC)
    })

    it('should build from a list', () => {
      const vec = BigVec.from([1, 2, 3, 4, 5, 6, 7, 8, 9])

      expect(vec.isEmpty()).toBe(false)
      expect(vec.structure()).toEqual([9])
      expect([...vec]).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9])
    })

    it('should reject a capacity that is not positive', () => {
      expect(() => BigVec.withCapacityPerVec(0)).toThrow('Invalid capacity per vec 0: expected a positive whole number')
    })
  })

  describe('push and pop', () => {
    it('should open a new sub-vector when the last one is full', () => {
      const vec = BigVec.withCapacityPerVec<number>(3)

      for (let i = 0; i < 7; i++) {
        vec.push(i)
        expect(vec.length).toBe(i + 1)
        expect(vec.vecCount()).toBe(Math.floor(i / 3) + 1)
      }
      expect(vec.structure()).toEqual([3, 3, 1])
      expect(vec.toArray()).toEqual([0, 1, 2, 3, 4, 5, 6])
    })

    it('should pop from the end and drop emptied sub-vectors', () => {
      const vec = withItems(7)

      expect(vec.pop()).toBe(6)
      expect(vec.structure()).toEqual([3, 3])
      expect(vec.pop()).toBe(5)
      expect(vec.structure()).toEqual([3, 2])

      expect([vec.pop(), vec.pop(), vec.pop(), vec.pop(), vec.pop()]).toEqual([4, 3, 2, 1, 0])
      expect(vec.isEmpty()).toBe(true)
      expect(vec.pop()).toBeUndefined()
    })
  })

  describe('indexing', () => {
    it('should get every element and nothing past the end', () => {
      const vec = withItems(7)

      expect([0, 1, 2, 3, 4, 5, 6].map(i => vec.get(i))).toEqual([0, 1, 2, 3, 4, 5, 6])
      expect(vec.get(7)).toBeUndefined()
      expect(vec.get(-1)).toBeUndefined()
    })

    it('should replace an element in place', () => {
      const vec = withItems(7)

      expect(vec.set(0, 35)).toBe(true)
      expect(vec.get(0)).toBe(35)
      expect(vec.set(7, 1)).toBe(false)
    })

    it('should index across sub-vectors that are not full', () => {
      const vec = withItems(7)
      vec.pushVecRaw([7, 8])

      expect(vec.structure()).toEqual([3, 3, 1, 2])
      expect(vec.get(7)).toBe(7)
      expect(vec.get(8)).toBe(8)
    })
  })

  describe('insert', () => {
    it('should shift later elements into the following sub-vectors', () => {
      const vec = withItems(7)

      vec.insert(5, 10)
      expect(vec.toArray()).toEqual([0, 1, 2, 3, 4, 10, 5, 6])
      expect(vec.structure()).toEqual([3, 3, 2])

      vec.insert(0, 10)
      expect(vec.toArray()).toEqual([10, 0, 1, 2, 3, 4, 10, 5, 6])
      expect(vec.structure()).toEqual([3, 3, 3])

      vec.insert(9, 23)
      expect(vec.toArray()).toEqual([10, 0, 1, 2, 3, 4, 10, 5, 6, 23])
      expect(vec.structure()).toEqual([3, 3, 3, 1])
    })

    it('should refuse an index past the end', () => {
      const vec = withItems(7)

      expect(() => vec.insert(15, 10)).toThrow('Trying to insert to index 15 which is out of bounds!')
    })

    it('should insert into an empty vector', () => {
      const vec = new BigVec<number>()
      vec.insert(0, 1)

      expect(vec.toArray()).toEqual([1])
    })
  })

  describe('sub-vector operations', () => {
    it('should pop whole sub-vectors from the front', () => {
      const vec = withItems(7)

      expect(vec.popFirstVec()).toEqual([0, 1, 2])
      expect([vec.get(0), vec.get(1), vec.get(2), vec.get(5)]).toEqual([3, 4, 5, undefined])

      expect(vec.popFirstVec()).toEqual([3, 4, 5])
      expect([vec.get(0), vec.get(1)]).toEqual([6, undefined])

      vec.push(7)
      expect(vec.popFirstVec()).toEqual([6, 7])
      expect(vec.get(0)).toBeUndefined()
      expect(vec.popFirstVec()).toBeUndefined()
    })

    it('should fill the last sub-vector before opening new ones', () => {
      const vec = withItems(7)

      vec.pushVec([7, 8, 9])
      expect(vec.structure()).toEqual([3, 3, 3, 1])
      vec.pushVec([10])
      expect(vec.structure()).toEqual([3, 3, 3, 2])
      vec.pushVec([11, 12, 13, 14])

      expect(vec.structure()).toEqual([3, 3, 3, 3, 3])
      expect(vec.toArray()).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14])
    })

    it('should push raw sub-vectors without filling the last one', () => {
      const vec = withItems(7)
      vec.pushVecRaw([7, 8, 9, 10])

      expect(vec.structure()).toEqual([3, 3, 1, 3, 1])
      expect(vec.internalRepresentation()).toEqual([[0, 1, 2], [3, 4, 5], [6], [7, 8, 9], [10]])
    })

    it('should move the sub-vectors of another vector of the same capacity', () => {
      const vec = withItems(4)
      const other = BigVec.from([5, 6], 3)

      vec.append(other)

      expect(vec.structure()).toEqual([3, 1, 2])
      expect(vec.toArray()).toEqual([0, 1, 2, 3, 5, 6])
      expect(other.isEmpty()).toBe(true)
    })

    it('should refuse to append a vector with another capacity', () => {
      const vec = withItems(4)

      expect(() => vec.append(BigVec.from([1], 2))).toThrow('Cannot append from a BigVec with a different structure')
    })
  })

  describe('encoding', () => {
    const encode = (element: number) => integerValue('u32', element)
    const decode = (value: Value): number => (value.kind === 'integer' ? Number(value.value) : -1)

    it('should keep the sub-vector structure in its value', () => {
      const vec = withItems(4)

      const value = vec.toValue<string, string>(encode)
      expect(value).toEqual({
        kind: 'tuple',
        fields: [
          { kind: 'integer', type: 'u64', value: 3n },
          {
            kind: 'array',
            elements: [
              { kind: 'array', elements: [encode(0), encode(1), encode(2)] },
              { kind: 'array', elements: [encode(3)] }
            ]
          }
        ]
      })

      const decoded = BigVec.fromValue(value, decode)
      expect(decoded.capacityPerVec).toBe(3)
      expect(decoded.structure()).toEqual([3, 1])
      expect(decoded.toArray()).toEqual([0, 1, 2, 3])
    })

    it('should refuse values that are not an encoded vector', () => {
      expect(() => BigVec.fromValue({ kind: 'string', value: 'x' }, decode)).toThrow('Expected an encoded BigVec, got string')
      expect(() => BigVec.fromValue({
        kind: 'tuple',
        fields: [{ kind: 'integer', type: 'u64', value: 1n }, { kind: 'array', elements: [{ kind: 'array', elements: [] }] }]
      }, decode)).toThrow('Expected an encoded BigVec, got a malformed sub-vector')
    })
  })
})
