import { Value } from '../types/values'

// The capacity a 4-byte element gets in a one-megabyte sub-vector.
export const DEFAULT_CAPACITY_PER_VEC = 250_000

/**
 * A list stored as a sequence of sub-vectors of bounded size, so that component state
 * never holds one unbounded array. Every sub-vector holds at least one element and at most
 * `capacityPerVec`; only the sub-vectors touched by an operation change.
 */
export class BigVec<V> implements Iterable<V> {
  private readonly subVecs: V[][] = []

  constructor(public readonly capacityPerVec: number = DEFAULT_CAPACITY_PER_VEC) {
    if (!Number.isSafeInteger(capacityPerVec) || capacityPerVec < 1) {
      throw new RangeError(`Invalid capacity per vec ${capacityPerVec}: expected a positive whole number`)
    }
  }

  public static withCapacityPerVec<V>(capacityPerVec: number): BigVec<V> {
    return new BigVec<V>(capacityPerVec)
  }

  public static from<V>(elements: readonly V[], capacityPerVec?: number): BigVec<V> {
    const vec = new BigVec<V>(capacityPerVec)
    vec.pushVec(elements)
    return vec
  }

  get length(): number {
    return this.subVecs.reduce((total, subVec) => total + subVec.length, 0)
  }

  public isEmpty(): boolean {
    return this.subVecs.length === 0
  }

  /**
   * Number of sub-vectors.
   */
  public vecCount(): number {
    return this.subVecs.length
  }

  /**
   * Size of each sub-vector, in order.
   */
  public structure(): number[] {
    return this.subVecs.map(subVec => subVec.length)
  }

  public push(element: V): void {
    const last = this.subVecs[this.subVecs.length - 1]
    if (last === undefined || last.length >= this.capacityPerVec) {
      this.subVecs.push([element])
    } else {
      last.push(element)
    }
  }

  public pop(): V | undefined {
    const last = this.subVecs[this.subVecs.length - 1]
    if (last === undefined) {
      return undefined
    }
    const element = last.pop()
    if (last.length === 0) {
      this.subVecs.pop()
    }
    return element
  }

  public get(index: number): V | undefined {
    const position = this.locate(index)
    return position === undefined ? undefined : this.subVecs[position.vec][position.offset]
  }

  /**
   * Replaces the element at `index`. Returns false when the index is out of bounds.
   */
  public set(index: number, element: V): boolean {
    const position = this.locate(index)
    if (position === undefined) {
      return false
    }
    this.subVecs[position.vec][position.offset] = element
    return true
  }

  /**
   * Inserts before `index`, or appends when `index` is the length. A sub-vector pushed over
   * capacity hands its last element to the start of the next one, and so on.
   */
  public insert(index: number, element: V): void {
    if (index === this.length) {
      this.push(element)
      return
    }
    const position = this.locate(index)
    if (position === undefined) {
      throw new RangeError(`Trying to insert to index ${index} which is out of bounds!`)
    }

    let vec = position.vec
    this.subVecs[vec].splice(position.offset, 0, element)
    while (this.subVecs[vec].length > this.capacityPerVec) {
      const carried = this.subVecs[vec].pop()
      if (carried === undefined) {
        break
      }
      vec += 1
      const next = this.subVecs[vec]
      if (next === undefined) {
        this.subVecs.push([carried])
        return
      }
      next.unshift(carried)
    }
  }

  public popFirstVec(): V[] | undefined {
    return this.subVecs.shift()
  }

  /**
   * Appends elements, filling the last sub-vector before starting new ones.
   */
  public pushVec(elements: readonly V[]): void {
    const last = this.subVecs[this.subVecs.length - 1]
    let rest = elements
    if (last !== undefined) {
      const room = this.capacityPerVec - last.length
      last.push(...rest.slice(0, room))
      rest = rest.slice(room)
    }
    this.pushVecRaw(rest)
  }

  /**
   * Appends elements in new sub-vectors, leaving the last sub-vector as it is.
   */
  public pushVecRaw(elements: readonly V[]): void {
    for (let start = 0; start < elements.length; start += this.capacityPerVec) {
      this.subVecs.push(elements.slice(start, start + this.capacityPerVec))
    }
  }

  /**
   * Moves the sub-vectors of `other` to the end of this one, leaving `other` empty.
   */
  public append(other: BigVec<V>): void {
    if (other.capacityPerVec !== this.capacityPerVec) {
      throw new RangeError('Cannot append from a BigVec with a different structure')
    }
    this.subVecs.push(...other.subVecs.splice(0))
  }

  /**
   * Copies of the sub-vectors, in order.
   */
  public internalRepresentation(): V[][] {
    return this.subVecs.map(subVec => [...subVec])
  }

  public toArray(): V[] {
    return this.subVecs.flat()
  }

  public *[Symbol.iterator](): Iterator<V> {
    for (const subVec of this.subVecs) {
      yield* subVec
    }
  }

  /**
   * Encodes the vector as `Tuple(capacity u64, Array(Array(element)...))`, for a component field.
   */
  public toValue<B, P>(encode: (element: V) => Value<B, P>): Value<B, P> {
    return {
      kind: 'tuple',
      fields: [
        { kind: 'integer', type: 'u64', value: BigInt(this.capacityPerVec) },
        { kind: 'array', elements: this.subVecs.map(subVec => ({ kind: 'array', elements: subVec.map(encode) })) }
      ]
    }
  }

  public static fromValue<V, B, P>(value: Value<B, P>, decode: (element: Value<B, P>) => V): BigVec<V> {
    const [capacity, subVecs] = value.kind === 'tuple' ? value.fields : []
    if (capacity?.kind !== 'integer' || subVecs?.kind !== 'array') {
      throw new TypeError(`Expected an encoded BigVec, got ${value.kind}`)
    }
    const vec = new BigVec<V>(Number(capacity.value))
    for (const subVec of subVecs.elements) {
      if (subVec.kind !== 'array' || subVec.elements.length === 0 || subVec.elements.length > vec.capacityPerVec) {
        throw new TypeError('Expected an encoded BigVec, got a malformed sub-vector')
      }
      vec.subVecs.push(subVec.elements.map(decode))
    }
    return vec
  }

  private locate(index: number): { vec: number; offset: number } | undefined {
    if (!Number.isSafeInteger(index) || index < 0) {
      return undefined
    }
    let offset = index
    for (let vec = 0; vec < this.subVecs.length; vec++) {
      const size = this.subVecs[vec].length
      if (offset < size) {
        return { vec, offset }
      }
      offset -= size
    }
    return undefined
  }
}
