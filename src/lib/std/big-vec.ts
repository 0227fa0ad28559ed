import { FunctionContext, MethodContext, PackageDefinition, RuntimeValue } from '../ledger/runtime'
import { BigVec } from '../structures/big-vec'
import { NONE, Value, integerValue, some } from '../types/values'

type U32Vec = BigVec<number>

const encodeElement = (element: number) => integerValue('u32', element)

function decodeElement<B, P>(value: Value<B, P>): number {
  if (value.kind !== 'integer') {
    throw new TypeError(`Expected a u32 element, got ${value.kind}`)
  }
  return Number(integerValue('u32', value.value).value)
}

function instantiate(ctx: FunctionContext, vec: U32Vec): RuntimeValue {
  const address = ctx.instantiate({ fields: { vec: vec.toValue<string, string>(encodeElement) }, metadata: { name: 'BigVec' } })
  return { kind: 'address', value: address }
}

function update<T>(ctx: MethodContext, change: (vec: U32Vec) => T): T {
  const vec = BigVec.fromValue(ctx.field('vec'), decodeElement)
  const result = change(vec)
  ctx.setField('vec', vec.toValue<string, string>(encodeElement))
  return result
}

const read = (ctx: MethodContext): U32Vec => BigVec.fromValue(ctx.field('vec'), decodeElement)

const someOf = (value: RuntimeValue): RuntimeValue => some(value)

const u64 = (value: number): RuntimeValue => integerValue('u64', value)

const u32Array = (elements: readonly number[]): RuntimeValue => ({ kind: 'array', elements: elements.map(encodeElement) })

/**
 * A component holding a BigVec of u32 values.
 */
export const bigVecPackage: PackageDefinition = {
  metadata: { name: 'BigVec' },
  blueprints: {
    BigVecBlueprint: {
      functions: {
        new: ctx => instantiate(ctx, new BigVec<number>()),
        default: ctx => instantiate(ctx, new BigVec<number>()),
        with_capacity_per_vec: (ctx, args) => instantiate(ctx, BigVec.withCapacityPerVec<number>(Number(args.integer(0)))),
        from: (ctx, args) => instantiate(ctx, BigVec.from(args.array(0).map(decodeElement)))
      },
      methods: {
        push: (ctx, args) => update(ctx, vec => vec.push(decodeElement(args.raw(0)))),

        pop: ctx => {
          const element = update(ctx, vec => vec.pop())
          return element === undefined ? NONE : someOf(encodeElement(element))
        },

        get: (ctx, args) => {
          const element = read(ctx).get(Number(args.integer(0)))
          return element === undefined ? NONE : someOf(encodeElement(element))
        },

        change_value_at: (ctx, args) => {
          const index = Number(args.integer(0))
          const changed = update(ctx, vec => vec.set(index, decodeElement(args.raw(1))))
          if (!changed) {
            ctx.panic(`Index ${index} is out of bounds`)
          }
        },

        insert: (ctx, args) => update(ctx, vec => vec.insert(Number(args.integer(0)), decodeElement(args.raw(1)))),

        push_vec: (ctx, args) => update(ctx, vec => vec.pushVec(args.array(0).map(decodeElement))),

        push_vec_raw: (ctx, args) => update(ctx, vec => vec.pushVecRaw(args.array(0).map(decodeElement))),

        pop_first_vec: ctx => {
          const first = update(ctx, vec => vec.popFirstVec())
          return first === undefined ? NONE : someOf(u32Array(first))
        },

        len: ctx => u64(read(ctx).length),
        is_empty: ctx => ({ kind: 'bool', value: read(ctx).isEmpty() }),
        vec_nb: ctx => u64(read(ctx).vecCount()),
        capacity_per_vec: ctx => u64(read(ctx).capacityPerVec),
        structure: ctx => ({ kind: 'array', elements: read(ctx).structure().map(u64) }),
        full_vec: ctx => u32Array(read(ctx).toArray()),
        internal_representation: ctx => ({ kind: 'array', elements: read(ctx).internalRepresentation().map(u32Array) })
      }
    }
  }
}
