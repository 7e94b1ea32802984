import { freeze } from "immer"
import { unsupportedValue } from "../error"
import { type IntegerWidth, integerWidth, type NumericValue } from "../numbers"
import { lazy } from "../utils"

export type FrozenNullNode = { readonly kind: "null" }
export type FrozenBoolNode = { readonly kind: "bool"; readonly value: boolean }
export type FrozenIntegerNode = {
  readonly kind: "integer"
  readonly value: bigint
  /** Native encoding the source number had. */
  readonly width: IntegerWidth
}
export type FrozenDoubleNode = { readonly kind: "double"; readonly value: number }
export type FrozenStringNode = { readonly kind: "string"; readonly value: string }
export type FrozenArrayNode = { readonly kind: "array"; readonly items: readonly FrozenNode[] }
export type FrozenObjectNode = { readonly kind: "object"; readonly members: readonly FrozenMember[] }

export type FrozenMember = readonly [name: string, value: FrozenNode]

/**
 * Detached copy of a document subtree. Object members keep their source order.
 */
export type FrozenNode =
  | FrozenNullNode
  | FrozenBoolNode
  | FrozenIntegerNode
  | FrozenDoubleNode
  | FrozenStringNode
  | FrozenArrayNode
  | FrozenObjectNode

export const frozenNull = freeze<FrozenNullNode>({ kind: "null" })

export const emptyFrozenArray = lazy(() =>
  freeze<FrozenArrayNode>({ kind: "array", items: [] }, true)
)

export const emptyFrozenObject = lazy(() =>
  freeze<FrozenObjectNode>({ kind: "object", members: [] }, true)
)

export function integerNode(value: bigint): FrozenIntegerNode {
  const width = integerWidth(value)
  if (!width) {
    unsupportedValue(`Integer ${value} does not fit a 64-bit encoding`)
  }
  return { kind: "integer", value, width }
}

export function numberNode(number: NumericValue): FrozenIntegerNode | FrozenDoubleNode {
  return number.kind === "integer"
    ? integerNode(number.value)
    : { kind: "double", value: number.value }
}

/**
 * Deep copy of a frozen tree into fresh nodes.
 */
export function cloneNode(node: FrozenNode): FrozenNode {
  switch (node.kind) {
    case "null":
      return { kind: "null" }
    case "bool":
    case "double":
    case "string":
    case "integer":
      return { ...node }
    case "array":
      return { kind: "array", items: node.items.map(cloneNode) }
    case "object":
      return {
        kind: "object",
        members: node.members.map(([name, value]) => [name, cloneNode(value)] as const),
      }
  }
}
