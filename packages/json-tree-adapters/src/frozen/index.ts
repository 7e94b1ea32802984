export {
  FROZEN_ADAPTER_NAME,
  FrozenAdapter,
  FrozenArray,
  FrozenNodeValue,
  FrozenObject,
  frozenTraits,
} from "./FrozenAdapter"
export {
  cloneNode,
  emptyFrozenArray,
  emptyFrozenObject,
  type FrozenArrayNode,
  type FrozenBoolNode,
  type FrozenDoubleNode,
  type FrozenIntegerNode,
  type FrozenMember,
  type FrozenNode,
  type FrozenNullNode,
  type FrozenObjectNode,
  type FrozenStringNode,
  frozenNull,
  integerNode,
  numberNode,
} from "./FrozenNode"
export { createFrozenValue, FrozenValue, frozenEqualTo } from "./FrozenValue"
