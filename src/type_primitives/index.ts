export type { Brand } from "./brand";
export {
  is_non_negative_integer,
  is_uint32,
  validate_and_cast,
  unsafe_cast,
} from "./assertions";
export { PRIMITIVE_ERROR, PrimitiveError } from "./error";
export { BitSet } from "./bitset/bitset";
export { SparseMap } from "./sparse_map/sparse_map";
export { RwLock } from "./rw_lock/rw_lock";
