export type { Brand } from "./brand";
export {
  is_non_negative_integer,
  is_positive_integer,
  unsafe_cast,
  validate_and_cast,
} from "./assertions";
export { ASSERTION_ERROR, AssertionError } from "./error";
