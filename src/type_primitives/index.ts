export type { Brand } from "./brand";
export {
  is_non_negative_integer,
  is_positive_integer,
  unsafe_cast,
  validate_and_cast,
} from "./assertions";
export { TYPE_ERROR, TypeError } from "./error";
