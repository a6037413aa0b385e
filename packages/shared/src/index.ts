// ============================================
// Tierlink Shared Types
// ============================================

export { ErrorCode } from "./errors/codes.js";
export type { ErrResult, OkResult, Result } from "./types/result.js";
export {
  Err,
  isErr,
  isOk,
  map,
  mapErr,
  Ok,
  tryCatchAsync,
  unwrap,
  unwrapOr,
} from "./types/result.js";
