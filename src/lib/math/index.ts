export {
  MAX_64X64,
  MAX_INT256,
  MIN_64X64,
  MIN_INT256,
  ONE_64X64,
  assertInt256,
  divu,
  exp,
  fromInt,
  mul,
  mulDivInt256,
  neg,
  toInt,
} from "./fixed-point";
