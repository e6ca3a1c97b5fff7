export { ByteWindow, toWindow, type ByteSource } from "./window";
export { leftPad, rightPad, uintToBytes, assertUintWidth } from "./pad";
