export type { DrawingBackend, ItemRect, InputTextResult } from "./types";
export {
  HeadlessBackend,
  visibleLabel,
  type HeadlessBackendOptions,
  type DrawCommand,
  type DrawCommandKind,
} from "./HeadlessBackend";
