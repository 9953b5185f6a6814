// Re-export all necessary entities for tree-shaking
export { buildImage, createImageBuilder } from "./src/services/image-builder.service.js";
export type {
  ImageBuilder,
  ImageBuilderOptions,
  ImageDestination,
  ImageSource,
} from "./src/services/image-builder.service.js";
export {
  hasStreamOption,
  runResizePipeline,
  validateStreamOptions,
} from "./src/services/resize-pipeline.service.js";
export { layout } from "./src/services/layout.service.js";
export { ResizeJob } from "./src/services/resize-job.service.js";
export {
  centerInside,
  fitsInside,
  roundSize,
  scaleInside,
  toRectangle,
} from "./src/services/box-math.service.js";
export {
  parseColor,
  resolveCanvasBackground,
  TRANSPARENT,
  WHITE,
} from "./src/services/color.service.js";
export { SharpBackend } from "./src/backends/sharp.backend.js";
export type { SharpImage } from "./src/backends/sharp.backend.js";
export {
  copyToMemoryStream,
  FileDestinationStream,
  FileSourceStream,
  MemoryStream,
  readEntireStream,
  ReadableSourceStream,
  WritableDestinationStream,
} from "./src/streams/index.js";
export {
  DecodeError,
  DirectoryNotFoundError,
  EncodeError,
  IOError,
  RenderError,
  ValidationError,
} from "./src/errors/index.js";
export type { IOErrorCode } from "./src/errors/index.js";
export { createConsoleLogger } from "./src/logger.js";
export type { Logger } from "./src/logger.js";
export { StreamOptions } from "./src/types/index.js";
export type {
  BackgroundInput,
  DestinationStream,
  FitMode,
  ImageBackend,
  ImageConsumer,
  LayoutResult,
  OutputFormat,
  Rectangle,
  RenderRequest,
  ResizeJobInit,
  Rgba,
  ScaleMode,
  Size,
  SourceStream,
} from "./src/types/index.js";
