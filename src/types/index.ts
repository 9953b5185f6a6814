export type FitMode = "max" | "pad" | "crop" | "stretch" | "carve";

export type ScaleMode = "downscaleOnly" | "upscaleBoth" | "upscaleCanvas";

export type OutputFormat = "jpeg" | "png";

export interface Size {
  width: number;
  height: number;
}

export interface Rectangle {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Channels are 0-255, alpha is 0-1. */
export interface Rgba {
  r: number;
  g: number;
  b: number;
  alpha: number;
}

export type BackgroundInput = Rgba | string;

export interface ResizeJobInit {
  width?: number;
  height?: number;
  mode?: FitMode;
  scale?: ScaleMode;
  background?: BackgroundInput;
  format?: OutputFormat;
  quality?: number;
  ignoreIcc?: boolean;
}

export interface LayoutResult {
  /** Region of the source image to sample */
  readonly copyRegion: Readonly<Rectangle>;
  /** Integer size of the output canvas */
  readonly canvasSize: Readonly<Size>;
  /** Where the sampled content lands on the canvas */
  readonly targetRegion: Readonly<Rectangle>;
}

export const StreamOptions = {
  None: 0,
  BufferInMemory: 1,
  LeaveSourceOpen: 2,
  RewindSource: 4,
  LeaveDestinationOpen: 8,
  CreateDestinationDirectory: 16,
} as const;

export type StreamOptions = number;

export interface SourceStream {
  readonly readable: boolean;
  readonly seekable: boolean;
  getPosition(): number;
  setPosition(position: number): void;
  /** Reads from the current position to the end. */
  readToEnd(): Promise<Buffer>;
  close(): Promise<void>;
}

export interface DestinationStream {
  readonly writable: boolean;
  write(bytes: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

export interface RenderRequest {
  copyRegion: Readonly<Rectangle>;
  canvasSize: Readonly<Size>;
  targetRegion: Readonly<Rectangle>;
  background: Readonly<Rgba>;
  format: OutputFormat;
}

/**
 * Decode, render and encode capability the pipeline delegates to.
 */
export interface ImageBackend<TImage> {
  decode(source: SourceStream, honorColorProfile: boolean): Promise<TImage>;
  sizeOf(image: TImage): Size;
  render(image: TImage, request: RenderRequest): Promise<TImage>;
  encode(image: TImage, format: OutputFormat, quality: number): Promise<Buffer>;
  release(image: TImage): void | Promise<void>;
}

export type ImageConsumer<TImage> = (image: TImage) => void | Promise<void>;
