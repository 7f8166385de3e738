import { AppError } from "../../middleware/errors";

export type PageImage = {
  data: Buffer;
  mimeType: string;
  width: number;
  height: number;
};

/** Coordinates are normalized to the 0..999 grid the OCR model emits. */
export type LayoutBox = {
  label: string;
  x1: number;
  y1: number;
  x2: number;
  y2: number;
};

export type InferenceResult = {
  /** Raw model output, grounding markup included. */
  text: string;
  boxes: LayoutBox[];
  /** False when the model stopped before its end-of-sequence marker. */
  complete: boolean;
};

export type CallOptions = {
  signal?: AbortSignal;
};

export interface Rasterizer {
  rasterize(pdf: Buffer, options?: CallOptions): Promise<PageImage[]>;
}

export interface PagePreprocessor {
  preprocess(image: PageImage, options?: CallOptions): Promise<PageImage>;
}

export interface OcrEngine {
  infer(image: PageImage, options?: CallOptions): Promise<InferenceResult>;
  isReady(): Promise<boolean>;
}

export interface LayoutRenderer {
  renderLayout(image: PageImage, boxes: LayoutBox[], options?: CallOptions): Promise<PageImage>;
  cropRegion(image: PageImage, box: LayoutBox, options?: CallOptions): Promise<Buffer>;
  composeDocument(pages: PageImage[], options?: CallOptions): Promise<Buffer>;
}

export type PipelineStage =
  | "read_input"
  | "rasterize"
  | "preprocess"
  | "infer"
  | "render"
  | "publish";

export class StageFailureError extends AppError {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("stage_failed", `${stage} failed: ${detail}`, 500);
    this.name = "StageFailureError";
    this.stage = stage;
  }
}
