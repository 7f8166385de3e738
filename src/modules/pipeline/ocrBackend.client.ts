import { z } from "zod";
import { withTimeout } from "../../utils/withTimeout";
import { parseLayoutRefs } from "./markup";
import {
  type CallOptions,
  type InferenceResult,
  type LayoutBox,
  type LayoutRenderer,
  type OcrEngine,
  type PageImage,
  type PagePreprocessor,
  type Rasterizer,
} from "./pipeline.types";

export const END_OF_SEQUENCE = "<｜end▁of▁sentence｜>";

const HEALTH_TIMEOUT_MS = 5000;

const pageImageSchema = z.object({
  data: z.string(),
  mimeType: z.string().default("image/png"),
  width: z.number().int().nonnegative(),
  height: z.number().int().nonnegative(),
});

const rasterizeResponseSchema = z.object({ pages: z.array(pageImageSchema) });
const inferResponseSchema = z.object({ text: z.string() });
const imageResponseSchema = z.object({ image: pageImageSchema });
const binaryResponseSchema = z.object({ data: z.string() });
const healthResponseSchema = z.object({ modelLoaded: z.boolean() });

type WirePageImage = z.infer<typeof pageImageSchema>;

export type OcrBackendOptions = {
  baseUrl: string;
  fetchImpl?: typeof fetch;
};

export type OcrBackend = Rasterizer & PagePreprocessor & OcrEngine & LayoutRenderer;

function encodePage(page: PageImage): WirePageImage {
  return {
    data: page.data.toString("base64"),
    mimeType: page.mimeType,
    width: page.width,
    height: page.height,
  };
}

function decodePage(page: WirePageImage): PageImage {
  return {
    data: Buffer.from(page.data, "base64"),
    mimeType: page.mimeType,
    width: page.width,
    height: page.height,
  };
}

/** Splits a raw model response into text and completion state. */
export function parseInferenceText(raw: string): InferenceResult {
  const complete = raw.includes(END_OF_SEQUENCE);
  const text = complete ? raw.split(END_OF_SEQUENCE).join("") : raw;
  const boxes: LayoutBox[] = parseLayoutRefs(text).flatMap((ref) => ref.boxes);
  return { text, boxes, complete };
}

/**
 * Client for the OCR inference backend. Rasterization, inference and layout
 * rendering all run there; this side only moves bytes and validates replies.
 */
export function createOcrBackendClient(options: OcrBackendOptions): OcrBackend {
  const baseUrl = options.baseUrl.replace(/\/+$/, "");
  const fetchImpl = options.fetchImpl ?? fetch;

  async function call<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    init: { method: "GET" | "POST"; body?: unknown; signal?: AbortSignal }
  ): Promise<T> {
    const response = await fetchImpl(`${baseUrl}${path}`, {
      method: init.method,
      headers: init.body === undefined ? undefined : { "Content-Type": "application/json" },
      body: init.body === undefined ? undefined : JSON.stringify(init.body),
      signal: init.signal,
    });
    if (!response.ok) {
      const message = await response.text();
      throw new Error(`ocr_backend_failed:${path}:${response.status}:${message.slice(0, 200)}`);
    }
    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`ocr_backend_invalid_response:${path}:${parsed.error.issues[0]?.message ?? "unknown"}`);
    }
    return parsed.data;
  }

  return {
    async rasterize(pdf: Buffer, callOptions: CallOptions = {}) {
      const res = await call("/rasterize", rasterizeResponseSchema, {
        method: "POST",
        body: { document: pdf.toString("base64") },
        signal: callOptions.signal,
      });
      return res.pages.map(decodePage);
    },

    /** Resizes and pads a page to the model's input geometry. */
    async preprocess(image: PageImage, callOptions: CallOptions = {}) {
      const res = await call("/preprocess", imageResponseSchema, {
        method: "POST",
        body: { image: encodePage(image) },
        signal: callOptions.signal,
      });
      return decodePage(res.image);
    },

    async infer(image: PageImage, callOptions: CallOptions = {}) {
      const res = await call("/infer", inferResponseSchema, {
        method: "POST",
        body: { image: encodePage(image) },
        signal: callOptions.signal,
      });
      return parseInferenceText(res.text);
    },

    async isReady() {
      const res = await withTimeout(
        (signal) => call("/health", healthResponseSchema, { method: "GET", signal }),
        HEALTH_TIMEOUT_MS,
        "ocr_backend_health"
      );
      return res.modelLoaded;
    },

    async renderLayout(image: PageImage, boxes: LayoutBox[], callOptions: CallOptions = {}) {
      const res = await call("/render/layout", imageResponseSchema, {
        method: "POST",
        body: { image: encodePage(image), boxes },
        signal: callOptions.signal,
      });
      return decodePage(res.image);
    },

    async cropRegion(image: PageImage, box: LayoutBox, callOptions: CallOptions = {}) {
      const res = await call("/render/crop", binaryResponseSchema, {
        method: "POST",
        body: { image: encodePage(image), box },
        signal: callOptions.signal,
      });
      return Buffer.from(res.data, "base64");
    },

    async composeDocument(pages: PageImage[], callOptions: CallOptions = {}) {
      const res = await call("/render/document", binaryResponseSchema, {
        method: "POST",
        body: { pages: pages.map(encodePage) },
        signal: callOptions.signal,
      });
      return Buffer.from(res.data, "base64");
    },
  };
}
