/**
 * OCR capability
 *
 * HttpOcrEngine posts the raw document bytes to an OCR service and validates
 * the fragment list it returns. Boxes may come as {x1,y1,x2,y2} or as the
 * four corner points most OCR engines report; both become axis-aligned boxes.
 *
 * @module services/ocr/http-engine
 */

import { z } from 'zod';

import type { BoundingBox, OcrPage } from '../../models/layout.js';
import { withRetry } from '../../utils/backoff.js';
import { safeMax, safeMin } from '../../utils/math.js';
import { loadOcrServiceConfig, type OcrServiceConfig, type OcrServiceConfigOverrides } from './config.js';
import {
  OCRError,
  OCRResponseError,
  OCRTimeoutError,
  isRetryableOcrError,
  ocrErrorFromStatus,
} from './errors.js';

export interface OcrSource {
  documentId: string;
  filename: string;
  mimeType: string;
  data: Buffer;
}

export interface OcrExtractOptions {
  signal?: AbortSignal;
}

/**
 * OCR capability consumed by the pipeline. A blank page yields a page with
 * zero fragments, not an error.
 */
export interface OcrEngine {
  extract(source: OcrSource, options?: OcrExtractOptions): Promise<OcrPage[]>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

const PointSchema = z.tuple([z.number(), z.number()]);

const BoxSchema = z.union([
  z.object({ x1: z.number(), y1: z.number(), x2: z.number(), y2: z.number() }),
  z.array(PointSchema).min(1),
]);

const FragmentSchema = z.object({
  text: z.string(),
  confidence: z.number().min(0).max(1),
  bbox: BoxSchema,
});

const PageSchema = z.object({
  page_number: z.number().int().positive(),
  width: z.number().positive().optional(),
  height: z.number().positive().optional(),
  fragments: z.array(FragmentSchema),
});

const OcrResponseSchema = z.object({
  request_id: z.string().optional(),
  pages: z.array(PageSchema),
});

function toBox(box: z.infer<typeof BoxSchema>): BoundingBox {
  if (!Array.isArray(box)) return box;
  const xs = box.map(([x]) => x);
  const ys = box.map(([, y]) => y);
  return {
    x1: safeMin(xs) ?? 0,
    y1: safeMin(ys) ?? 0,
    x2: safeMax(xs) ?? 0,
    y2: safeMax(ys) ?? 0,
  };
}

/**
 * Validate an OCR service payload and convert it to pages
 * @throws OCRResponseError when the payload does not match the schema
 */
export function parseOcrResponse(payload: unknown): OcrPage[] {
  const result = OcrResponseSchema.safeParse(payload);
  if (!result.success) {
    const errors = result.error.errors
      .slice(0, 5)
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new OCRResponseError(`Malformed OCR response: ${errors}`);
  }

  return result.data.pages.map((page) => ({
    pageNumber: page.page_number,
    width: page.width,
    height: page.height,
    fragments: page.fragments.map((f) => ({
      text: f.text,
      confidence: f.confidence,
      bbox: toBox(f.bbox),
    })),
  }));
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

export class HttpOcrEngine implements OcrEngine {
  private readonly config: OcrServiceConfig;

  constructor(overrides?: OcrServiceConfigOverrides) {
    this.config = loadOcrServiceConfig(overrides);
  }

  async extract(source: OcrSource, options: OcrExtractOptions = {}): Promise<OcrPage[]> {
    const startTime = Date.now();
    const pages = await withRetry(() => this.request(source, options.signal), isRetryableOcrError, {
      ...this.config.retry,
      signal: options.signal,
      label: 'OcrEngine',
    });

    const fragmentCount = pages.reduce((n, p) => n + p.fragments.length, 0);
    console.error(
      `[OcrEngine] ${source.documentId}: ${pages.length} pages, ${fragmentCount} fragments in ${Date.now() - startTime}ms`
    );
    return pages;
  }

  private async request(source: OcrSource, signal?: AbortSignal): Promise<OcrPage[]> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);
    const onAbort = (): void => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let response: Response;
    try {
      response = await fetch(this.config.url, {
        method: 'POST',
        headers: {
          'Content-Type': source.mimeType,
          'X-Document-Id': source.documentId,
          'X-Filename': encodeURIComponent(source.filename),
        },
        body: source.data,
        signal: controller.signal,
      });
    } catch (error) {
      if (timedOut) {
        throw new OCRTimeoutError(`OCR request timed out after ${this.config.timeoutMs}ms`);
      }
      if (signal?.aborted) throw error;
      throw new OCRError(
        `OCR service unreachable: ${error instanceof Error ? error.message : String(error)}`,
        'OCR_SERVER_ERROR'
      );
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }

    const requestId = response.headers.get('x-request-id') ?? undefined;
    if (!response.ok) {
      const body = await response.text().catch((error: unknown) => `<unreadable body: ${String(error)}>`);
      throw ocrErrorFromStatus(response.status, body, response.headers.get('retry-after'), requestId);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new OCRResponseError(
        `OCR response is not JSON: ${error instanceof Error ? error.message : String(error)}`,
        requestId
      );
    }
    return parseOcrResponse(payload);
  }
}
