import { readFile } from 'node:fs/promises';
import type { InferenceSession } from 'onnxruntime-web';
import { LayoutModelUnavailableError, errorMessage } from '../errors.js';
import { getDefaultModelConfig, labelToKind, type LayoutModelConfig } from './model-config.js';
import { ModelDownloader, type DownloadProgress } from './model-downloader.js';
import type { LayoutDetection, LayoutDetector, PageImage } from '../types/layout.js';

const PAD_VALUE = 114 / 255;

export interface LetterboxResult {
  /** CHW float32 RGB in [0, 1]. */
  tensor: Float32Array;
  width: number;
  height: number;
}

/**
 * Scales an RGBA image so its longer side fits `inputSize`, then pads
 * it to a multiple of `stride` with grey borders split evenly per axis.
 */
export function letterbox(image: Pick<PageImage, 'width' | 'height' | 'data'>, inputSize: number, stride: number): LetterboxResult {
  const ratio = Math.min(inputSize / image.height, inputSize / image.width);
  const resizedW = Math.max(1, Math.round(image.width * ratio));
  const resizedH = Math.max(1, Math.round(image.height * ratio));
  const padW = (inputSize - resizedW) % stride;
  const padH = (inputSize - resizedH) % stride;
  const left = Math.floor(padW / 2);
  const top = Math.floor(padH / 2);
  const width = resizedW + padW;
  const height = resizedH + padH;

  const plane = width * height;
  const tensor = new Float32Array(3 * plane).fill(PAD_VALUE);

  for (let y = 0; y < resizedH; y++) {
    const sy = Math.min(image.height - 1, Math.floor((y + 0.5) / ratio));
    for (let x = 0; x < resizedW; x++) {
      const sx = Math.min(image.width - 1, Math.floor((x + 0.5) / ratio));
      const src = (sy * image.width + sx) * 4;
      const dst = (y + top) * width + (x + left);
      tensor[dst] = image.data[src] / 255;
      tensor[plane + dst] = image.data[src + 1] / 255;
      tensor[2 * plane + dst] = image.data[src + 2] / 255;
    }
  }

  return { tensor, width, height };
}

/**
 * Turns `[1, N, 6]` rows of `x0 y0 x1 y1 score class` in letterboxed
 * input space into detections in original image pixels.
 */
export function decodeDetections(
  output: ArrayLike<number>,
  dims: readonly number[],
  input: { width: number; height: number },
  original: { width: number; height: number },
  labels: string[],
  confidence: number
): LayoutDetection[] {
  const rows = dims.length >= 3 ? dims[1] : 0;
  const cols = dims.length >= 3 ? dims[2] : 0;
  if (cols < 6) return [];

  const gain = Math.min(input.height / original.height, input.width / original.width);
  const padX = Math.round((input.width - original.width * gain) / 2 - 0.1);
  const padY = Math.round((input.height - original.height * gain) / 2 - 0.1);
  const clampX = (v: number): number => Math.min(original.width, Math.max(0, (v - padX) / gain));
  const clampY = (v: number): number => Math.min(original.height, Math.max(0, (v - padY) / gain));

  const detections: LayoutDetection[] = [];
  for (let i = 0; i < rows; i++) {
    const offset = i * cols;
    const score = output[offset + 4];
    if (!(score >= confidence)) continue;

    const classIndex = Math.round(output[offset + 5]);
    const label = labels[classIndex] ?? `class_${classIndex}`;
    detections.push({
      bbox: [clampX(output[offset]), clampY(output[offset + 1]), clampX(output[offset + 2]), clampY(output[offset + 3])],
      kind: labelToKind(label),
      label,
      confidence: score
    });
  }
  return detections;
}

export interface OnnxLayoutDetectorOptions {
  model: LayoutModelConfig;
  /** Local model file; skips the download. */
  modelPath?: string;
  /** Overrides the model's download URL. */
  modelUrl?: string;
  cacheDir?: string;
  confidence: number;
  downloader?: ModelDownloader;
  onProgress?: (progress: DownloadProgress) => void;
}

/** DocLayout-YOLO run through onnxruntime-web's WASM backend. */
export class OnnxLayoutDetector implements LayoutDetector {
  readonly name: string;
  private readonly options: OnnxLayoutDetectorOptions;
  private readonly downloader: ModelDownloader;
  private session: InferenceSession | null = null;
  private initializing: Promise<InferenceSession> | null = null;

  constructor(options: Partial<OnnxLayoutDetectorOptions> = {}) {
    this.options = {
      ...options,
      model: options.model ?? getDefaultModelConfig(),
      confidence: options.confidence ?? 0.25
    };
    this.name = this.options.model.name;
    this.downloader = options.downloader ?? new ModelDownloader({ cacheDir: options.cacheDir });
  }

  async initialize(): Promise<InferenceSession> {
    if (this.session) return this.session;
    if (!this.initializing) {
      this.initializing = this.createSession().finally(() => {
        this.initializing = null;
      });
    }
    this.session = await this.initializing;
    return this.session;
  }

  private async createSession(): Promise<InferenceSession> {
    let bytes: Uint8Array;
    try {
      bytes = this.options.modelPath
        ? new Uint8Array(await readFile(this.options.modelPath))
        : await this.downloader.downloadModel(this.options.modelUrl ?? this.options.model.url, this.options.onProgress);
    } catch (error) {
      if (error instanceof LayoutModelUnavailableError) throw error;
      throw new LayoutModelUnavailableError(`Failed to load layout model: ${errorMessage(error)}`, error);
    }

    try {
      const ort = await import('onnxruntime-web');
      return await ort.InferenceSession.create(bytes, {
        executionProviders: ['wasm'],
        graphOptimizationLevel: 'all'
      });
    } catch (error) {
      throw new LayoutModelUnavailableError(`Failed to initialize layout model: ${errorMessage(error)}`, error);
    }
  }

  async detect(image: PageImage): Promise<LayoutDetection[]> {
    const session = await this.initialize();
    const { model, confidence } = this.options;
    const input = letterbox(image, model.inputSize, model.stride);

    const ort = await import('onnxruntime-web');
    const inputName = model.inputName ?? session.inputNames[0];
    const feeds: InferenceSession.FeedsType = {
      [inputName]: new ort.Tensor('float32', input.tensor, [1, 3, input.height, input.width])
    };
    const results = await session.run(feeds);
    const output = results[model.outputName ?? session.outputNames[0]];
    if (!output || !(output.data instanceof Float32Array)) {
      throw new LayoutModelUnavailableError(`Layout model returned no float output for page ${image.pageIndex + 1}`);
    }

    return decodeDetections(output.data, output.dims, input, image, model.labels, confidence);
  }

  async dispose(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (session) await session.release();
  }
}
