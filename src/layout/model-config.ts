import type { RegionKind } from '../types/pdf.js';

export interface LayoutModelConfig {
  name: string;
  description: string;
  url: string;
  /** Longest side of the letterboxed input. */
  inputSize: number;
  /** Padding multiple of the network input. */
  stride: number;
  inputName?: string;
  outputName?: string;
  /** Class names by output index. */
  labels: string[];
}

export const DOCLAYOUT_YOLO_CONFIG: LayoutModelConfig = {
  name: 'DocLayout-YOLO DocStructBench',
  description: 'YOLOv10 document layout model, 1024px input, end-to-end NMS',
  url: 'https://huggingface.co/wybxc/DocLayout-YOLO-DocStructBench-onnx/resolve/main/doclayout_yolo_docstructbench_imgsz1024.onnx',
  inputSize: 1024,
  stride: 32,
  inputName: 'images',
  labels: [
    'title',
    'plain text',
    'abandon',
    'figure',
    'figure_caption',
    'table',
    'table_caption',
    'table_footnote',
    'isolate_formula',
    'formula_caption'
  ]
};

export const MODEL_CONFIGS: Record<string, LayoutModelConfig> = {
  'doclayout-yolo': DOCLAYOUT_YOLO_CONFIG
};

export function getDefaultModelConfig(): LayoutModelConfig {
  return DOCLAYOUT_YOLO_CONFIG;
}

const LABEL_KINDS: Record<string, RegionKind> = {
  title: 'heading',
  'plain text': 'body',
  abandon: 'unknown',
  figure: 'figure',
  figure_caption: 'caption',
  table: 'table',
  table_caption: 'caption',
  table_footnote: 'footnote',
  isolate_formula: 'formula',
  formula_caption: 'formula',
  reference: 'reference'
};

/** Region kind for a model label; unrecognised labels are kept out of translation. */
export function labelToKind(label: string): RegionKind {
  return LABEL_KINDS[label] ?? 'unknown';
}
