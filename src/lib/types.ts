export type TaskId = string | number;

export type AnnotationAttributes = {
  occlusion: string;
  background_color: string;
  [key: string]: unknown;
};

export type Annotation = {
  id: string;
  label: string;
  left: number;
  top: number;
  width: number;
  height: number;
  attributes: AnnotationAttributes;
};

export type Task = {
  id: TaskId;
  imageUrl: string;
  annotations: Annotation[];
};

export type IssueType = 'occlusion' | 'stray_click' | 'color' | 'geometry';

export type Issue = {
  readonly type: IssueType;
  readonly severity: number;
  readonly annotations: readonly string[];
  readonly task: TaskId;
  readonly explanation: string;
};

export type Report = {
  count: number;
  types: IssueType[];
  flagged: Issue[];
};

export interface Check {
  readonly name: IssueType;
  evaluate(task: Task): Promise<Issue[]>;
}

export type RGB = [number, number, number];

export type PaletteEntry = {
  name: string;
  rgb: RGB;
};

// Row-major, 3 channels per pixel
export type PixelBuffer = {
  width: number;
  height: number;
  channels: 3;
  data: Uint8Array;
};
