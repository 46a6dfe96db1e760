export type Project = {
  id: number;
  name: string;
  description: string;
};

export type ProjectDetail = Project & {
  publicationTitle: string;
  /** Text of the "Experiment Description" section, not the raw description. */
  experimentDescription: string;
};

export type Dataset = {
  id: number;
  name: string;
  description?: string;
  childCount?: number;
};

export type Image = {
  id: number;
  name: string;
  /** Relative to the gateway base URL, e.g. `/webgateway/render_thumbnail/123/`. */
  thumbUrl: string;
};

export type AnnotationPair = [string, string];

export type AnnotationRecord = {
  id?: number;
  class: string;
  ns?: string | null;
  values?: AnnotationPair[];
};

export type ProjectTableRow = {
  id: number;
  name: string;
  publicationTitle: string;
  description: string;
};

// ==========================================
// PIXELS & REGIONS
// ==========================================

export type PixelImage = {
  data: Uint8Array;
  width: number;
  height: number;
  channels: 1 | 2 | 3 | 4;
};

export type GrayImage = PixelImage & { channels: 1 };

export type Point = { row: number; col: number };

export type BoundingBox = {
  top: number;
  left: number;
  width: number;
  height: number;
};

export type CellRegion = {
  label: number;
  area: number;
  centroid: { x: number; y: number };
  boundingBox: BoundingBox;
  /** Outer contour along pixel edges, clockwise, not closed (last → first is implied). */
  boundary: Point[];
  /** `boundary` after moving-average smoothing; only used for drawing. */
  displayBoundary: Point[];
};

export type SegmentationOptions = {
  threshold: number;
  minPixelCount: number;
  smoothingWindow?: number;
};

export type SegmentationResult = {
  gray: GrayImage;
  mask: GrayImage;
  regions: CellRegion[];
};
