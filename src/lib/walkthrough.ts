/**
 * The cell-counting walkthrough: list projects, resolve one project, drill
 * into a dataset, fetch its images and count cells in one of them.
 */
import sharp from 'sharp';
import type { GatewayClient } from './client';
import {
  filterExperimentProjects,
  flattenProjectAnnotations,
  selectByIndex,
  selectProject,
  toProjectTable,
  type ProjectSelection,
} from './metadata';
import {
  getDatasetDetail,
  getProjectAnnotations,
  getProjectDetail,
  listDatasets,
  listImages,
  listProjects,
} from './navigator';
import { buildMontage, decodeImage, fetchFullImage, fetchThumbnails } from './images';
import { segmentCells } from './segmentation';
import { annotateRegions } from './annotator';
import { ensureDirSync, outputPath, writeFigure, writeGrayFigure, writeProjectTable } from './output';
import type { CellRegion, Dataset, Image, ProjectDetail, ProjectTableRow } from './types';

export type WalkthroughConfig = {
  outDir: string;
  project: ProjectSelection;
  /** 1-based, in the order the gateway lists them */
  datasetIndex: number;
  /** 1-based, in the order the gateway lists them */
  imageIndex: number;
  threshold: number;
  minPixelCount: number;
  smoothingWindow: number;
  thumbConcurrency: number;
};

export type WalkthroughResult = {
  projectTable: ProjectTableRow[];
  project: ProjectDetail | null;
  annotations: Map<string, string>;
  dataset: Dataset | null;
  images: Image[];
  image: Image | null;
  regions: CellRegion[];
  written: string[];
};

function banner(title: string) {
  console.log('\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
  console.log(title);
  console.log('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
}

export async function runWalkthrough(
  client: GatewayClient,
  config: WalkthroughConfig
): Promise<WalkthroughResult> {
  ensureDirSync(config.outDir);
  const written: string[] = [];
  const result: WalkthroughResult = {
    projectTable: [],
    project: null,
    annotations: new Map(),
    dataset: null,
    images: [],
    image: null,
    regions: [],
    written,
  };

  // Phase 1: project list
  banner('PHASE 1: Listing experiment projects...');
  const projects = filterExperimentProjects(await listProjects(client));
  result.projectTable = toProjectTable(projects);
  console.log(`🧭 ${projects.length} experiment project(s)`);

  const tablePath = outputPath(config.outDir, 'projectTable');
  await writeProjectTable(result.projectTable, tablePath);
  written.push(tablePath);
  console.log(`📂 Project table written to ${tablePath}`);

  if (projects.length === 0) {
    console.log('⚠️  No experiment projects listed; nothing to drill into.');
    return result;
  }

  // Phase 2: one project
  banner('PHASE 2: Resolving project metadata...');
  const row = selectProject(result.projectTable, config.project);
  const project = await getProjectDetail(client, row.id);
  result.project = project;
  console.log(`📚 [${project.id}] ${project.name}`);
  console.log(`   Publication: ${project.publicationTitle}`);
  console.log(`   Experiment:  ${project.experimentDescription}`);

  result.annotations = flattenProjectAnnotations(await getProjectAnnotations(client, project.id));
  console.log(`🏷️  ${result.annotations.size} annotation value(s)`);
  for (const [key, value] of result.annotations) {
    console.log(`   • ${key}: ${value}`);
  }

  // Phase 3: one dataset
  banner('PHASE 3: Opening dataset...');
  const datasets = await listDatasets(client, project.id);
  console.log(`🗂️  ${datasets.length} dataset(s) in project ${project.id}`);
  const picked = selectByIndex(datasets, config.datasetIndex, 'dataset');
  const dataset = await getDatasetDetail(client, picked.id);
  result.dataset = dataset;
  console.log(`   [${config.datasetIndex}] ${dataset.name} (id ${dataset.id})`);

  const images = await listImages(client, dataset.id);
  result.images = images;
  console.log(`🖼️  ${images.length} image(s) in dataset`);
  if (images.length === 0) {
    console.log('⚠️  Dataset has no images; skipping thumbnails and cell count.');
    return result;
  }

  // Phase 4: thumbnails and the full image
  banner('PHASE 4: Fetching images...');
  const thumbnails = await fetchThumbnails(client, images, config.thumbConcurrency, (thumb, i) => {
    console.log(`   [${i + 1}/${images.length}] ${thumb.image.name}`);
  });
  const montagePath = outputPath(config.outDir, 'montage');
  await writeFigure(await buildMontage(thumbnails), montagePath);
  written.push(montagePath);
  console.log(`📂 Montage written to ${montagePath}`);

  const image = selectByIndex(images, config.imageIndex, 'image');
  result.image = image;
  const imageBuffer = await fetchFullImage(client, image.id);
  const fullPath = outputPath(config.outDir, 'fullImage');
  await writeFigure(sharp(imageBuffer), fullPath);
  written.push(fullPath);
  console.log(`📂 Full image ${image.id} written to ${fullPath}`);

  // Phase 5: cell count
  banner('PHASE 5: Counting cells...');
  console.log(
    `   Threshold: >${config.threshold} | Min pixels: >${config.minPixelCount} | Smoothing: ${config.smoothingWindow}`
  );
  const pixels = await decodeImage(imageBuffer);
  const { gray, mask, regions } = segmentCells(pixels, {
    threshold: config.threshold,
    minPixelCount: config.minPixelCount,
    smoothingWindow: config.smoothingWindow,
  });
  result.regions = regions;

  const grayPath = outputPath(config.outDir, 'grayImage');
  await writeGrayFigure(gray, grayPath);
  const maskPath = outputPath(config.outDir, 'binaryImage');
  await writeGrayFigure(mask, maskPath);
  written.push(grayPath, maskPath);

  console.log(`🔬 ${regions.length} cell(s) found`);
  if (regions.length === 0) {
    console.log('⚠️  No regions above the debris filter; overlay skipped.');
    return result;
  }

  const overlayPath = outputPath(config.outDir, 'overlay');
  await annotateRegions({
    imageBuffer,
    regions,
    outputPath: overlayPath,
    title: `Image-ID: ${image.id} / ${image.name}`,
  });
  written.push(overlayPath);
  console.log(`🖼️ Annotated image written to ${overlayPath}`);

  return result;
}
