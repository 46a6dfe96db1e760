/**
 * Walks the Project → Dataset → Image hierarchy of the IDR gateway.
 * Every response is validated before it reaches the caller; filtering and
 * ordering are left to the metadata helpers.
 */
import { z } from 'zod';
import type { GatewayClient } from './client';
import { ResponseParseError } from './errors';
import { parseProjectDescription } from './metadata';
import type { AnnotationRecord, Dataset, Image, Project, ProjectDetail } from './types';

// ==========================================
// SCHEMAS
// ==========================================

const ProjectSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  description: z.string().default(''),
});

const DatasetSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  description: z.string().optional(),
  child_count: z.number().int().optional(),
});

const ImageSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  thumb_url: z.string().min(1),
});

const AnnotationSchema = z.object({
  id: z.number().int().optional(),
  class: z.string(),
  ns: z.string().nullable().optional(),
  values: z.array(z.tuple([z.string(), z.string()])).optional(),
});

const AnnotationsResponseSchema = z.object({
  annotations: z.array(AnnotationSchema),
});

// ==========================================
// ENDPOINTS
// ==========================================

export const endpoints = {
  projectList: () => '/webgateway/proj/list/',
  projectDetail: (id: number) => `/webgateway/proj/${id}/detail/`,
  projectAnnotations: (id: number) => `/webclient/api/annotations/?project=${id}`,
  projectChildren: (id: number) => `/webgateway/proj/${id}/children/`,
  datasetDetail: (id: number) => `/webgateway/dataset/${id}/detail/`,
  datasetChildren: (id: number) => `/webgateway/dataset/${id}/children/`,
  renderImage: (id: number) => `/webgateway/render_image/${id}`,
};

export function parseResponse<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  url: string
): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : '<root>';
    throw new ResponseParseError(url, field, issue?.message ?? 'invalid response', result.error);
  }
  return result.data;
}

async function fetchParsed<T extends z.ZodTypeAny>(
  client: GatewayClient,
  path: string,
  schema: T
): Promise<z.infer<T>> {
  const data = await client.getJson(path);
  return parseResponse(schema, data, client.baseUrl + path);
}

function toDataset(raw: z.infer<typeof DatasetSchema>): Dataset {
  return {
    id: raw.id,
    name: raw.name,
    description: raw.description,
    childCount: raw.child_count,
  };
}

// ==========================================
// OPERATIONS
// ==========================================

export async function listProjects(client: GatewayClient): Promise<Project[]> {
  return fetchParsed(client, endpoints.projectList(), z.array(ProjectSchema));
}

export async function getProjectDetail(client: GatewayClient, id: number): Promise<ProjectDetail> {
  const project = await fetchParsed(client, endpoints.projectDetail(id), ProjectSchema);
  const { publicationTitle, experimentDescription } = parseProjectDescription(project.description);
  return { ...project, publicationTitle, experimentDescription };
}

export async function getProjectAnnotations(
  client: GatewayClient,
  projectId: number
): Promise<AnnotationRecord[]> {
  const response = await fetchParsed(
    client,
    endpoints.projectAnnotations(projectId),
    AnnotationsResponseSchema
  );
  return response.annotations;
}

export async function listDatasets(client: GatewayClient, projectId: number): Promise<Dataset[]> {
  const raw = await fetchParsed(client, endpoints.projectChildren(projectId), z.array(DatasetSchema));
  return raw.map(toDataset);
}

export async function getDatasetDetail(client: GatewayClient, id: number): Promise<Dataset> {
  return toDataset(await fetchParsed(client, endpoints.datasetDetail(id), DatasetSchema));
}

export async function listImages(client: GatewayClient, datasetId: number): Promise<Image[]> {
  const raw = await fetchParsed(client, endpoints.datasetChildren(datasetId), z.array(ImageSchema));
  return raw.map((img) => ({ id: img.id, name: img.name, thumbUrl: img.thumb_url }));
}
