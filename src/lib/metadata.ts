/**
 * Flattening of project metadata into table rows and lookups.
 *
 * IDR project descriptions are blocks separated by blank lines, each opened by
 * a heading line:
 *
 *   Publication Title
 *   A genome-wide screen of ...
 *
 *   Experiment Description
 *   Images of ...
 *
 * Fields are looked up by heading, never by line number, so a missing block
 * raises `MissingFieldError` instead of returning the wrong line.
 */
import { MissingFieldError, SelectionError } from './errors';
import type { AnnotationPair, AnnotationRecord, Project, ProjectTableRow } from './types';

export const EXPERIMENT_MARKER = '/experiment';
export const PUBLICATION_TITLE = 'Publication Title';
export const EXPERIMENT_DESCRIPTION = 'Experiment Description';
export const MAP_ANNOTATION_CLASS = 'MapAnnotationI';

function normalizeHeading(heading: string): string {
  return heading.trim().replace(/:$/, '').trim().toLowerCase();
}

// ==========================================
// PROJECT LIST
// ==========================================

/** Projects whose name carries the experiment marker, ascending by id. */
export function filterExperimentProjects<T extends Project>(projects: T[]): T[] {
  return projects
    .filter((p) => p.name.includes(EXPERIMENT_MARKER))
    .sort((a, b) => a.id - b.id);
}

// ==========================================
// DESCRIPTION SECTIONS
// ==========================================

/**
 * Split a description into `heading → text`, keyed by the lower-cased
 * heading. Continuation lines of a block are joined with a newline.
 */
export function parseDescriptionSections(description: string): Map<string, string> {
  const sections = new Map<string, string>();
  const blocks = description.split(/\r?\n[ \t]*(?:\r?\n[ \t]*)+/);

  for (const block of blocks) {
    const lines = block.split(/\r?\n/).map((line) => line.trim());
    const heading = lines.shift();
    if (!heading) continue;
    sections.set(normalizeHeading(heading), lines.join('\n').trim());
  }
  return sections;
}

export function requireSection(sections: Map<string, string>, heading: string): string {
  const value = sections.get(normalizeHeading(heading));
  if (value === undefined) {
    throw new MissingFieldError(heading);
  }
  if (value === '') {
    throw new MissingFieldError(heading, `Field "${heading}" in project description is empty`);
  }
  return value;
}

export function parseProjectDescription(description: string): {
  publicationTitle: string;
  experimentDescription: string;
} {
  const sections = parseDescriptionSections(description);
  return {
    publicationTitle: requireSection(sections, PUBLICATION_TITLE),
    experimentDescription: requireSection(sections, EXPERIMENT_DESCRIPTION),
  };
}

// ==========================================
// ANNOTATIONS
// ==========================================

/**
 * Key/value pairs to a map. A key that appears more than once keeps the value
 * of its last occurrence; callers must not rely on iteration order.
 */
export function flattenAnnotationPairs(pairs: AnnotationPair[]): Map<string, string> {
  const entries = new Map<string, string>();
  for (const [key, value] of pairs) {
    entries.set(key, value);
  }
  return entries;
}

/** Flatten the first map annotation attached to a project; none gives an empty map. */
export function flattenProjectAnnotations(records: AnnotationRecord[]): Map<string, string> {
  const first = records.find((r) => r.class === MAP_ANNOTATION_CLASS && r.values);
  return flattenAnnotationPairs(first?.values ?? []);
}

// ==========================================
// PROJECT TABLE & SELECTION
// ==========================================

export function toProjectTable(projects: Project[]): ProjectTableRow[] {
  return projects.map((p) => ({
    id: p.id,
    name: p.name,
    publicationTitle:
      parseDescriptionSections(p.description).get(normalizeHeading(PUBLICATION_TITLE)) ?? '',
    description: p.description,
  }));
}

/** "idr0001-study/experimentA" → "experimentA"; names without a slash give "". */
export function experimentName(projectName: string): string {
  const slash = projectName.indexOf('/');
  return slash === -1 ? '' : projectName.slice(slash + 1);
}

export type ProjectSelection =
  | { by: 'id'; id: number }
  | { by: 'index'; index: number; experiment?: string }
  | { by: 'title'; title: string; experiment?: string };

function pickExperiment(
  matches: ProjectTableRow[],
  title: string,
  experiment: string | undefined
): ProjectTableRow {
  if (matches.length === 1 && experiment === undefined) return matches[0];

  const wanted = experiment ?? experimentName(matches[0].name);
  const row = matches.find((m) => experimentName(m.name) === wanted);
  if (!row) {
    const available = matches.map((m) => experimentName(m.name)).join(', ');
    throw new SelectionError(
      `No experiment "${wanted}" under "${title}" (available: ${available})`
    );
  }
  return row;
}

/**
 * Resolve one project row. Index and title selections gather every row with
 * the same publication title, then pick one experiment among them.
 */
export function selectProject(
  rows: ProjectTableRow[],
  selection: ProjectSelection
): ProjectTableRow {
  if (selection.by === 'id') {
    const row = rows.find((r) => r.id === selection.id);
    if (!row) throw new SelectionError(`No experiment project with id ${selection.id}`);
    return row;
  }

  let title: string;
  if (selection.by === 'index') {
    const row = selectByIndex(rows, selection.index, 'project');
    // Untitled rows cannot be grouped with anything else.
    if (!row.publicationTitle) return row;
    title = row.publicationTitle;
  } else {
    title = selection.title.trim();
  }

  const matches = rows.filter((r) => r.publicationTitle !== '' && r.publicationTitle === title);
  if (matches.length === 0) {
    throw new SelectionError(`No experiment project titled "${title}"`);
  }
  return pickExperiment(matches, title, selection.experiment);
}

/** 1-based pick, matching the numbering shown in logs. */
export function selectByIndex<T>(items: T[], index: number, what: string): T {
  if (!Number.isInteger(index) || index < 1 || index > items.length) {
    throw new SelectionError(
      `${what} index ${index} is out of range (${items.length} available)`
    );
  }
  return items[index - 1];
}
