import type { ProjectRecord, ProjectSummary } from "../models/_types";

/** Records of one project in dataset order; an unknown id yields an empty list. */
export function filterByProject(records: readonly ProjectRecord[], projectId: string): ProjectRecord[] {
  return records.filter((record) => record.projectId === projectId);
}

export function summarizeProjects(records: readonly ProjectRecord[]): ProjectSummary[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    counts.set(record.projectId, (counts.get(record.projectId) ?? 0) + 1);
  }
  return Array.from(counts, ([projectId, recordCount]) => ({ projectId, recordCount }));
}
