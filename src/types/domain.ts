// This file defines project catalog records and the read-only catalog contract injected into MCP handlers.

export interface ProjectRecord {
  id: string;
  name: string;
  websiteStatus: string;
  dashboardStatus: string;
  deploymentPlatform: string;
  // Monthly hosting cost as displayed, e.g. "$20/mo".
  cost: string;
}

export interface ProjectCatalog {
  getProject(id: string): ProjectRecord | null;
  listProjects(): ProjectRecord[];
}
