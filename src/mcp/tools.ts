// This module implements the project tracker tools, resources, and prompts and registers them at startup.

import type { ProjectCatalog, ProjectRecord } from '../types/domain.js';
import type { PromptGetResult, ResourceReadResult, ToolCallResult } from '../types/mcp.js';
import { NotFoundError } from '../utils/errors.js';
import { Registry, definePrompt, defineResource, defineTool, type MethodDescriptor } from './registry.js';
import { withHandlerTimeout } from './timeout.js';
import {
  getProjectSchema,
  getTotalCostSchema,
  listProjectsSchema,
  monthlyReportSchema,
  readResourceSchema,
  searchByStatusSchema
} from './tool-schemas.js';

export const ALL_PROJECTS_URI = 'tracker://projects/all';

export interface ProjectRegistryOptions {
  // 0 disables the timeout policy.
  handlerTimeoutMs?: number;
}

function textResult(text: string, isError = false): ToolCallResult {
  return {
    content: [{ type: 'text', text }],
    ...(isError ? { isError: true } : {})
  };
}

function projectsById(projects: ProjectRecord[]): Record<string, ProjectRecord> {
  const byId: Record<string, ProjectRecord> = {};
  for (const project of projects) {
    byId[project.id] = project;
  }
  return byId;
}

function projectUri(id: string): string {
  return `tracker://projects/${encodeURIComponent(id)}`;
}

// This helper extracts the numeric amount from display costs such as "$20/mo" or "$7.50/mo".
export function parseMonthlyCost(cost: string): number | null {
  const match = /^\$?\s*(\d+(?:\.\d+)?)\s*(?:\/\s*mo)?$/i.exec(cost.trim());
  return match?.[1] ? Number(match[1]) : null;
}

export function formatUsd(amount: number): string {
  return Number.isInteger(amount) ? `$${amount}` : `$${amount.toFixed(2)}`;
}

// A null or absent filter matches every status.
function sameStatus(actual: string, wanted: string | null | undefined): boolean {
  return wanted === undefined || wanted === null || actual.toLowerCase() === wanted.toLowerCase();
}

// This function builds the tool descriptors that read from the injected catalog.
export function buildProjectTools(catalog: ProjectCatalog): MethodDescriptor[] {
  return [
    defineTool({
      name: 'get_project',
      description:
        'Get the current status and details of a project by its ID. Use list_projects to discover available IDs.',
      inputSchema: getProjectSchema,
      handler: ({ project_id: projectId }) => {
        const project = catalog.getProject(projectId);
        if (!project) {
          const available = catalog.listProjects().map((item) => item.id);
          return textResult(`Project '${projectId}' not found. Available: ${available.join(', ')}`, true);
        }
        return textResult(JSON.stringify(project, null, 2));
      }
    }),
    defineTool({
      name: 'list_projects',
      description: 'List all tracked projects with their current status.',
      inputSchema: listProjectsSchema,
      handler: () => {
        const projects = catalog.listProjects();
        if (projects.length === 0) {
          return textResult('No projects are tracked.');
        }

        return textResult(
          projects
            .map(
              (project) =>
                `• ${project.name} (${project.id}) - ${project.websiteStatus} - ${project.dashboardStatus} - ${project.deploymentPlatform} - ${project.cost}`
            )
            .join('\n')
        );
      }
    }),
    defineTool({
      name: 'get_total_cost',
      description: 'Calculate the total monthly hosting cost across all projects.',
      inputSchema: getTotalCostSchema,
      handler: (_args, context) => {
        let total = 0;
        const breakdown: string[] = [];

        for (const project of catalog.listProjects()) {
          const amount = parseMonthlyCost(project.cost);
          if (amount === null) {
            context.logger.warn({ event: 'project_cost_unparsed', projectId: project.id, cost: project.cost }, 'project_cost_unparsed');
            breakdown.push(`  ${project.name}: ${project.cost} (not counted)`);
            continue;
          }
          total += amount;
          breakdown.push(`  ${project.name}: ${project.cost}`);
        }

        return textResult(`Monthly Hosting Breakdown:\n${breakdown.join('\n')}\n\nTotal: ${formatUsd(total)}/mo`);
      }
    }),
    defineTool({
      name: 'search_by_status',
      description:
        'Find all projects with a specific website and/or dashboard status. Valid statuses: live, development. Filter by website_status, dashboard_status, or both.',
      inputSchema: searchByStatusSchema,
      handler: ({ website_status: websiteStatus, dashboard_status: dashboardStatus }) => {
        const matches = catalog
          .listProjects()
          .filter(
            (project) => sameStatus(project.websiteStatus, websiteStatus) && sameStatus(project.dashboardStatus, dashboardStatus)
          );

        if (matches.length === 0) {
          return textResult(
            `No projects found with website_status='${websiteStatus ?? 'any'}', dashboard_status='${dashboardStatus ?? 'any'}'`
          );
        }

        return textResult(JSON.stringify(projectsById(matches), null, 2));
      }
    })
  ];
}

// Resources: the whole catalog plus one entry per project known at startup.
export function buildProjectResources(catalog: ProjectCatalog): MethodDescriptor[] {
  const resources: MethodDescriptor[] = [
    defineResource({
      name: 'all_projects',
      uri: ALL_PROJECTS_URI,
      mimeType: 'application/json',
      description: 'Complete project catalog as JSON.',
      inputSchema: readResourceSchema,
      handler: (): ResourceReadResult => ({
        contents: [
          {
            uri: ALL_PROJECTS_URI,
            mimeType: 'application/json',
            text: JSON.stringify(projectsById(catalog.listProjects()), null, 2)
          }
        ]
      })
    })
  ];

  for (const { id, name } of catalog.listProjects()) {
    const uri = projectUri(id);
    resources.push(
      defineResource({
        name: `project_${id}`,
        uri,
        mimeType: 'application/json',
        description: `Catalog record for ${name}.`,
        inputSchema: readResourceSchema,
        handler: (): ResourceReadResult => {
          const project = catalog.getProject(id);
          if (!project) {
            throw new NotFoundError('resource', uri);
          }
          return {
            contents: [{ uri, mimeType: 'application/json', text: JSON.stringify(project, null, 2) }]
          };
        }
      })
    );
  }

  return resources;
}

export function buildProjectPrompts(catalog: ProjectCatalog): MethodDescriptor[] {
  return [
    definePrompt({
      name: 'monthly_report',
      description: 'Generate a monthly IT department status report.',
      inputSchema: monthlyReportSchema,
      handler: ({ month }): PromptGetResult => {
        const data = JSON.stringify(projectsById(catalog.listProjects()), null, 2);
        const period = month ? ` for ${month}` : '';

        return {
          description: `Monthly IT department status report${period}.`,
          messages: [
            {
              role: 'user',
              content: {
                type: 'text',
                text:
                  `You are the IT department manager. Generate a professional monthly status report${period} based on this project data:\n` +
                  `${data}\n\n` +
                  "Include: executive summary, per-project updates, hosting costs, and next month's priorities.\n" +
                  'Keep it concise and professional.'
              }
            }
          ]
        };
      }
    })
  ];
}

// This function registers every catalog-backed descriptor and seals the registry against later changes.
export function buildProjectRegistry(catalog: ProjectCatalog, options: ProjectRegistryOptions = {}): Registry {
  const registry = new Registry();
  const timeoutMs = options.handlerTimeoutMs ?? 0;

  for (const descriptor of [
    ...buildProjectTools(catalog),
    ...buildProjectResources(catalog),
    ...buildProjectPrompts(catalog)
  ]) {
    registry.register(withHandlerTimeout(descriptor, timeoutMs));
  }

  return registry.seal();
}
