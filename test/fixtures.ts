// This module provides in-process catalog fakes and a silent logger shared by the test suites.

import pino from 'pino';
import type { HandlerContext } from '../src/mcp/registry.js';
import type { ProjectCatalog, ProjectRecord } from '../src/types/domain.js';

export const FIXTURE_PROJECTS: ProjectRecord[] = [
  {
    id: 'alpha',
    name: 'Alpha',
    websiteStatus: 'live',
    dashboardStatus: 'live',
    deploymentPlatform: 'Vercel',
    cost: '$20/mo'
  },
  {
    id: 'bravo',
    name: 'Bravo',
    websiteStatus: 'live',
    dashboardStatus: 'development',
    deploymentPlatform: 'Netlify',
    cost: '$12.50/mo'
  },
  {
    id: 'charlie',
    name: 'Charlie',
    websiteStatus: 'development',
    dashboardStatus: 'development',
    deploymentPlatform: 'Render',
    cost: 'free tier'
  }
];

export const silentLogger = pino({ level: 'silent' });

export function createFakeCatalog(projects: ProjectRecord[] = FIXTURE_PROJECTS): ProjectCatalog {
  return {
    getProject: (id) => projects.find((project) => project.id === id.trim().toLowerCase()) ?? null,
    listProjects: () => [...projects]
  };
}

export function makeHandlerContext(overrides: Partial<HandlerContext> = {}): HandlerContext {
  return {
    signal: new AbortController().signal,
    logger: silentLogger,
    ...overrides
  };
}
