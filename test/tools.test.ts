// This test suite verifies the project tracker tools, resources, and prompt against an in-process catalog.

import { describe, expect, it } from 'vitest';
import { ALL_PROJECTS_URI, buildProjectRegistry, formatUsd, parseMonthlyCost } from '../src/mcp/tools.js';
import { NotFoundError } from '../src/utils/errors.js';
import type { ProjectRecord } from '../src/types/domain.js';
import { FIXTURE_PROJECTS, createFakeCatalog, makeHandlerContext } from './fixtures.js';

function fixture(id: string): ProjectRecord {
  const project = FIXTURE_PROJECTS.find((item) => item.id === id);
  if (!project) {
    throw new Error(`missing fixture ${id}`);
  }
  return project;
}

function callTool(name: string, args: Record<string, unknown>, projects: ProjectRecord[] = FIXTURE_PROJECTS) {
  const registry = buildProjectRegistry(createFakeCatalog(projects));
  const descriptor = registry.lookup('tool', name);
  return Promise.resolve(descriptor.handler(descriptor.inputSchema.parse(args), makeHandlerContext()));
}

function text(value: string, isError = false) {
  return {
    content: [{ type: 'text', text: value }],
    ...(isError ? { isError: true } : {})
  };
}

describe('project tracker cost parsing', () => {
  it('reads monthly amounts from display strings', () => {
    expect(parseMonthlyCost('$20/mo')).toBe(20);
    expect(parseMonthlyCost('$7.50/mo')).toBe(7.5);
    expect(parseMonthlyCost(' 15 ')).toBe(15);
    expect(parseMonthlyCost('free tier')).toBeNull();
  });

  it('formats whole and fractional dollars', () => {
    expect(formatUsd(91)).toBe('$91');
    expect(formatUsd(91.5)).toBe('$91.50');
  });
});

describe('project tracker tools', () => {
  it('registers every descriptor and seals the registry', () => {
    const registry = buildProjectRegistry(createFakeCatalog());

    expect(registry.isSealed()).toBe(true);
    expect(Array.from(registry.list('tool'), (item) => item.name)).toEqual([
      'get_project',
      'list_projects',
      'get_total_cost',
      'search_by_status'
    ]);
    expect(Array.from(registry.list('resource'), (item) => item.uri)).toEqual([
      'tracker://projects/all',
      'tracker://projects/alpha',
      'tracker://projects/bravo',
      'tracker://projects/charlie'
    ]);
    expect(Array.from(registry.list('prompt'), (item) => item.name)).toEqual(['monthly_report']);
  });

  it('returns one project by case-insensitive id', async () => {
    await expect(callTool('get_project', { project_id: 'ALPHA' })).resolves.toEqual(
      text(JSON.stringify(fixture('alpha'), null, 2))
    );
  });

  it('reports unknown projects with the available ids', async () => {
    await expect(callTool('get_project', { project_id: 'zulu' })).resolves.toEqual(
      text("Project 'zulu' not found. Available: alpha, bravo, charlie", true)
    );
  });

  it('lists projects one per line', async () => {
    await expect(callTool('list_projects', {})).resolves.toEqual(
      text(
        [
          '• Alpha (alpha) - live - live - Vercel - $20/mo',
          '• Bravo (bravo) - live - development - Netlify - $12.50/mo',
          '• Charlie (charlie) - development - development - Render - free tier'
        ].join('\n')
      )
    );
    await expect(callTool('list_projects', {}, [])).resolves.toEqual(text('No projects are tracked.'));
  });

  it('totals monthly costs and skips unparseable entries', async () => {
    await expect(callTool('get_total_cost', {})).resolves.toEqual(
      text(
        'Monthly Hosting Breakdown:\n' +
          '  Alpha: $20/mo\n' +
          '  Bravo: $12.50/mo\n' +
          '  Charlie: free tier (not counted)\n' +
          '\n' +
          'Total: $32.50/mo'
      )
    );
  });

  it('filters by website and dashboard status', async () => {
    await expect(callTool('search_by_status', { website_status: 'LIVE', dashboard_status: 'development' })).resolves.toEqual(
      text(JSON.stringify({ bravo: fixture('bravo') }, null, 2))
    );
    await expect(callTool('search_by_status', { dashboard_status: 'development' })).resolves.toEqual(
      text(JSON.stringify({ bravo: fixture('bravo'), charlie: fixture('charlie') }, null, 2))
    );
  });

  it('treats null status filters as absent', async () => {
    await expect(callTool('search_by_status', { website_status: 'live', dashboard_status: null })).resolves.toEqual(
      text(JSON.stringify({ alpha: fixture('alpha'), bravo: fixture('bravo') }, null, 2))
    );
    await expect(callTool('search_by_status', { website_status: 'retired', dashboard_status: null })).resolves.toEqual(
      text("No projects found with website_status='retired', dashboard_status='any'")
    );
  });

  it('explains empty status searches', async () => {
    await expect(callTool('search_by_status', { website_status: 'retired' })).resolves.toEqual(
      text("No projects found with website_status='retired', dashboard_status='any'")
    );
  });

  it('rejects a blank project id at the schema', () => {
    const registry = buildProjectRegistry(createFakeCatalog());

    expect(registry.lookup('tool', 'get_project').inputSchema.safeParse({ project_id: '  ' }).success).toBe(false);
  });
});

describe('project tracker resources', () => {
  it('serves the full catalog keyed by id', async () => {
    const registry = buildProjectRegistry(createFakeCatalog());
    const resource = registry.lookupResource(ALL_PROJECTS_URI);

    await expect(Promise.resolve(resource.handler({}, makeHandlerContext()))).resolves.toEqual({
      contents: [
        {
          uri: ALL_PROJECTS_URI,
          mimeType: 'application/json',
          text: JSON.stringify(
            { alpha: fixture('alpha'), bravo: fixture('bravo'), charlie: fixture('charlie') },
            null,
            2
          )
        }
      ]
    });
  });

  it('serves one record per project', async () => {
    const registry = buildProjectRegistry(createFakeCatalog());

    await expect(
      Promise.resolve(registry.lookupResource('tracker://projects/bravo').handler({}, makeHandlerContext()))
    ).resolves.toEqual({
      contents: [
        {
          uri: 'tracker://projects/bravo',
          mimeType: 'application/json',
          text: JSON.stringify(fixture('bravo'), null, 2)
        }
      ]
    });
  });

  it('fails per-project reads once the project is gone', async () => {
    const projects = [...FIXTURE_PROJECTS];
    const registry = buildProjectRegistry(createFakeCatalog(projects));
    projects.splice(0, 1);

    await expect(
      Promise.resolve().then(() => registry.lookupResource('tracker://projects/alpha').handler({}, makeHandlerContext()))
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('monthly report prompt', () => {
  it('embeds the catalog and the requested period', async () => {
    const registry = buildProjectRegistry(createFakeCatalog([fixture('alpha')]));
    const prompt = registry.lookup('prompt', 'monthly_report');
    const data = JSON.stringify({ alpha: fixture('alpha') }, null, 2);

    await expect(Promise.resolve(prompt.handler({ month: 'March 2026' }, makeHandlerContext()))).resolves.toEqual({
      description: 'Monthly IT department status report for March 2026.',
      messages: [
        {
          role: 'user',
          content: {
            type: 'text',
            text:
              'You are the IT department manager. Generate a professional monthly status report for March 2026 based on this project data:\n' +
              `${data}\n\n` +
              "Include: executive summary, per-project updates, hosting costs, and next month's priorities.\n" +
              'Keep it concise and professional.'
          }
        }
      ]
    });
  });

  it('omits the period when no month is given', async () => {
    const registry = buildProjectRegistry(createFakeCatalog());
    const result = await Promise.resolve(registry.lookup('prompt', 'monthly_report').handler({}, makeHandlerContext()));

    expect(result).toMatchObject({ description: 'Monthly IT department status report.' });
  });

  it('accepts a null month', async () => {
    const prompt = buildProjectRegistry(createFakeCatalog()).lookup('prompt', 'monthly_report');
    const result = await Promise.resolve(prompt.handler(prompt.inputSchema.parse({ month: null }), makeHandlerContext()));

    expect(result).toMatchObject({ description: 'Monthly IT department status report.' });
  });
});
