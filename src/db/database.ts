// This module owns SQLite initialization and read access for the project catalog served through MCP.

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { ProjectCatalog, ProjectRecord } from '../types/domain.js';
import { AppError } from '../utils/errors.js';
import { parseJson } from '../utils/json.js';

interface ProjectRow {
  id: string;
  name: string;
  website_status: string;
  dashboard_status: string;
  deployment_platform: string;
  cost: string;
}

const projectSeedSchema = z.object({
  projects: z.array(
    z.object({
      id: z.string().trim().min(1).max(80),
      name: z.string().trim().min(1).max(160),
      websiteStatus: z.string().trim().min(1).max(40),
      dashboardStatus: z.string().trim().min(1).max(40),
      deploymentPlatform: z.string().trim().min(1).max(160),
      cost: z.string().trim().min(1).max(40)
    })
  )
});

const IN_MEMORY_PATH = ':memory:';

function mapProjectRow(row: ProjectRow): ProjectRecord {
  return {
    id: row.id,
    name: row.name,
    websiteStatus: row.website_status,
    dashboardStatus: row.dashboard_status,
    deploymentPlatform: row.deployment_platform,
    cost: row.cost
  };
}

// This helper reads and validates one seed file of catalog records.
export function loadProjectSeed(seedPath: string): ProjectRecord[] {
  if (!existsSync(seedPath)) {
    throw new AppError(500, 'seed_missing', `Catalog seed file not found: ${seedPath}`);
  }

  const parsed = projectSeedSchema.safeParse(parseJson(readFileSync(seedPath, 'utf8'), 'catalog seed'));
  if (!parsed.success) {
    throw new AppError(500, 'seed_invalid', 'Catalog seed file failed validation.', parsed.error.flatten());
  }

  return parsed.data.projects.map((project) => ({ ...project, id: project.id.toLowerCase() }));
}

// This store is synchronous because SQLite calls are local and bounded.
export class SqliteProjectStore implements ProjectCatalog {
  private readonly db: Database.Database;

  public constructor(dbPath: string) {
    if (dbPath !== IN_MEMORY_PATH && !existsSync(dirname(dbPath))) {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    if (dbPath !== IN_MEMORY_PATH) {
      this.db.pragma('journal_mode = WAL');
    }
    this.initializeSchema();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS projects (
        position INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        name TEXT NOT NULL,
        website_status TEXT NOT NULL,
        dashboard_status TEXT NOT NULL,
        deployment_platform TEXT NOT NULL,
        cost TEXT NOT NULL
      );
    `);
  }

  // This method inserts seed records only into an empty table and returns the number inserted.
  public seedIfEmpty(records: ProjectRecord[]): number {
    if (this.countProjects() > 0) {
      return 0;
    }

    const insert = this.db.prepare<[string, string, string, string, string, string]>(
      `INSERT INTO projects (id, name, website_status, dashboard_status, deployment_platform, cost)
       VALUES (?, ?, ?, ?, ?, ?)`
    );

    const tx = this.db.transaction((items: ProjectRecord[]) => {
      for (const item of items) {
        insert.run(item.id, item.name, item.websiteStatus, item.dashboardStatus, item.deploymentPlatform, item.cost);
      }
    });

    try {
      tx(records);
    } catch (error) {
      throw new AppError(500, 'seed_failed', 'Failed to seed the project catalog.', {
        originalMessage: error instanceof Error ? error.message : 'unknown'
      });
    }

    return records.length;
  }

  public countProjects(): number {
    const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM projects').get();
    return row?.total ?? 0;
  }

  // Lookups are case-insensitive on the project id.
  public getProject(id: string): ProjectRecord | null {
    const row = this.db
      .prepare<[string], ProjectRow>(
        `SELECT id, name, website_status, dashboard_status, deployment_platform, cost
         FROM projects WHERE id = ?`
      )
      .get(id.trim().toLowerCase());

    return row ? mapProjectRow(row) : null;
  }

  public listProjects(): ProjectRecord[] {
    return this.db
      .prepare<[], ProjectRow>(
        `SELECT id, name, website_status, dashboard_status, deployment_platform, cost
         FROM projects ORDER BY position ASC`
      )
      .all()
      .map(mapProjectRow);
  }

  public close(): void {
    this.db.close();
  }
}
