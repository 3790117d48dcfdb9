// This module defines input contracts for the project tracker tools, resources, and prompts.

import { z } from 'zod';

const statusSchema = z.string().trim().min(1).max(40);

export const getProjectSchema = z.object({
  project_id: z.string().trim().min(1).max(80).describe('Project identifier, e.g. "atlas".')
});

export const listProjectsSchema = z.object({});

export const getTotalCostSchema = z.object({});

export const searchByStatusSchema = z.object({
  website_status: statusSchema.nullish().describe('Website status to match, e.g. "live" or "development".'),
  dashboard_status: statusSchema.nullish().describe('Dashboard status to match, e.g. "live" or "development".')
});

export const readResourceSchema = z.object({});

export const monthlyReportSchema = z.object({
  month: z.string().trim().min(1).max(40).nullish().describe('Reporting period label, e.g. "March 2026".')
});
