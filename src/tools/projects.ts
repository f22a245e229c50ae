/**
 * timeledger_projects tool
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import { getStoreManager } from '../services/store/manager.js';
import { listProjectNames } from '../services/store/projects.js';
import { toolFailure } from '../utils/tool-result.js';

export interface ProjectsOutput {
  projects: string[];
  count: number;
}

export const projectsTool: Tool = {
  name: 'timeledger_projects',
  description: 'List all project names in case-insensitive alphabetical order.',
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

export async function projectsHandler(_args: Record<string, unknown>): Promise<ToolResult<ProjectsOutput>> {
  try {
    const db = await getStoreManager().getStore();
    const projects = listProjectNames(db);
    return {
      success: true,
      data: { projects, count: projects.length },
    };
  } catch (error) {
    return toolFailure(error, 'PROJECTS_ERROR');
  }
}
