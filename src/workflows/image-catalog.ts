/**
 * MCP server images this repository knows how to build
 */

import { Success, Failure, type Result } from '../domain/types/index.js';

export interface ImageDefinition {
  name: string;
  title: string;
  repo: string;
  /** Build context, relative to the project root */
  contextDir: string;
  buildArgs: Record<string, string>;
}

export const IMAGE_CATALOG: readonly ImageDefinition[] = [
  {
    name: 'kubernetes-mcp-server',
    title: 'Kubernetes MCP Server',
    repo: 'https://github.com/containers/kubernetes-mcp-server.git',
    contextDir: 'images/kubernetes-mcp-server',
    buildArgs: {},
  },
  {
    name: 'argocd-mcp',
    title: 'ArgoCD MCP Server',
    repo: 'https://github.com/akuity/argocd-mcp.git',
    contextDir: 'images/argocd-mcp',
    buildArgs: { NODE_VERSION: '22.18.0' },
  },
  {
    name: 'servicenow-mcp',
    title: 'ServiceNow MCP Server',
    repo: 'https://github.com/echelon-ai-labs/servicenow-mcp.git',
    contextDir: 'images/servicenow-mcp',
    buildArgs: {},
  },
];

export function findImage(name: string): Result<ImageDefinition> {
  const image = IMAGE_CATALOG.find((candidate) => candidate.name === name);
  if (!image) {
    const known = IMAGE_CATALOG.map((candidate) => candidate.name).join(', ');
    return Failure(`Unknown image '${name}'. Available images: ${known}`);
  }
  return Success(image);
}
