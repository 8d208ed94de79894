/**
 * Tool group helpers shared by the chat, MCP test and status tabs
 */

import type { Logger } from 'pino';
import type { InterleavedContent, LlamaTool, NamedTool } from '../infrastructure/llama-stack/index.js';

export const MCP_PREFIX = 'mcp::';
export const BUILTIN_PREFIX = 'builtin::';

/**
 * Unique tool group ids in first-seen order
 */
export function uniqueToolGroups(tools: LlamaTool[]): string[] {
  const groups = new Set<string>();
  for (const tool of tools) {
    if (tool.toolgroup_id) {
      groups.add(tool.toolgroup_id);
    }
  }
  return [...groups];
}

/**
 * MCP groups are always kept, builtin groups only when enabled since they
 * need provider API keys, anything else is kept.
 */
export function filterToolGroups(
  groups: string[],
  enableBuiltinTools: boolean,
  logger?: Logger,
): string[] {
  return groups.filter((group) => {
    if (group.startsWith(MCP_PREFIX)) {
      logger?.info({ toolgroup: group }, 'Including MCP toolgroup');
      return true;
    }
    if (group.startsWith(BUILTIN_PREFIX)) {
      if (enableBuiltinTools) {
        logger?.info({ toolgroup: group }, 'Including builtin toolgroup');
        return true;
      }
      logger?.warn({ toolgroup: group }, 'Skipping builtin toolgroup (requires API keys)');
      return false;
    }
    logger?.info({ toolgroup: group }, 'Including toolgroup');
    return true;
  });
}

export function toolName(tool: NamedTool): string {
  return tool.name ?? tool.identifier ?? 'Unknown';
}

/**
 * Flatten interleaved content to text; items without text are pretty-printed
 */
export function contentToText(content: InterleavedContent | null | undefined): string {
  if (content === null || content === undefined) {
    return '';
  }
  if (typeof content === 'string') {
    return content;
  }
  const items = Array.isArray(content) ? content : [content];
  return items.map((item) => item.text ?? JSON.stringify(item, null, 2)).join('\n');
}
